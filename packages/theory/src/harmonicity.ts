import {
    exponentVectorToPair,
    factorInteger,
    factorise,
    factoriseNumeratorAndDenominator,
    log2BigInt,
    type Integer,
} from '@intonal/rational';

/**
 * Harmonicity and complexity measures of just intervals.
 * Every function takes a prime exponent vector.
 */

// ============================================================================
// SECTION 1: Indigestibility (Barlow, "The Ratio Book")
// ============================================================================

/**
 * `2 × Σ k·(p−1)²/p` over the prime factors `p` with multiplicity `k`,
 * accumulated in order of first appearance.
 */
export function indigestibilityOfFactorised(factors: readonly number[]): number {
    const counts = new Map<number, number>();
    for (const factor of factors) {
        counts.set(factor, (counts.get(factor) ?? 0) + 1);
    }
    let summed = 0;
    for (const [prime, power] of counts) {
        summed += (power * (prime - 1) ** 2) / prime;
    }
    return 2 * summed;
}

/**
 * @example
 * indigestibility(3) // 2.6666666666666665
 */
export function indigestibility(n: Integer): number {
    const factors: number[] = [];
    for (const [prime, multiplicity] of factorInteger(BigInt(n))) {
        for (let i = 0; i < multiplicity; i++) {
            factors.push(Number(prime));
        }
    }
    return indigestibilityOfFactorised(factors);
}

// ============================================================================
// SECTION 2: Harmonicity
// ============================================================================

/** Barlow harmonicity; higher is more harmonic, 1/1 is infinite. */
export function harmonicityBarlow(exponents: readonly number[]): number {
    const [numerator, denominator] = factoriseNumeratorAndDenominator(exponents);
    const indigestibilityNumerator = indigestibilityOfFactorised(numerator);
    const indigestibilityDenominator = indigestibilityOfFactorised(denominator);
    if (indigestibilityNumerator === 0 && indigestibilityDenominator === 0) {
        return Infinity;
    }
    const sign = indigestibilityNumerator - indigestibilityDenominator < 0 ? -1 : 1;
    return sign / (indigestibilityNumerator + indigestibilityDenominator);
}

/** Unsigned Barlow harmonicity with 1/1 mapped to 1. */
export function harmonicitySimplifiedBarlow(exponents: readonly number[]): number {
    const barlow = Math.abs(harmonicityBarlow(exponents));
    return barlow === Infinity ? 1 : barlow;
}

/** Euler's gradus suavitatis; 1/1 is 1. */
export function harmonicityEuler(exponents: readonly number[]): number {
    return 1 + factorise(exponents).reduce((sum, factor) => sum + factor - 1, 0);
}

/** Tenney harmonic distance `log2(num × den)`; 1/1 is 0. */
export function harmonicityTenney(exponents: readonly number[]): number {
    const [numerator, denominator] = exponentVectorToPair(exponents);
    return log2BigInt(numerator * denominator);
}

/** Sum of odd prime factors plus the count of twos. */
export function harmonicityVogel(exponents: readonly number[]): number {
    const factors = factorise(exponents);
    const odd = factors.filter((factor) => factor !== 2);
    return odd.reduce((sum, factor) => sum + factor, 0) + (factors.length - odd.length);
}

/** Sum of odd prime factors. */
export function harmonicityWilson(exponents: readonly number[]): number {
    return factorise(exponents)
        .filter((factor) => factor !== 2)
        .reduce((sum, factor) => sum + factor, 0);
}
