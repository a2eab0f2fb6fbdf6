import { ParseError } from './errors';
import { Fraction, type Integer } from './fraction';
import { asExponentVector, ratioAdjust, type ExponentVector } from './exponent-vector';
import { factorInteger, firstPrimes, primeIndex } from './primes';

/**
 * Conversions between `"num/den"` strings, Fractions and exponent vectors.
 */

// ============================================================================
// SECTION 1: String → Fraction
// ============================================================================

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * Parse a `"num/den"` ratio string.
 *
 * @throws ParseError if the text is not two integers separated by one `/`,
 *   or the denominator is zero
 *
 * @example
 * parseRatio('6/4') // 3/2
 */
export function parseRatio(text: string): Fraction {
    const parts = text.split('/');
    if (parts.length !== 2) {
        throw new ParseError(`Expected a ratio of the form "num/den", got "${text}"`, text);
    }
    const [numerator, denominator] = parts;
    if (!INTEGER_PATTERN.test(numerator) || !INTEGER_PATTERN.test(denominator)) {
        throw new ParseError(`Ratio parts must be integers, got "${text}"`, text);
    }
    return new Fraction(BigInt(numerator.trim()), BigInt(denominator.trim()));
}

// ============================================================================
// SECTION 2: Fraction ↔ ExponentVector
// ============================================================================

/**
 * Factor a positive fraction into its prime exponent vector.
 *
 * @throws ParseError for ratios <= 0, or prime factors beyond the prime table
 *
 * @example
 * fractionToExponentVector(new Fraction(3, 2)) // [-1, 1]
 * fractionToExponentVector(new Fraction(11, 9)) // [0, -2, 0, 0, 1]
 */
export function fractionToExponentVector(ratio: Fraction): ExponentVector {
    if (ratio.numerator <= 0n) {
        throw new ParseError(`Only positive ratios have an exponent vector, got ${ratio.toString()}`, ratio);
    }

    const exponents: number[] = [];
    const accumulate = (factors: Map<bigint, number>, sign: 1 | -1) => {
        for (const [prime, multiplicity] of factors) {
            const index = primeIndex(Number(prime));
            while (exponents.length <= index) {
                exponents.push(0);
            }
            exponents[index] += sign * multiplicity;
        }
    };
    accumulate(factorInteger(ratio.numerator), 1);
    accumulate(factorInteger(ratio.denominator), -1);

    return asExponentVector(exponents);
}

/**
 * Numerator and denominator of an exponent vector, before any reduction.
 *
 * @example
 * exponentVectorToPair([1, 0, -1]) // [2n, 5n]
 */
export function exponentVectorToPair(exponents: readonly number[]): [bigint, bigint] {
    const primes = firstPrimes(exponents.length);
    let numerator = 1n;
    let denominator = 1n;
    exponents.forEach((exponent, i) => {
        if (exponent > 0) {
            numerator *= BigInt(primes[i]) ** BigInt(exponent);
        } else if (exponent < 0) {
            denominator *= BigInt(primes[i]) ** BigInt(-exponent);
        }
    });
    return [numerator, denominator];
}

/**
 * @example
 * exponentVectorToFraction([1, 0, -1]) // 2/5
 * exponentVectorToFraction([]) // 1/1
 */
export function exponentVectorToFraction(exponents: readonly number[]): Fraction {
    const [numerator, denominator] = exponentVectorToPair(exponents);
    return ratioAdjust(new Fraction(numerator, denominator), 1);
}

export function ratioToExponentVector(text: string): ExponentVector {
    return fractionToExponentVector(parseRatio(text));
}

/**
 * Fold a vector into one period (default: the octave `[1, 2)`).
 *
 * @example
 * normalizeExponentVector([0, 1]) // [-1, 1]  (3/1 → 3/2)
 */
export function normalizeExponentVector(exponents: readonly number[], period: Integer = 2): ExponentVector {
    return fractionToExponentVector(ratioAdjust(exponentVectorToFraction(exponents), period));
}

// ============================================================================
// SECTION 3: Factor lists
// ============================================================================

/**
 * Prime factors of numerator and denominator, with multiplicity, in
 * ascending prime order. The unison is represented by `[1]`.
 *
 * @example
 * factorise([-2, 0, 1]) // [2, 2, 5]
 */
export function factorise(exponents: readonly number[]): number[] {
    if (exponents.length === 0) {
        return [1];
    }
    const primes = firstPrimes(exponents.length);
    return exponents.flatMap((exponent, i) => new Array<number>(Math.abs(exponent)).fill(primes[i]));
}

/**
 * Prime factors split into numerator and denominator lists.
 *
 * @example
 * factoriseNumeratorAndDenominator([-2, 0, 1]) // [[5], [2, 2]]
 * factoriseNumeratorAndDenominator([]) // [[1], []]
 */
export function factoriseNumeratorAndDenominator(exponents: readonly number[]): [number[], number[]] {
    if (exponents.length === 0) {
        return [[1], []];
    }
    const primes = firstPrimes(exponents.length);
    const numerator: number[] = [];
    const denominator: number[] = [];
    exponents.forEach((exponent, i) => {
        const target = exponent > 0 ? numerator : denominator;
        for (let k = 0; k < Math.abs(exponent); k++) {
            target.push(primes[i]);
        }
    });
    return [numerator, denominator];
}
