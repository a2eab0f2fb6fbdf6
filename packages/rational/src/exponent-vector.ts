import { ParseError } from './errors';
import { Fraction, type Integer } from './fraction';

/**
 * Prime exponent vectors ("monzos").
 * Index 0 holds the exponent of 2, index 1 of 3, index 2 of 5, ...
 */

// ============================================================================
// SECTION 1: Branded type
// ============================================================================

/**
 * A frozen exponent vector in canonical form (no trailing zeros).
 * MUST be created via asExponentVector() or the arithmetic below.
 * The empty vector is the ratio 1/1.
 */
export type ExponentVector = readonly number[] & {
    readonly __brand: 'ExponentVector';
};

/**
 * Canonicalise a sequence of exponents: trailing zeros are dropped and
 * negative zeros become zeros.
 *
 * @throws ParseError if an exponent is not an integer
 *
 * @example
 * asExponentVector([1, 0, -1, 0]) // [1, 0, -1]
 */
export function asExponentVector(exponents: Iterable<number>): ExponentVector {
    const values = Array.from(exponents, (exponent) => {
        if (!Number.isInteger(exponent)) {
            throw new ParseError(`Exponents must be integers, got ${exponent}`, exponent);
        }
        return exponent === 0 ? 0 : exponent;
    });
    return Object.freeze(trim(values)) as ExponentVector;
}

export const UNISON: ExponentVector = asExponentVector([]);

// ============================================================================
// SECTION 2: Shape
// ============================================================================

/**
 * Drop trailing zero entries. Returns a new array.
 */
export function trim(exponents: readonly number[]): number[] {
    let end = exponents.length;
    while (end > 0 && exponents[end - 1] === 0) {
        end--;
    }
    return exponents.slice(0, end);
}

/**
 * Right-pad the shorter of two vectors with zeros. Neither input is touched.
 *
 * @example
 * pad([1, 0, -1], [1]) // [[1, 0, -1], [1, 0, 0]]
 */
export function pad(a: readonly number[], b: readonly number[]): [number[], number[]] {
    const length = Math.max(a.length, b.length);
    const fill = (v: readonly number[]) => [...v, ...new Array<number>(length - v.length).fill(0)];
    return [fill(a), fill(b)];
}

export function vectorsEqual(a: readonly number[], b: readonly number[]): boolean {
    const [left, right] = pad(a, b);
    return left.every((exponent, i) => exponent === right[i]);
}

// ============================================================================
// SECTION 3: Arithmetic
// ============================================================================

function elementwise(
    a: readonly number[],
    b: readonly number[],
    operation: (e0: number, e1: number) => number
): ExponentVector {
    const [left, right] = pad(a, b);
    return asExponentVector(left.map((exponent, i) => operation(exponent, right[i])));
}

/** Product of the two ratios. */
export function add(a: readonly number[], b: readonly number[]): ExponentVector {
    return elementwise(a, b, (e0, e1) => e0 + e1);
}

/** Quotient of the two ratios. */
export function subtract(a: readonly number[], b: readonly number[]): ExponentVector {
    return elementwise(a, b, (e0, e1) => e0 - e1);
}

/** Reciprocal of the ratio. */
export function negate(a: readonly number[]): ExponentVector {
    return asExponentVector(a.map((exponent) => -exponent));
}

// ============================================================================
// SECTION 4: Ratio adjustment
// ============================================================================

/**
 * Fold `ratio` into `[1, border)` by repeated division/multiplication.
 * For `border <= 1` the ratio comes back unchanged.
 *
 * @example
 * ratioAdjust(new Fraction(1, 3), 2) // 4/3
 * ratioAdjust(new Fraction(8, 3), 2) // 4/3
 */
export function ratioAdjust(ratio: Fraction, border: Integer): Fraction {
    const period = new Fraction(border);
    if (period.compare(Fraction.ONE) <= 0) {
        return ratio;
    }
    if (ratio.numerator <= 0n) {
        throw new RangeError(`Only positive ratios can be adjusted, got ${ratio.toString()}`);
    }
    let adjusted = ratio;
    while (adjusted.compare(period) >= 0) {
        adjusted = adjusted.div(period);
    }
    while (adjusted.compare(Fraction.ONE) < 0) {
        adjusted = adjusted.mul(period);
    }
    return adjusted;
}
