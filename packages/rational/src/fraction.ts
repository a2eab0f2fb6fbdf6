import { ParseError } from './errors';

/**
 * Exact rational arithmetic on bigint numerator/denominator pairs.
 */

export type Integer = bigint | number;

// ============================================================================
// SECTION 1: Integer helpers
// ============================================================================

export function gcd(a: bigint, b: bigint): bigint {
    a = a < 0n ? -a : a;
    b = b < 0n ? -b : b;
    while (b !== 0n) {
        const t = b;
        b = a % b;
        a = t;
    }
    return a;
}

/** Division rounding toward negative infinity (bigint `/` truncates). */
export function floorDiv(a: bigint, b: bigint): bigint {
    const q = a / b;
    return (a % b !== 0n) && ((a < 0n) !== (b < 0n)) ? q - 1n : q;
}

export function bitLength(value: bigint): number {
    return value === 0n ? 0 : (value < 0n ? -value : value).toString(2).length;
}

/**
 * Base-2 logarithm of a positive bigint, finite even where `Number(value)`
 * would overflow to Infinity.
 */
export function log2BigInt(value: bigint): number {
    if (value <= 0n) {
        throw new RangeError(`log2 is undefined for ${value}`);
    }
    const bits = bitLength(value);
    if (bits <= 1000) {
        return Math.log2(Number(value));
    }
    const shift = bits - 64;
    return Math.log2(Number(value >> BigInt(shift))) + shift;
}

function toBigInt(value: Integer, label: string): bigint {
    if (typeof value === 'bigint') {
        return value;
    }
    if (!Number.isInteger(value)) {
        throw new ParseError(`Fraction ${label} must be an integer, got ${value}`, value);
    }
    return BigInt(value);
}

// ============================================================================
// SECTION 2: Fraction
// ============================================================================

export class Fraction {
    static readonly ONE = new Fraction(1n, 1n);

    readonly numerator: bigint;
    readonly denominator: bigint;

    /**
     * @throws ParseError for a zero denominator or a non-integer number part
     *
     * @example
     * new Fraction(6, 4).toString() // '3/2'
     * new Fraction(3n, -9n).toString() // '-1/3'
     */
    constructor(numerator: Integer, denominator: Integer = 1n) {
        let p = toBigInt(numerator, 'numerator');
        let q = toBigInt(denominator, 'denominator');
        if (q === 0n) {
            throw new ParseError('Fraction denominator must be non-zero', `${p}/${q}`);
        }
        if (q < 0n) {
            p = -p;
            q = -q;
        }
        const g = gcd(p, q);
        this.numerator = p / g;
        this.denominator = q / g;
    }

    /**
     * Exact value of a finite float (every finite double is a dyadic rational).
     * With `maxDenominator` the closest fraction whose denominator does not
     * exceed that bound is returned instead.
     */
    static fromNumber(value: number, maxDenominator?: Integer): Fraction {
        if (!Number.isFinite(value)) {
            throw new ParseError(`Cannot convert ${value} to a fraction`, value);
        }
        let scaled = value;
        let denominator = 1n;
        while (!Number.isInteger(scaled)) {
            scaled *= 2;
            denominator *= 2n;
        }
        const exact = new Fraction(BigInt(scaled), denominator);
        return maxDenominator === undefined ? exact : exact.limitDenominator(maxDenominator);
    }

    mul(other: Fraction): Fraction {
        return new Fraction(this.numerator * other.numerator, this.denominator * other.denominator);
    }

    div(other: Fraction): Fraction {
        return new Fraction(this.numerator * other.denominator, this.denominator * other.numerator);
    }

    add(other: Fraction): Fraction {
        return new Fraction(
            this.numerator * other.denominator + other.numerator * this.denominator,
            this.denominator * other.denominator
        );
    }

    sub(other: Fraction): Fraction {
        return new Fraction(
            this.numerator * other.denominator - other.numerator * this.denominator,
            this.denominator * other.denominator
        );
    }

    abs(): Fraction {
        return this.numerator < 0n ? new Fraction(-this.numerator, this.denominator) : this;
    }

    reciprocal(): Fraction {
        return new Fraction(this.denominator, this.numerator);
    }

    /** Integer power; negative exponents invert. */
    pow(exponent: number): Fraction {
        if (!Number.isInteger(exponent)) {
            throw new RangeError(`Fraction exponent must be an integer, got ${exponent}`);
        }
        const e = BigInt(Math.abs(exponent));
        const raised = new Fraction(this.numerator ** e, this.denominator ** e);
        return exponent < 0 ? raised.reciprocal() : raised;
    }

    compare(other: Fraction): -1 | 0 | 1 {
        const left = this.numerator * other.denominator;
        const right = other.numerator * this.denominator;
        return left < right ? -1 : left > right ? 1 : 0;
    }

    equals(other: Fraction): boolean {
        return this.numerator === other.numerator && this.denominator === other.denominator;
    }

    /**
     * Closest fraction with a denominator of at most `maxDenominator`,
     * found through the continued fraction expansion.
     */
    limitDenominator(maxDenominator: Integer): Fraction {
        const limit = toBigInt(maxDenominator, 'denominator limit');
        if (limit < 1n) {
            throw new RangeError(`Denominator limit must be at least 1, got ${limit}`);
        }
        if (this.denominator <= limit) {
            return this;
        }

        let p0 = 0n, q0 = 1n, p1 = 1n, q1 = 0n;
        let n = this.numerator;
        let d = this.denominator;
        for (;;) {
            const a = floorDiv(n, d);
            const q2 = q0 + a * q1;
            if (q2 > limit) {
                break;
            }
            [p0, q0, p1, q1] = [p1, q1, p0 + a * p1, q2];
            [n, d] = [d, n - a * d];
        }

        const k = floorDiv(limit - q0, q1);
        const lower = new Fraction(p0 + k * p1, q0 + k * q1);
        const upper = new Fraction(p1, q1);
        return upper.sub(this).abs().compare(lower.sub(this).abs()) <= 0 ? upper : lower;
    }

    toNumber(): number {
        const n = Number(this.numerator);
        const d = Number(this.denominator);
        if (Number.isFinite(n) && Number.isFinite(d)) {
            return n / d;
        }
        const shift = BigInt(Math.max(bitLength(this.numerator), bitLength(this.denominator)) - 1000);
        return Number(this.numerator >> shift) / Number(this.denominator >> shift);
    }

    /** Base-2 logarithm; the fraction must be positive. */
    log2(): number {
        if (this.numerator <= 0n) {
            throw new RangeError(`log2 is undefined for ${this.toString()}`);
        }
        const value = this.toNumber();
        if (Number.isFinite(value) && value > 0) {
            return Math.log2(value);
        }
        return log2BigInt(this.numerator) - log2BigInt(this.denominator);
    }

    toString(): string {
        return `${this.numerator}/${this.denominator}`;
    }
}
