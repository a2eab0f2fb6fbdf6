import { Fraction, floorDiv, gcd, log2BigInt } from '../fraction';
import { ParseError } from '../errors';

describe('Fraction', () => {
    describe('constructor', () => {
        test('Reduces by the greatest common divisor', () => {
            const f = new Fraction(6, 4);
            expect(f.numerator).toBe(3n);
            expect(f.denominator).toBe(2n);
        });

        test('Moves the sign to the numerator', () => {
            expect(new Fraction(3n, -9n).toString()).toBe('-1/3');
        });

        test('Integer shorthand keeps the /1 part in its string form', () => {
            expect(new Fraction(5).toString()).toBe('5/1');
        });

        // EDGE CASE TESTS
        test('[EDGE] Zero denominator → ParseError', () => {
            expect(() => new Fraction(1, 0)).toThrow(ParseError);
        });

        test('[EDGE] Non-integer number → ParseError', () => {
            expect(() => new Fraction(1.5, 2)).toThrow(ParseError);
        });

        test('[EDGE] Zero numerator reduces to 0/1', () => {
            expect(new Fraction(0, 7).toString()).toBe('0/1');
        });
    });

    describe('arithmetic', () => {
        const fifth = new Fraction(3, 2);
        const third = new Fraction(5, 4);

        test('mul / div / add / sub', () => {
            expect(fifth.mul(third).toString()).toBe('15/8');
            expect(fifth.div(third).toString()).toBe('6/5');
            expect(fifth.add(third).toString()).toBe('11/4');
            expect(third.sub(fifth).toString()).toBe('-1/4');
        });

        test('pow() with negative and zero exponents', () => {
            expect(new Fraction(80, 81).pow(-2).toString()).toBe('6561/6400');
            expect(fifth.pow(3).toString()).toBe('27/8');
            expect(fifth.pow(0).equals(Fraction.ONE)).toBe(true);
        });

        test('[EDGE] pow() rejects fractional exponents', () => {
            expect(() => fifth.pow(0.5)).toThrow(RangeError);
        });

        test('compare() and equals()', () => {
            expect(fifth.compare(new Fraction(4, 3))).toBe(1);
            expect(new Fraction(4, 3).compare(fifth)).toBe(-1);
            expect(fifth.compare(new Fraction(6, 4))).toBe(0);
            expect(fifth.equals(new Fraction(6, 4))).toBe(true);
        });
    });

    describe('fromNumber()', () => {
        test('Converts dyadic floats exactly', () => {
            expect(Fraction.fromNumber(0.375).toString()).toBe('3/8');
            expect(Fraction.fromNumber(2).toString()).toBe('2/1');
            expect(Fraction.fromNumber(-1.25).toString()).toBe('-5/4');
        });

        test('Limits the denominator when asked', () => {
            expect(Fraction.fromNumber(Math.PI, 1000).toString()).toBe('355/113');
        });

        test('[EDGE] Non-finite values → ParseError', () => {
            expect(() => Fraction.fromNumber(Number.NaN)).toThrow(ParseError);
            expect(() => Fraction.fromNumber(Infinity)).toThrow(ParseError);
        });
    });

    describe('limitDenominator()', () => {
        test('Leaves fractions inside the bound untouched', () => {
            const f = new Fraction(3, 2);
            expect(f.limitDenominator(10)).toBe(f);
        });

        test('Picks the closest bounded convergent', () => {
            expect(new Fraction(3141593, 1000000).limitDenominator(100).toString()).toBe('311/99');
        });
    });

    describe('conversions', () => {
        test('toNumber()', () => {
            expect(new Fraction(3, 2).toNumber()).toBe(1.5);
        });

        test('[EDGE] toNumber() beyond float range', () => {
            expect(new Fraction(10n ** 400n, 10n ** 399n).toNumber()).toBeCloseTo(10, 10);
        });

        test('log2()', () => {
            expect(new Fraction(8).log2()).toBe(3);
            expect(new Fraction(1, 4).log2()).toBe(-2);
        });

        test('[EDGE] log2() of a ratio larger than any float', () => {
            expect(new Fraction(2n ** 2000n).log2()).toBe(2000);
        });

        test('[EDGE] log2() of a non-positive fraction → RangeError', () => {
            expect(() => new Fraction(0).log2()).toThrow(RangeError);
        });
    });
});

describe('integer helpers', () => {
    test('gcd()', () => {
        expect(gcd(12n, 18n)).toBe(6n);
        expect(gcd(-12n, 18n)).toBe(6n);
        expect(gcd(0n, 5n)).toBe(5n);
    });

    test('floorDiv() rounds toward negative infinity', () => {
        expect(floorDiv(7n, 2n)).toBe(3n);
        expect(floorDiv(-7n, 2n)).toBe(-4n);
        expect(floorDiv(-8n, 2n)).toBe(-4n);
    });

    test('log2BigInt()', () => {
        expect(log2BigInt(1n)).toBe(0);
        expect(log2BigInt(2n ** 1500n)).toBe(1500);
    });
});
