import {
    PRIME_TABLE_LIMIT,
    factorInteger,
    firstPrimes,
    isProbablePrime,
    nthPrime,
    primeIndex,
} from '../primes';
import { ParseError } from '../errors';

describe('Prime table', () => {
    describe('nthPrime()', () => {
        test('Counts from zero', () => {
            expect(nthPrime(0)).toBe(2);
            expect(nthPrime(4)).toBe(11);
        });

        test('Grows the table on demand', () => {
            expect(nthPrime(999)).toBe(7919);
        });

        test('[EDGE] Negative index → RangeError', () => {
            expect(() => nthPrime(-1)).toThrow(RangeError);
        });
    });

    describe('firstPrimes()', () => {
        test('Returns the leading primes in order', () => {
            expect(firstPrimes(5)).toEqual([2, 3, 5, 7, 11]);
        });

        test('[EDGE] Zero count → empty list', () => {
            expect(firstPrimes(0)).toEqual([]);
        });
    });

    describe('primeIndex()', () => {
        test('Inverse of nthPrime()', () => {
            expect(primeIndex(2)).toBe(0);
            expect(primeIndex(5)).toBe(2);
            expect(primeIndex(7919)).toBe(999);
        });

        test('[EDGE] Composite or unit → ParseError', () => {
            expect(() => primeIndex(9)).toThrow(ParseError);
            expect(() => primeIndex(1)).toThrow(ParseError);
        });

        test('[EDGE] Beyond the table limit → ParseError', () => {
            expect(() => primeIndex(PRIME_TABLE_LIMIT + 1)).toThrow(ParseError);
        });
    });
});

describe('isProbablePrime()', () => {
    test('Small values', () => {
        expect(isProbablePrime(2n)).toBe(true);
        expect(isProbablePrime(1n)).toBe(false);
        expect(isProbablePrime(91n)).toBe(false);
    });

    test('Carmichael number is composite', () => {
        expect(isProbablePrime(561n)).toBe(false);
    });

    test('Large primes', () => {
        expect(isProbablePrime(1000000007n)).toBe(true);
        expect(isProbablePrime(2305843009213693951n)).toBe(true);
    });
});

describe('factorInteger()', () => {
    test('Small composite', () => {
        expect([...factorInteger(360n)]).toEqual([[2n, 3], [3n, 2], [5n, 1]]);
    });

    test('Factors above the trial division bound', () => {
        expect([...factorInteger(1009n * 1013n)]).toEqual([[1009n, 1], [1013n, 1]]);
    });

    test('Product of two large primes, ascending', () => {
        expect([...factorInteger(1000000007n * 998244353n)]).toEqual([
            [998244353n, 1],
            [1000000007n, 1],
        ]);
    });

    test('[EDGE] One has no factors', () => {
        expect(factorInteger(1n).size).toBe(0);
    });

    test('[EDGE] Non-positive → ParseError', () => {
        expect(() => factorInteger(0n)).toThrow(ParseError);
    });
});
