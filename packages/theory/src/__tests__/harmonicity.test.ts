import {
    harmonicityBarlow,
    harmonicityEuler,
    harmonicitySimplifiedBarlow,
    harmonicityTenney,
    harmonicityVogel,
    harmonicityWilson,
    indigestibility,
    indigestibilityOfFactorised,
} from '../harmonicity';
import { JustIntonationPitch } from '../just-intonation-pitch';

const FIFTH = [-1, 1];
const UNISON: number[] = [];
const MAJOR_THIRD = [-2, 0, 1];
const MINOR_SIXTH = [3, 0, -1];

describe('Harmonicity', () => {
    describe('indigestibility()', () => {
        test.each([
            [1, 0],
            [2, 1],
            [3, 2.6666666666666665],
            [4, 2],
            [5, 6.4],
            [6, 3.6666666666666665],
            [8, 3],
        ])('indigestibility(%d) → %d', (n, expected) => {
            expect(indigestibility(n)).toBe(expected);
        });

        test('Accepts bigint input', () => {
            expect(indigestibility(8n)).toBe(3);
        });

        test('indigestibilityOfFactorised() of the unison factor list', () => {
            expect(indigestibilityOfFactorised([1])).toBe(0);
        });
    });

    describe('harmonicityBarlow()', () => {
        test('Reference values', () => {
            expect(harmonicityBarlow(FIFTH)).toBe(0.27272727272727276);
            expect(harmonicityBarlow(UNISON)).toBe(Infinity);
            expect(harmonicityBarlow(MAJOR_THIRD)).toBe(0.11904761904761904);
            expect(harmonicityBarlow(MINOR_SIXTH)).toBe(-0.10638297872340426);
        });

        test('Simplified variant is unsigned with 1/1 → 1', () => {
            expect(harmonicitySimplifiedBarlow(MINOR_SIXTH)).toBe(0.10638297872340426);
            expect(harmonicitySimplifiedBarlow(UNISON)).toBe(1);
        });
    });

    describe('integer measures', () => {
        test('harmonicityEuler()', () => {
            expect([FIFTH, UNISON, MAJOR_THIRD, MINOR_SIXTH].map(harmonicityEuler)).toEqual([4, 1, 7, 8]);
        });

        test('harmonicityVogel()', () => {
            expect([FIFTH, UNISON, MAJOR_THIRD, MINOR_SIXTH].map(harmonicityVogel)).toEqual([4, 1, 7, 8]);
        });

        test('harmonicityWilson()', () => {
            expect([FIFTH, UNISON, MAJOR_THIRD, MINOR_SIXTH].map(harmonicityWilson)).toEqual([3, 1, 5, 5]);
        });
    });

    describe('harmonicityTenney()', () => {
        test('log2 of numerator times denominator', () => {
            expect(harmonicityTenney(FIFTH)).toBe(Math.log2(6));
            expect(harmonicityTenney(UNISON)).toBe(0);
            expect(harmonicityTenney([0, 1])).toBeCloseTo(1.5849625007211563, 12);
        });

        test('[EDGE] Inverse intervals score the same', () => {
            expect(harmonicityTenney([0, 0, 1])).toBe(harmonicityTenney([0, 0, -1]));
        });
    });

    describe('pitch getters', () => {
        test('Delegate to the exponent vector functions', () => {
            const third = JustIntonationPitch.fromRatio('5/4');
            expect(third.harmonicityBarlow).toBe(0.11904761904761904);
            expect(third.harmonicitySimplifiedBarlow).toBe(0.11904761904761904);
            expect(third.harmonicityEuler).toBe(7);
            expect(third.harmonicityTenney).toBe(Math.log2(20));
            expect(third.harmonicityVogel).toBe(7);
            expect(third.harmonicityWilson).toBe(5);
        });
    });
});
