import { Fraction } from '@intonal/rational';
import { DirectPitch } from '../direct-pitch';
import { DirectPitchInterval } from '../pitch-interval';
import { centsToFactor, centsToRatio, hertzToCents, ratioToCents } from '../conversions';

describe('DirectPitch', () => {
    test('add() / subtract() scale the frequency', () => {
        const a = new DirectPitch(440);
        expect(a.add(new DirectPitchInterval(1200)).frequency).toBe(880);
        expect(a.subtract(new DirectPitchInterval(1200)).frequency).toBe(220);
    });

    test('getPitchInterval()', () => {
        expect(new DirectPitch(440).getPitchInterval(new DirectPitch(880)).interval).toBe(1200);
        expect(new DirectPitch(880).getPitchInterval(new DirectPitch(440)).interval).toBe(-1200);
    });

    test('equals()', () => {
        expect(new DirectPitch(440).equals(new DirectPitch(440))).toBe(true);
        expect(new DirectPitch(440).equals(new DirectPitch(441))).toBe(false);
    });

    test('[EDGE] Non-positive frequency → RangeError', () => {
        expect(() => new DirectPitch(0)).toThrow(RangeError);
        expect(() => new DirectPitch(Number.NaN)).toThrow(RangeError);
    });
});

describe('DirectPitchInterval', () => {
    test('inverse() / add() / subtract()', () => {
        const fifth = new DirectPitchInterval(700);
        expect(fifth.inverse().interval).toBe(-700);
        expect(fifth.add(new DirectPitchInterval(500)).interval).toBe(1200);
        expect(fifth.subtract(new DirectPitchInterval(200)).interval).toBe(500);
        expect(fifth.equals(new DirectPitchInterval(700))).toBe(true);
    });

    test('[EDGE] Non-finite cents → RangeError', () => {
        expect(() => new DirectPitchInterval(Infinity)).toThrow(RangeError);
    });
});

describe('Conversions', () => {
    test('ratioToCents()', () => {
        expect(ratioToCents(new Fraction(2))).toBe(1200);
        expect(ratioToCents(new Fraction(1, 2))).toBe(-1200);
    });

    test('hertzToCents()', () => {
        expect(hertzToCents(440, 880)).toBe(1200);
    });

    test('centsToFactor()', () => {
        expect(centsToFactor(2400)).toBe(4);
    });

    test('centsToRatio()', () => {
        expect(centsToRatio(1200).toString()).toBe('2/1');
        expect(centsToRatio(701.955, 100).toString()).toBe('3/2');
    });

    test('centsToRatio() keeps whole octaves exact', () => {
        expect(centsToRatio(-18000).toString()).toBe('1/32768');
        expect(centsToRatio(2400 + 701.955, 100).toString()).toBe('6/1');
        expect(centsToRatio(-1200 + 701.955, 100).toString()).toBe('3/4');
    });

    test('[EDGE] centsToRatio() of non-finite cents → RangeError', () => {
        expect(() => centsToRatio(Infinity)).toThrow(RangeError);
    });
});
