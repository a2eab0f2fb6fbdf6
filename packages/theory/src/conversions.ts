import { Fraction, type Integer } from '@intonal/rational';
import { OCTAVE_IN_CENTS } from './constants';
import { getConfiguration } from './configurations';

export function ratioToCents(ratio: Fraction): number {
    return OCTAVE_IN_CENTS * ratio.log2();
}

/** Distance from `from` to `to` in cents; both in Hz. */
export function hertzToCents(from: number, to: number): number {
    return OCTAVE_IN_CENTS * Math.log2(to / from);
}

export function centsToFactor(cents: number): number {
    return 2 ** (cents / OCTAVE_IN_CENTS);
}

const OCTAVE = new Fraction(2);

/**
 * Rational approximation of a cent value. Whole octaves are kept exact;
 * only the remainder within the octave is approximated, with a denominator
 * of at most `maxDenominator`.
 *
 * @example
 * centsToRatio(1200).toString() // '2/1'
 * centsToRatio(701.955, 100).toString() // '3/2'
 * centsToRatio(-18000).toString() // '1/32768'
 */
export function centsToRatio(
    cents: number,
    maxDenominator: Integer = getConfiguration().centsRatioMaxDenominator
): Fraction {
    if (!Number.isFinite(cents)) {
        throw new RangeError(`Cannot approximate ${cents} ct by a ratio`);
    }
    const octaves = Math.floor(cents / OCTAVE_IN_CENTS);
    const remainder = cents - octaves * OCTAVE_IN_CENTS;
    return OCTAVE.pow(octaves).mul(Fraction.fromNumber(centsToFactor(remainder), maxDenominator));
}
