import {
    Fraction,
    ParseError,
    firstPrimes,
    fractionToExponentVector,
    normalizeExponentVector,
    subtract,
    type ExponentVector,
} from '@intonal/rational';
import { CommaCompound, type PrimeCommaTable } from './commas';
import { getConfiguration } from './configurations';
import {
    ACCIDENTAL,
    DIATONIC_PITCH_NAME_CYCLE_OF_FIFTHS,
    EQUAL_TEMPERED_FIFTH_IN_CENTS,
    type DiatonicPitchName,
} from './constants';
import { ratioToCents } from './conversions';
import { createLogger } from './log';

/**
 * Pythagorean approximation of just intervals and the comma model of the
 * Helmholtz-Ellis notation. A just interval is read as a pythagorean
 * interval (powers of 2 and 3 only) altered by one comma per step of each
 * higher prime.
 */

const log = createLogger('Pythagorean');

const JUST_FIFTH = new Fraction(3, 2);

function defaultTable(): PrimeCommaTable {
    return getConfiguration().primeCommaTable;
}

function floorMod(n: number, modulus: number): number {
    return ((n % modulus) + modulus) % modulus;
}

// ============================================================================
// SECTION 1: Commas
// ============================================================================

/**
 * Commas needed to reach `exponents` from its pythagorean neighbour:
 * one entry per prime above 3 with a non-zero exponent.
 *
 * @throws UnknownCommaError if the table lacks one of those primes
 */
export function helmholtzEllisCommas(
    exponents: readonly number[],
    table: PrimeCommaTable = defaultTable()
): CommaCompound {
    const primes = firstPrimes(exponents.length);
    const primeToExponent = new Map<number, number>();
    exponents.forEach((exponent, i) => {
        if (i >= 2 && exponent !== 0) {
            primeToExponent.set(primes[i], exponent);
        }
    });
    return new CommaCompound(primeToExponent, table);
}

/**
 * The interval with every comma removed, folded into the octave.
 *
 * @example
 * closestPythagoreanInterval([-2, 0, 1]) // [-6, 4] (5/4 → 81/64)
 */
export function closestPythagoreanInterval(
    exponents: readonly number[],
    table: PrimeCommaTable = defaultTable()
): ExponentVector {
    const commas = helmholtzEllisCommas(exponents, table);
    if (commas.size === 0) {
        return normalizeExponentVector(exponents);
    }
    return normalizeExponentVector(subtract(exponents, fractionToExponentVector(commas.ratio)));
}

function fifthsOf(pythagorean: readonly number[]): number {
    return pythagorean.length >= 2 ? pythagorean[1] : 0;
}

/**
 * Cents between the interval and the 12-EDO pitch class of its closest
 * pythagorean neighbour.
 *
 * @example
 * Math.round(centDeviationFromClosestWesternPitchClass([-2, 0, 1])) // -14
 */
export function centDeviationFromClosestWesternPitchClass(
    exponents: readonly number[],
    table: PrimeCommaTable = defaultTable()
): number {
    const commaDeviation = ratioToCents(helmholtzEllisCommas(exponents, table).ratio);
    const fifths = fifthsOf(closestPythagoreanInterval(exponents, table));
    const pythagoreanDeviation = fifths * (ratioToCents(JUST_FIFTH) - EQUAL_TEMPERED_FIFTH_IN_CENTS);
    return commaDeviation + pythagoreanDeviation;
}

// ============================================================================
// SECTION 2: Accidentals
// ============================================================================

/**
 * Net sharps minus flats. Characters other than `s` and `f` are skipped
 * with a warning.
 */
export function countAccidentals(accidentals: string): number {
    let count = 0;
    for (const accidental of accidentals) {
        if (accidental === ACCIDENTAL.SHARP) {
            count++;
        } else if (accidental === ACCIDENTAL.FLAT) {
            count--;
        } else {
            log.warn(`Found unknown accidental '${accidental}' which will be ignored`);
        }
    }
    return count;
}

/**
 * @example
 * accidentalsFor(2)  // 'ss'
 * accidentalsFor(-1) // 'f'
 */
export function accidentalsFor(count: number): string {
    const accidental = count < 0 ? ACCIDENTAL.FLAT : ACCIDENTAL.SHARP;
    return accidental.repeat(Math.abs(count));
}

function isDiatonicPitchName(name: string): name is DiatonicPitchName {
    return DIATONIC_PITCH_NAME_CYCLE_OF_FIFTHS.some((candidate) => candidate === name);
}

// ============================================================================
// SECTION 3: Pitch names
// ============================================================================

/**
 * Name of the closest pythagorean pitch when 1/1 is called `reference`.
 *
 * @throws ParseError if `reference` does not start with a diatonic pitch name
 *
 * @example
 * closestPythagoreanPitchName([-2, 0, 0, 1], 'c') // 'bf'
 * closestPythagoreanPitchName([-2, 0, 1], 'a')    // 'cs'
 */
export function closestPythagoreanPitchName(
    exponents: readonly number[],
    reference = 'a',
    table: PrimeCommaTable = defaultTable()
): string {
    const diatonicName = reference.charAt(0);
    if (!isDiatonicPitchName(diatonicName)) {
        throw new ParseError(`Reference "${reference}" does not start with a diatonic pitch name`, reference);
    }
    const referenceAccidentals = countAccidentals(reference.slice(1));
    const position = DIATONIC_PITCH_NAME_CYCLE_OF_FIFTHS.indexOf(diatonicName);
    const fifths = fifthsOf(closestPythagoreanInterval(exponents, table));
    const cycleLength = DIATONIC_PITCH_NAME_CYCLE_OF_FIFTHS.length;

    const name = DIATONIC_PITCH_NAME_CYCLE_OF_FIFTHS[(position + floorMod(fifths, cycleLength)) % cycleLength];
    const accidentals = Math.floor((position + fifths) / cycleLength) + referenceAccidentals;
    return name + accidentalsFor(accidentals);
}
