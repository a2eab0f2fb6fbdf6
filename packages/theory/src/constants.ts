/**
 * Musical constants shared by the pitch and interval modules.
 */

// ============================================================================
// SECTION 1: Cents
// ============================================================================

export const OCTAVE_IN_CENTS = 1200;

/** A 12-EDO fifth, the grid the western pitch classes sit on. */
export const EQUAL_TEMPERED_FIFTH_IN_CENTS = 700;

// ============================================================================
// SECTION 2: Pitch names
// ============================================================================

/**
 * Diatonic pitch names ordered by ascending fifths.
 * A step of +1 in this cycle is a just fifth (3/2) up.
 */
export const DIATONIC_PITCH_NAME_CYCLE_OF_FIFTHS = ['f', 'c', 'g', 'd', 'a', 'e', 'b'] as const;

export type DiatonicPitchName = typeof DIATONIC_PITCH_NAME_CYCLE_OF_FIFTHS[number];

/** Accidental characters appended to a diatonic pitch name. */
export const ACCIDENTAL = {
    SHARP: 's',
    FLAT: 'f',
} as const;

// ============================================================================
// SECTION 3: Reference frequency
// ============================================================================

/** Frequency of the 1/1 when no concert pitch is given (Hz). */
export const DEFAULT_CONCERT_PITCH_FREQUENCY = 440;
