import type { Fraction } from '@intonal/rational';

/**
 * Structural contracts shared by every pitch and interval type.
 * Any object with a `frequency` is a Pitch; any object with an `interval`
 * in cents is a PitchInterval.
 */

/** Anything that sounds at a definite frequency (Hz). */
export interface Pitch {
    readonly frequency: number;
}

/** Anything that measures a distance in cents. */
export interface PitchInterval {
    readonly interval: number;
}

/**
 * Input accepted by the JustIntonationPitch constructor.
 * Build one with the static helpers rather than by hand where possible.
 */
export type PitchSource =
    | { readonly kind: 'ratio'; readonly ratio: string }
    | { readonly kind: 'fraction'; readonly fraction: Fraction }
    | { readonly kind: 'exponents'; readonly exponents: Iterable<number> };

/** A reference frequency in Hz, or a pitch whose frequency is used. */
export type ConcertPitch = number | Pitch;

export function isPitch(value: unknown): value is Pitch {
    return typeof value === 'object' && value !== null && 'frequency' in value && typeof value.frequency === 'number';
}

export function isPitchInterval(value: unknown): value is PitchInterval {
    return typeof value === 'object' && value !== null && 'interval' in value && typeof value.interval === 'number';
}
