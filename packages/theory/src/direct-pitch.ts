import { centsToFactor, hertzToCents } from './conversions';
import { DirectPitchInterval } from './pitch-interval';
import type { Pitch, PitchInterval } from './types';

/** A pitch given by its frequency in Hz. */
export class DirectPitch implements Pitch {
    constructor(readonly frequency: number) {
        if (!Number.isFinite(frequency) || frequency <= 0) {
            throw new RangeError(`Frequency must be a positive number of Hz, got ${frequency}`);
        }
    }

    add(interval: PitchInterval): DirectPitch {
        return new DirectPitch(this.frequency * centsToFactor(interval.interval));
    }

    subtract(interval: PitchInterval): DirectPitch {
        return new DirectPitch(this.frequency / centsToFactor(interval.interval));
    }

    /** Interval from this pitch up to `other`. */
    getPitchInterval(other: Pitch): DirectPitchInterval {
        return new DirectPitchInterval(hertzToCents(this.frequency, other.frequency));
    }

    equals(other: Pitch): boolean {
        return this.frequency === other.frequency;
    }

    toString(): string {
        return `DirectPitch(${this.frequency} Hz)`;
    }
}
