import type { PitchInterval } from './types';

/** An interval given directly in cents. */
export class DirectPitchInterval implements PitchInterval {
    constructor(readonly interval: number) {
        if (!Number.isFinite(interval)) {
            throw new RangeError(`Interval must be a finite number of cents, got ${interval}`);
        }
    }

    inverse(): DirectPitchInterval {
        return new DirectPitchInterval(-this.interval);
    }

    add(other: PitchInterval): DirectPitchInterval {
        return new DirectPitchInterval(this.interval + other.interval);
    }

    subtract(other: PitchInterval): DirectPitchInterval {
        return new DirectPitchInterval(this.interval - other.interval);
    }

    equals(other: PitchInterval): boolean {
        return this.interval === other.interval;
    }

    toString(): string {
        return `DirectPitchInterval(${this.interval} ct)`;
    }
}
