import type { ExponentVector } from '@intonal/rational';
import { JustIntonationPitch } from './just-intonation-pitch';
import type { ConcertPitch, PitchSource } from './types';

/**
 * Harmonic spectra: partials and the pitches two spectra share.
 */

/**
 * One partial of a harmonic spectrum. Index 1 is the fundamental;
 * `tonality` false selects the (theoretical) undertone series.
 */
export class HarmonicPartial {
    constructor(
        readonly index: number,
        readonly tonality = true
    ) {
        if (!Number.isInteger(index) || index < 1) {
            throw new RangeError(`Partial index must be a positive integer, got ${index}`);
        }
    }

    /** `index/1` for overtones, `1/index` for undertones. */
    get interval(): JustIntonationPitch {
        const ratio = this.tonality ? `${this.index}/1` : `1/${this.index}`;
        return JustIntonationPitch.fromRatio(ratio);
    }

    toString(): string {
        return `HarmonicPartial(${this.index}, ${this.tonality})`;
    }
}

/** A pitch together with the partials of the spectra it is common to. */
export class CommonHarmonic extends JustIntonationPitch {
    readonly partials: readonly HarmonicPartial[];

    constructor(partials: readonly HarmonicPartial[], source?: PitchSource, concertPitch?: ConcertPitch) {
        super(source, concertPitch);
        this.partials = [...partials];
    }

    protected override withExponents(exponents: ExponentVector): CommonHarmonic {
        return new CommonHarmonic(this.partials, { kind: 'exponents', exponents }, this.concertPitch);
    }

    override toString(): string {
        return `CommonHarmonic(${this.ratio.toString()}, [${this.partials.join(', ')}])`;
    }
}

export interface CommonHarmonicOptions {
    /** true: overtones of both, false: undertones of both, null: overtones against undertones. */
    readonly tonality: boolean | null;
    readonly lowestPartial: number;
    /** Exclusive. */
    readonly highestPartial: number;
}

function spectrum(
    pitch: JustIntonationPitch,
    tonality: boolean,
    { lowestPartial, highestPartial }: CommonHarmonicOptions
): [HarmonicPartial, JustIntonationPitch][] {
    const partials: [HarmonicPartial, JustIntonationPitch][] = [];
    for (let index = lowestPartial; index < highestPartial; index++) {
        const partial = new HarmonicPartial(index, tonality);
        partials.push([partial, pitch.add(partial.interval)]);
    }
    return partials;
}

/**
 * Pitches that occur in the spectra of both pitches, in ascending partial
 * order of the first.
 *
 * @example
 * findCommonHarmonics(
 *     [JustIntonationPitch.fromRatio('7/4'), new JustIntonationPitch()],
 *     { tonality: true, lowestPartial: 1, highestPartial: 16 }
 * ).map(String) // ['CommonHarmonic(7/1, ...)', 'CommonHarmonic(14/1, ...)']
 */
export function findCommonHarmonics(
    pair: readonly [JustIntonationPitch, JustIntonationPitch],
    options: CommonHarmonicOptions
): CommonHarmonic[] {
    const [first, second] = pair;
    const [firstTonality, secondTonality] =
        options.tonality === null ? [true, false] : [options.tonality, options.tonality];
    const secondSpectrum = spectrum(second, secondTonality, options);

    const common: CommonHarmonic[] = [];
    for (const [partial, pitch] of spectrum(first, firstTonality, options)) {
        const match = secondSpectrum.find(([, candidate]) => candidate.equals(pitch));
        if (match !== undefined) {
            common.push(
                new CommonHarmonic(
                    [partial, match[0]],
                    { kind: 'exponents', exponents: pitch.exponentVector },
                    first.concertPitch
                )
            );
        }
    }
    return common;
}
