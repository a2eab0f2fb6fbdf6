import {
    Fraction,
    add,
    asExponentVector,
    exponentVectorToFraction,
    factorInteger,
    factorise,
    factoriseNumeratorAndDenominator,
    firstPrimes,
    fractionToExponentVector,
    negate,
    normalizeExponentVector,
    pad,
    ratioToExponentVector,
    subtract,
    vectorsEqual,
    type ExponentVector,
    type Integer,
} from '@intonal/rational';
import type { CommaCompound, PrimeCommaTable } from './commas';
import { getConfiguration } from './configurations';
import { OCTAVE_IN_CENTS } from './constants';
import { centsToRatio, hertzToCents, ratioToCents } from './conversions';
import { DirectPitch } from './direct-pitch';
import { RegisterResolutionError, UnsupportedTypeError } from './errors';
import {
    harmonicityBarlow,
    harmonicityEuler,
    harmonicitySimplifiedBarlow,
    harmonicityTenney,
    harmonicityVogel,
    harmonicityWilson,
} from './harmonicity';
import { createLogger } from './log';
import { DirectPitchInterval } from './pitch-interval';
import {
    centDeviationFromClosestWesternPitchClass,
    closestPythagoreanInterval,
    closestPythagoreanPitchName,
    helmholtzEllisCommas,
} from './pythagorean';
import { isPitchInterval, isPitch, type ConcertPitch, type Pitch, type PitchInterval, type PitchSource } from './types';

const log = createLogger('JustIntonationPitch');

// ============================================================================
// SECTION 1: Construction
// ============================================================================

/**
 * Canonical exponent vector of a pitch source.
 *
 * @throws ParseError for malformed ratios or non-integer exponents
 * @throws UnsupportedTypeError for an unknown source kind
 */
export function parsePitchSource(source: PitchSource): ExponentVector {
    switch (source.kind) {
        case 'ratio':
            return ratioToExponentVector(source.ratio);
        case 'fraction':
            return fractionToExponentVector(source.fraction);
        case 'exponents':
            return asExponentVector(source.exponents);
        default: {
            const unsupported: never = source;
            throw new UnsupportedTypeError(unsupported);
        }
    }
}

function toPitch(concertPitch: ConcertPitch): Pitch {
    return typeof concertPitch === 'number' ? new DirectPitch(concertPitch) : concertPitch;
}

// ============================================================================
// SECTION 2: Pure operations on exponent vectors
// ============================================================================

function addInterval(exponents: ExponentVector, interval: PitchInterval): ExponentVector {
    if (interval instanceof JustIntonationPitch) {
        return add(exponents, interval.exponentVector);
    }
    const factor = centsToRatio(interval.interval);
    log.debug(`Approximating ${interval.interval} ct by ${factor.toString()}`);
    return fractionToExponentVector(exponentVectorToFraction(exponents).mul(factor));
}

function subtractInterval(exponents: ExponentVector, interval: PitchInterval): ExponentVector {
    if (interval instanceof JustIntonationPitch) {
        return subtract(exponents, interval.exponentVector);
    }
    return addInterval(exponents, new DirectPitchInterval(-interval.interval));
}

function registerExponents(exponents: readonly number[], octave: number): ExponentVector {
    if (!Number.isInteger(octave)) {
        throw new RangeError(`Octave must be an integer, got ${octave}`);
    }
    return add(normalizeExponentVector(exponents), [octave]);
}

/**
 * Index of the smallest finite distance. Only a strictly smaller distance
 * replaces the current best, so ties keep the earliest candidate.
 *
 * @example
 * pickClosestCandidate([5, 5, 7]) // 0
 * pickClosestCandidate([NaN])     // undefined
 */
export function pickClosestCandidate(distances: readonly number[]): number | undefined {
    let best: number | undefined;
    distances.forEach((distance, i) => {
        if (Number.isFinite(distance) && (best === undefined || distance < distances[best])) {
            best = i;
        }
    });
    return best;
}

function closestRegisterExponents(exponents: ExponentVector, reference: PitchInterval): ExponentVector {
    const referenceOctave = Math.floor(reference.interval / OCTAVE_IN_CENTS);
    const candidates = [-1, 0, 1].map((offset) => registerExponents(exponents, referenceOctave + offset));
    const distances = candidates.map((candidate) =>
        Math.abs(ratioToCents(exponentVectorToFraction(candidate)) - reference.interval)
    );
    const best = pickClosestCandidate(distances);
    if (best === undefined) {
        throw new RegisterResolutionError(exponentVectorToFraction(exponents).toString(), `${reference.interval} ct`);
    }
    return candidates[best];
}

function inverseExponents(exponents: ExponentVector, axis?: JustIntonationPitch): ExponentVector {
    if (axis === undefined) {
        return negate(exponents);
    }
    return subtract(axis.exponentVector, subtract(exponents, axis.exponentVector));
}

function intersectExponents(a: readonly number[], b: readonly number[], strict: boolean): ExponentVector {
    const [left, right] = pad(a, b);
    return asExponentVector(
        left.map((e0, i) => {
            const e1 = right[i];
            if (e0 === 0 || e1 === 0) {
                return 0;
            }
            if (strict) {
                return e0 === e1 ? e0 : 0;
            }
            if (e0 < 0 && e1 < 0) {
                return Math.max(e0, e1);
            }
            if (e0 > 0 && e1 > 0) {
                return Math.min(e0, e1);
            }
            return 0;
        })
    );
}

// ============================================================================
// SECTION 3: JustIntonationPitch
// ============================================================================

/**
 * A pitch defined by a frequency ratio to a concert pitch, stored as its
 * prime exponent vector.
 *
 * Every transformation comes in two forms: `op()` returns a new pitch and
 * leaves the receiver untouched, `opInPlace()` rewrites the receiver and
 * returns it.
 *
 * @example
 * const fifth = JustIntonationPitch.fromRatio('3/2');
 * fifth.add(JustIntonationPitch.fromRatio('5/4')).ratio.toString() // '15/8'
 * fifth.frequency // 660
 */
export class JustIntonationPitch implements Pitch, PitchInterval {
    readonly concertPitch: Pitch;
    private exponents: ExponentVector;

    constructor(source: PitchSource = { kind: 'ratio', ratio: '1/1' }, concertPitch?: ConcertPitch) {
        this.exponents = parsePitchSource(source);
        this.concertPitch = toPitch(concertPitch ?? getConfiguration().concertPitch);
    }

    static fromRatio(ratio: string, concertPitch?: ConcertPitch): JustIntonationPitch {
        return new JustIntonationPitch({ kind: 'ratio', ratio }, concertPitch);
    }

    static fromFraction(fraction: Fraction, concertPitch?: ConcertPitch): JustIntonationPitch {
        return new JustIntonationPitch({ kind: 'fraction', fraction }, concertPitch);
    }

    static fromExponents(exponents: Iterable<number>, concertPitch?: ConcertPitch): JustIntonationPitch {
        return new JustIntonationPitch({ kind: 'exponents', exponents }, concertPitch);
    }

    /** Copy of this pitch carrying `exponents`. Subclasses keep their own data. */
    protected withExponents(exponents: ExponentVector): JustIntonationPitch {
        return new JustIntonationPitch({ kind: 'exponents', exponents }, this.concertPitch);
    }

    // ------------------------------------------------------------------------
    // Derived values
    // ------------------------------------------------------------------------

    get exponentVector(): ExponentVector {
        return this.exponents;
    }

    /** Primes 2, 3, 5, ... up to the length of the exponent vector. */
    get primes(): readonly number[] {
        return firstPrimes(this.exponents.length);
    }

    /** Primes with a non-zero exponent. */
    get occupiedPrimes(): number[] {
        const primes = this.primes;
        return primes.filter((_, i) => this.exponents[i] !== 0);
    }

    get ratio(): Fraction {
        return exponentVectorToFraction(this.exponents);
    }

    get numerator(): bigint {
        return this.ratio.numerator;
    }

    get denominator(): bigint {
        return this.ratio.denominator;
    }

    get frequency(): number {
        return this.ratio.toNumber() * this.concertPitch.frequency;
    }

    /** Size in cents. */
    get interval(): number {
        return ratioToCents(this.ratio);
    }

    /** 0 for [1/1, 2/1), negative below, positive above. */
    get octave(): number {
        return Math.floor(this.interval / OCTAVE_IN_CENTS);
    }

    /**
     * `true` for otonal, `false` for utonal pitches. Utonal when no exponent
     * is positive while some are negative, or when the lowest exponent is
     * negative and first occurs after the highest.
     */
    get tonality(): boolean {
        if (this.exponents.length === 0) {
            return true;
        }
        const maxima = Math.max(...this.exponents);
        const minima = Math.min(...this.exponents);
        if (maxima <= 0 && minima < 0) {
            return false;
        }
        return !(minima < 0 && this.exponents.indexOf(minima) > this.exponents.indexOf(maxima));
    }

    /**
     * Harmonic number when the pitch lies in the harmonic series of 1/1
     * (positive), in its subharmonic series (negative), else 0.
     */
    get harmonic(): number {
        const { numerator, denominator } = this.ratio;
        if (denominator % 2n === 0n) {
            return Number(numerator);
        }
        if (numerator % 2n === 0n) {
            return -Number(denominator);
        }
        return numerator === 1n && denominator === 1n ? 1 : 0;
    }

    get factorised(): number[] {
        return factorise(this.exponents);
    }

    get factorisedNumeratorAndDenominator(): [number[], number[]] {
        return factoriseNumeratorAndDenominator(this.exponents);
    }

    /** Distinct primes of numerator and denominator. */
    get primesForNumeratorAndDenominator(): [number[], number[]] {
        const primesOf = (n: bigint) => [...factorInteger(n).keys()].map(Number);
        const { numerator, denominator } = this.ratio;
        return [primesOf(numerator), primesOf(denominator)];
    }

    /**
     * For numerator and denominator: how many primes occur once, twice, ...
     * Primes listed in `ignore` are left out.
     *
     * @example
     * JustIntonationPitch.fromRatio('45/4').blueprint() // [[1, 1], []]
     */
    blueprint(ignore: readonly Integer[] = [2]): [number[], number[]] {
        const ignored = new Set(ignore.map(Number));
        const shape = (factors: readonly number[]): number[] => {
            const perPrime = new Map<number, number>();
            for (const factor of factors) {
                if (!ignored.has(factor)) {
                    perPrime.set(factor, (perPrime.get(factor) ?? 0) + 1);
                }
            }
            const perMultiplicity = new Map<number, number>();
            for (const multiplicity of perPrime.values()) {
                perMultiplicity.set(multiplicity, (perMultiplicity.get(multiplicity) ?? 0) + 1);
            }
            const maxima = Math.max(0, ...perMultiplicity.keys());
            return Array.from({ length: maxima }, (_, i) => perMultiplicity.get(i + 1) ?? 0);
        };
        const [numerator, denominator] = this.factorisedNumeratorAndDenominator;
        return [shape(numerator), shape(denominator)];
    }

    // ------------------------------------------------------------------------
    // Harmonicity
    // ------------------------------------------------------------------------

    get harmonicityBarlow(): number {
        return harmonicityBarlow(this.exponents);
    }

    get harmonicitySimplifiedBarlow(): number {
        return harmonicitySimplifiedBarlow(this.exponents);
    }

    get harmonicityEuler(): number {
        return harmonicityEuler(this.exponents);
    }

    get harmonicityTenney(): number {
        return harmonicityTenney(this.exponents);
    }

    get harmonicityVogel(): number {
        return harmonicityVogel(this.exponents);
    }

    get harmonicityWilson(): number {
        return harmonicityWilson(this.exponents);
    }

    // ------------------------------------------------------------------------
    // Pythagorean approximation
    // ------------------------------------------------------------------------

    helmholtzEllisCommas(table?: PrimeCommaTable): CommaCompound {
        return helmholtzEllisCommas(this.exponents, table);
    }

    closestPythagoreanInterval(table?: PrimeCommaTable): JustIntonationPitch {
        return new JustIntonationPitch(
            { kind: 'exponents', exponents: closestPythagoreanInterval(this.exponents, table) },
            this.concertPitch
        );
    }

    centDeviationFromClosestWesternPitchClass(table?: PrimeCommaTable): number {
        return centDeviationFromClosestWesternPitchClass(this.exponents, table);
    }

    getClosestPythagoreanPitchName(reference = 'a', table?: PrimeCommaTable): string {
        return closestPythagoreanPitchName(this.exponents, reference, table);
    }

    // ------------------------------------------------------------------------
    // Transformations
    // ------------------------------------------------------------------------

    /**
     * Transpose by `interval`. Other interval types are added through a
     * rational approximation of their cents.
     */
    add(interval: PitchInterval): JustIntonationPitch {
        return this.withExponents(addInterval(this.exponents, interval));
    }

    addInPlace(interval: PitchInterval): this {
        this.exponents = addInterval(this.exponents, interval);
        return this;
    }

    subtract(interval: PitchInterval): JustIntonationPitch {
        return this.withExponents(subtractInterval(this.exponents, interval));
    }

    subtractInPlace(interval: PitchInterval): this {
        this.exponents = subtractInterval(this.exponents, interval);
        return this;
    }

    /** Fold into `[1, period)`. */
    normalize(period: Integer = 2): JustIntonationPitch {
        return this.withExponents(normalizeExponentVector(this.exponents, period));
    }

    normalizeInPlace(period: Integer = 2): this {
        this.exponents = normalizeExponentVector(this.exponents, period);
        return this;
    }

    /**
     * Move into the given octave: 0 is `[1/1, 2/1)`, negative octaves lie
     * below, positive ones above.
     *
     * @example
     * JustIntonationPitch.fromRatio('5/3').register(-2).ratio.toString() // '5/12'
     */
    register(octave: number): JustIntonationPitch {
        return this.withExponents(registerExponents(this.exponents, octave));
    }

    registerInPlace(octave: number): this {
        this.exponents = registerExponents(this.exponents, octave);
        return this;
    }

    /**
     * Octave transposition closest in cents to `reference`, searched in the
     * reference's octave and its two neighbours. Ties go to the lower octave.
     *
     * @throws RegisterResolutionError if no candidate has a finite distance
     */
    moveToClosestRegister(reference: PitchInterval): JustIntonationPitch {
        return this.withExponents(closestRegisterExponents(this.exponents, reference));
    }

    moveToClosestRegisterInPlace(reference: PitchInterval): this {
        this.exponents = closestRegisterExponents(this.exponents, reference);
        return this;
    }

    /** Mirror around 1/1, or around `axis` when given. */
    inverse(axis?: JustIntonationPitch): JustIntonationPitch {
        return this.withExponents(inverseExponents(this.exponents, axis));
    }

    inverseInPlace(axis?: JustIntonationPitch): this {
        this.exponents = inverseExponents(this.exponents, axis);
        return this;
    }

    /**
     * Shared prime content of two pitches. Exponents of differing sign
     * cancel; otherwise the smaller magnitude is kept. `strict` keeps only
     * exponents that are identical in both.
     *
     * @example
     * JustIntonationPitch.fromRatio('15/8')
     *     .intersection(JustIntonationPitch.fromRatio('21/16'))
     *     .ratio.toString() // '3/8'
     */
    intersection(other: JustIntonationPitch, strict = false): JustIntonationPitch {
        return this.withExponents(intersectExponents(this.exponents, other.exponentVector, strict));
    }

    intersectionInPlace(other: JustIntonationPitch, strict = false): this {
        this.exponents = intersectExponents(this.exponents, other.exponentVector, strict);
        return this;
    }

    /** The pitch itself when above 1/1, else its inverse. */
    absolute(): JustIntonationPitch {
        const { numerator, denominator } = this.ratio;
        return numerator > denominator ? this.clone() : this.inverse();
    }

    clone(): JustIntonationPitch {
        return this.withExponents(this.exponents);
    }

    // ------------------------------------------------------------------------
    // Comparison
    // ------------------------------------------------------------------------

    /** Interval from this pitch up to `other`. */
    getPitchInterval(other: Pitch): PitchInterval {
        if (other instanceof JustIntonationPitch) {
            return other.subtract(this);
        }
        return new DirectPitchInterval(hertzToCents(this.frequency, other.frequency));
    }

    /**
     * Against another JustIntonationPitch the exponent vectors are compared,
     * against other intervals the cents, against other pitches the frequency.
     */
    equals(other: unknown): boolean {
        if (other instanceof JustIntonationPitch) {
            return vectorsEqual(this.exponents, other.exponentVector);
        }
        if (isPitchInterval(other)) {
            return this.interval === other.interval;
        }
        if (isPitch(other)) {
            return this.frequency === other.frequency;
        }
        return false;
    }

    /** By cents against intervals, by frequency against other pitches. */
    compare(other: Pitch | PitchInterval): -1 | 0 | 1 {
        const [mine, theirs] =
            'interval' in other ? [this.interval, other.interval] : [this.frequency, other.frequency];
        return mine < theirs ? -1 : mine > theirs ? 1 : 0;
    }

    isLessThan(other: Pitch | PitchInterval): boolean {
        return this.compare(other) < 0;
    }

    isGreaterThan(other: Pitch | PitchInterval): boolean {
        return this.compare(other) > 0;
    }

    toNumber(): number {
        return this.ratio.toNumber();
    }

    toString(): string {
        return this.ratio.toString();
    }
}
