// =============================================================================
// Intonal - Just Intonation Theory
// =============================================================================
// Just-intonation pitches, harmonicity metrics and the Helmholtz-Ellis comma
// model, built on @intonal/rational.

// Contracts
export type { Pitch, PitchInterval, PitchSource, ConcertPitch } from './types';
export { isPitch, isPitchInterval } from './types';

// Constants
export {
    OCTAVE_IN_CENTS,
    EQUAL_TEMPERED_FIFTH_IN_CENTS,
    DIATONIC_PITCH_NAME_CYCLE_OF_FIFTHS,
    ACCIDENTAL,
    DEFAULT_CONCERT_PITCH_FREQUENCY,
} from './constants';
export type { DiatonicPitchName } from './constants';

// Errors
export {
    ParseError,
    isParseError,
    UnsupportedTypeError,
    isUnsupportedTypeError,
    RegisterResolutionError,
    isRegisterResolutionError,
    UnknownCommaError,
    isUnknownCommaError,
} from './errors';

// Configuration & logging
export {
    DEFAULT_CONFIGURATION,
    DEFAULT_PRIME_COMMA_TABLE,
    getConfiguration,
    configure,
    resetConfiguration,
    configurationFromEnv,
    PitchConfigurationSchema,
    EnvironmentSchema,
} from './configurations';
export type { PitchConfiguration } from './configurations';
export { createLogger } from './log';
export type { Logger } from './log';

// Conversions
export { ratioToCents, hertzToCents, centsToFactor, centsToRatio } from './conversions';

// Pitches & intervals
export { DirectPitch } from './direct-pitch';
export { DirectPitchInterval } from './pitch-interval';
export { JustIntonationPitch, parsePitchSource, pickClosestCandidate } from './just-intonation-pitch';

// Commas & pythagorean approximation
export { Comma, CommaCompound } from './commas';
export type { PrimeCommaTable } from './commas';
export {
    helmholtzEllisCommas,
    closestPythagoreanInterval,
    centDeviationFromClosestWesternPitchClass,
    closestPythagoreanPitchName,
    countAccidentals,
    accidentalsFor,
} from './pythagorean';

// Harmonicity
export {
    indigestibility,
    indigestibilityOfFactorised,
    harmonicityBarlow,
    harmonicitySimplifiedBarlow,
    harmonicityEuler,
    harmonicityTenney,
    harmonicityVogel,
    harmonicityWilson,
} from './harmonicity';

// Spectra
export { HarmonicPartial, CommonHarmonic, findCommonHarmonics } from './spectrals';
export type { CommonHarmonicOptions } from './spectrals';
