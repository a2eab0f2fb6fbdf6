import { Fraction } from '@intonal/rational';
import { z } from 'zod';
import { Comma, type PrimeCommaTable } from './commas';
import { DEFAULT_CONCERT_PITCH_FREQUENCY } from './constants';
import { createLogger, setDebugLogging } from './log';
import { isPitch, type Pitch } from './types';

/**
 * Process-wide defaults for pitch construction and comma lookup.
 * A host sets them once at start-up via configure().
 */

const log = createLogger('Configuration');

// ============================================================================
// SECTION 1: Helmholtz-Ellis commas
// ============================================================================

const HELMHOLTZ_ELLIS_COMMAS: readonly (readonly [number, number, number])[] = [
    [5, 80, 81],
    [7, 63, 64],
    [11, 33, 32],
    [13, 26, 27],
    [17, 2176, 2187],
    [19, 513, 512],
    [23, 736, 729],
    [29, 261, 256],
    [31, 31, 32],
    [37, 37, 36],
    [41, 82, 81],
    [43, 129, 128],
    [47, 752, 729],
];

/** One comma per prime 5..47, each with its prime in the numerator. */
export const DEFAULT_PRIME_COMMA_TABLE: PrimeCommaTable = new Map(
    HELMHOLTZ_ELLIS_COMMAS.map(([prime, numerator, denominator]) => [
        prime,
        new Comma(new Fraction(numerator, denominator), `${prime}-limit Helmholtz-Ellis comma`),
    ])
);

// ============================================================================
// SECTION 2: Configuration object
// ============================================================================

const FrequencySchema = z.number().finite().positive();

export const PitchConfigurationSchema = z.object({
    /** Frequency of 1/1 for pitches built without one. */
    concertPitch: z.union([
        FrequencySchema,
        z.custom<Pitch>(
            (value) => isPitch(value) && FrequencySchema.safeParse(value.frequency).success,
            'Concert pitch must have a positive finite frequency'
        ),
    ]),
    primeCommaTable: z.custom<PrimeCommaTable>((value) => value instanceof Map, 'Expected a prime → comma map'),
    /** Denominator bound for rational approximations of cent values. */
    centsRatioMaxDenominator: z.number().int().min(1),
    debug: z.boolean(),
});

export type PitchConfiguration = Readonly<z.infer<typeof PitchConfigurationSchema>>;

export const DEFAULT_CONFIGURATION: PitchConfiguration = Object.freeze({
    concertPitch: DEFAULT_CONCERT_PITCH_FREQUENCY,
    primeCommaTable: DEFAULT_PRIME_COMMA_TABLE,
    centsRatioMaxDenominator: 10_000,
    debug: false,
});

let current: PitchConfiguration = DEFAULT_CONFIGURATION;

export function getConfiguration(): PitchConfiguration {
    return current;
}

/**
 * Install a new configuration built from the current one and `overrides`.
 *
 * @throws ZodError for a non-positive concert pitch or denominator bound
 *
 * @example
 * configure({ concertPitch: 442 });
 */
export function configure(overrides: Partial<PitchConfiguration>): PitchConfiguration {
    const next: PitchConfiguration = Object.freeze(PitchConfigurationSchema.parse({ ...current, ...overrides }));
    current = next;
    setDebugLogging(next.debug);
    log.debug('Configuration updated', overrides);
    return next;
}

export function resetConfiguration(): PitchConfiguration {
    current = DEFAULT_CONFIGURATION;
    setDebugLogging(DEFAULT_CONFIGURATION.debug);
    return current;
}

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

export const EnvironmentSchema = z.object({
    INTONAL_CONCERT_PITCH: z.preprocess(blankToUndefined, z.coerce.number().finite().positive().optional()),
    INTONAL_DEBUG: z
        .string()
        .transform((value) => value === '1' || value.toLowerCase() === 'true')
        .optional(),
});

/**
 * Overrides read from environment variables:
 * INTONAL_CONCERT_PITCH (Hz) and INTONAL_DEBUG (`1` or `true`).
 * Pass the result to configure().
 *
 * @throws ZodError for a concert pitch that is not a positive number
 */
export function configurationFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<PitchConfiguration> {
    const { INTONAL_CONCERT_PITCH: concertPitch, INTONAL_DEBUG: debug } = EnvironmentSchema.parse(env);
    return {
        ...(concertPitch === undefined ? {} : { concertPitch }),
        ...(debug === undefined ? {} : { debug }),
    };
}
