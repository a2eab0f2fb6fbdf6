import {
    DEFAULT_CONFIGURATION,
    configurationFromEnv,
    configure,
    getConfiguration,
    resetConfiguration,
    type PitchConfiguration,
} from '../configurations';
import { ZodError } from 'zod';
import { DirectPitch } from '../direct-pitch';
import { isDebugLogging } from '../log';

afterEach(() => {
    resetConfiguration();
    jest.restoreAllMocks();
});

describe('Configuration', () => {
    test('Defaults', () => {
        expect(getConfiguration()).toBe(DEFAULT_CONFIGURATION);
        expect(DEFAULT_CONFIGURATION.concertPitch).toBe(440);
        expect(DEFAULT_CONFIGURATION.centsRatioMaxDenominator).toBe(10_000);
        expect(DEFAULT_CONFIGURATION.debug).toBe(false);
        expect(Object.isFrozen(DEFAULT_CONFIGURATION)).toBe(true);
    });

    describe('configure()', () => {
        test('Installs a frozen copy with the overrides', () => {
            const next = configure({ concertPitch: new DirectPitch(432) });
            expect(getConfiguration()).toBe(next);
            expect(Object.isFrozen(next)).toBe(true);
            expect(next.centsRatioMaxDenominator).toBe(10_000);
        });

        test('Switches debug logging', () => {
            jest.spyOn(console, 'debug').mockImplementation(() => undefined);
            configure({ debug: true });
            expect(isDebugLogging()).toBe(true);
            resetConfiguration();
            expect(isDebugLogging()).toBe(false);
        });

        test.each<[string, Partial<PitchConfiguration>]>([
            ['negative concert pitch', { concertPitch: -1 }],
            ['non-finite concert pitch', { concertPitch: Infinity }],
            ['NaN concert pitch', { concertPitch: NaN }],
            ['fractional denominator bound', { centsRatioMaxDenominator: 0.5 }],
            ['zero denominator bound', { centsRatioMaxDenominator: 0 }],
        ])('[EDGE] %s → ZodError, configuration untouched', (_, overrides) => {
            expect(() => configure(overrides)).toThrow(ZodError);
            expect(getConfiguration()).toBe(DEFAULT_CONFIGURATION);
        });

        test('Keeps the comma table and concert pitch objects as given', () => {
            const concertPitch = new DirectPitch(432);
            const next = configure({ concertPitch });
            expect(next.concertPitch).toBe(concertPitch);
            expect(next.primeCommaTable).toBe(DEFAULT_CONFIGURATION.primeCommaTable);
        });
    });

    describe('configurationFromEnv()', () => {
        test('Reads concert pitch and debug flag', () => {
            expect(configurationFromEnv({ INTONAL_CONCERT_PITCH: '442', INTONAL_DEBUG: 'true' })).toEqual({
                concertPitch: 442,
                debug: true,
            });
            expect(configurationFromEnv({ INTONAL_DEBUG: '0' })).toEqual({ debug: false });
        });

        test('[EDGE] Empty environment → no overrides', () => {
            expect(configurationFromEnv({})).toEqual({});
        });

        test('[EDGE] Blank concert pitch is ignored', () => {
            expect(configurationFromEnv({ INTONAL_CONCERT_PITCH: '  ', INTONAL_DEBUG: '1' })).toEqual({ debug: true });
        });

        test.each(['a4', '-440', '0'])('[EDGE] Concert pitch %p → ZodError', (value) => {
            expect(() => configurationFromEnv({ INTONAL_CONCERT_PITCH: value })).toThrow(ZodError);
        });
    });
});
