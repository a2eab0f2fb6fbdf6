/**
 * Scope-tagged console logging: `[Scope] message`.
 * Debug output is off until enabled through the configuration.
 */

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
}

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
    debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
    return debugEnabled;
}

/**
 * @example
 * const log = createLogger('Pythagorean');
 * log.warn("Found unknown accidental 'x' which will be ignored");
 * // console.warn('[Pythagorean] Found unknown accidental ...')
 */
export function createLogger(scope: string): Logger {
    const prefix = `[${scope}]`;
    return {
        debug(message, ...details) {
            if (debugEnabled) {
                console.debug(`${prefix} ${message}`, ...details);
            }
        },
        warn(message, ...details) {
            console.warn(`${prefix} ${message}`, ...details);
        },
    };
}
