// =============================================================================
// Intonal - Theory Errors
// =============================================================================

export { ParseError, isParseError } from '@intonal/rational';

function describeSource(value: unknown): string {
    if (typeof value === 'object' && value !== null && 'kind' in value) {
        return `kind "${String(value.kind)}"`;
    }
    return value === null ? 'null' : typeof value;
}

/** A pitch source whose kind is not one of ratio, fraction or exponents. */
export class UnsupportedTypeError extends Error {
    readonly source: unknown;

    constructor(source: unknown) {
        super(`Cannot build a JustIntonationPitch from a source of ${describeSource(source)}`);
        this.name = 'UnsupportedTypeError';
        this.source = source;
    }
}

export function isUnsupportedTypeError(error: unknown): error is UnsupportedTypeError {
    return error instanceof UnsupportedTypeError;
}

/** No candidate octave could be measured against the reference. */
export class RegisterResolutionError extends Error {
    constructor(pitch: string, reference: string) {
        super(`Couldn't find the closest register of ${pitch} to ${reference}`);
        this.name = 'RegisterResolutionError';
    }
}

export function isRegisterResolutionError(error: unknown): error is RegisterResolutionError {
    return error instanceof RegisterResolutionError;
}

/** A comma compound refers to a prime its comma table does not cover. */
export class UnknownCommaError extends Error {
    readonly prime: number;

    constructor(prime: number) {
        super(`No comma is registered for prime ${prime}`);
        this.name = 'UnknownCommaError';
        this.prime = prime;
    }
}

export function isUnknownCommaError(error: unknown): error is UnknownCommaError {
    return error instanceof UnknownCommaError;
}
