// =============================================================================
// Intonal - Rational Errors
// =============================================================================

/**
 * Raised for input that cannot be read as a positive rational number:
 * malformed `"num/den"` strings, zero denominators, non-integer exponents
 * or prime factors beyond the prime table.
 */
export class ParseError extends Error {
    readonly input: unknown;

    constructor(message: string, input?: unknown) {
        super(message);
        this.name = 'ParseError';
        this.input = input;
    }
}

export function isParseError(error: unknown): error is ParseError {
    return error instanceof ParseError;
}
