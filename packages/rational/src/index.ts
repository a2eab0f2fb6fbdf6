// =============================================================================
// Intonal - Rational Arithmetic
// =============================================================================
// Exact fractions, primes and prime exponent vectors.

// Errors
export { ParseError, isParseError } from './errors';

// Fractions
export { Fraction, gcd, floorDiv, bitLength, log2BigInt } from './fraction';
export type { Integer } from './fraction';

// Primes
export {
    PRIME_TABLE_LIMIT,
    nthPrime,
    firstPrimes,
    primeIndex,
    isProbablePrime,
    factorInteger,
} from './primes';

// Exponent vectors
export {
    UNISON,
    asExponentVector,
    trim,
    pad,
    vectorsEqual,
    add,
    subtract,
    negate,
    ratioAdjust,
} from './exponent-vector';
export type { ExponentVector } from './exponent-vector';

// Codec
export {
    parseRatio,
    fractionToExponentVector,
    exponentVectorToPair,
    exponentVectorToFraction,
    ratioToExponentVector,
    normalizeExponentVector,
    factorise,
    factoriseNumeratorAndDenominator,
} from './codec';
