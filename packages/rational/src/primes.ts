import { ParseError } from './errors';
import { gcd } from './fraction';

/**
 * Prime table and integer factorisation.
 *
 * The table grows on demand by sieving the next segment with the primes
 * already known, so `nthPrime` and `primeIndex` stay cheap for the low
 * primes just intonation works with.
 */

// ============================================================================
// SECTION 1: Prime table
// ============================================================================

/** Largest integer the prime table will grow to. */
export const PRIME_TABLE_LIMIT = 10_000_000;

/** Primes below this bound are tried by division before rho kicks in. */
const TRIAL_DIVISION_BOUND = 1000;

const PRIMES: number[] = [2, 3, 5, 7, 11, 13];
let sievedBelow = 14; // every prime < sievedBelow is in PRIMES

function extendTable(bound: number): void {
    while (sievedBelow < bound) {
        const low = sievedBelow;
        // high <= low² so every composite below high has a factor in PRIMES
        const high = Math.min(Math.max(low * 2, bound), low * low, PRIME_TABLE_LIMIT + 1);
        const composite = new Uint8Array(high - low);
        for (const p of PRIMES) {
            if (p * p >= high) {
                break;
            }
            const start = Math.max(p * p, Math.ceil(low / p) * p);
            for (let m = start; m < high; m += p) {
                composite[m - low] = 1;
            }
        }
        for (let i = 0; i < composite.length; i++) {
            if (composite[i] === 0) {
                PRIMES.push(low + i);
            }
        }
        sievedBelow = high;
        if (high > PRIME_TABLE_LIMIT) {
            return;
        }
    }
}

/**
 * The `index`-th prime, counting from 0 (`nthPrime(0) === 2`).
 */
export function nthPrime(index: number): number {
    if (!Number.isInteger(index) || index < 0) {
        throw new RangeError(`Prime index must be a non-negative integer, got ${index}`);
    }
    while (PRIMES.length <= index) {
        if (sievedBelow > PRIME_TABLE_LIMIT) {
            throw new ParseError(`Prime #${index} lies beyond the prime table limit ${PRIME_TABLE_LIMIT}`, index);
        }
        extendTable(sievedBelow * 2);
    }
    return PRIMES[index];
}

/**
 * The first `count` primes in ascending order.
 */
export function firstPrimes(count: number): readonly number[] {
    if (count === 0) {
        return [];
    }
    nthPrime(count - 1);
    return PRIMES.slice(0, count);
}

/**
 * Position of `prime` in the ascending prime sequence (`primeIndex(5) === 2`).
 *
 * @throws ParseError if `prime` is not prime or exceeds {@link PRIME_TABLE_LIMIT}
 */
export function primeIndex(prime: number): number {
    if (!Number.isInteger(prime) || prime < 2) {
        throw new ParseError(`${prime} is not a prime`, prime);
    }
    if (prime > PRIME_TABLE_LIMIT) {
        throw new ParseError(`Prime ${prime} exceeds the prime table limit ${PRIME_TABLE_LIMIT}`, prime);
    }
    extendTable(prime + 1);

    let lo = 0;
    let hi = PRIMES.length - 1;
    while (lo <= hi) {
        const mid = (lo + hi) >>> 1;
        if (PRIMES[mid] === prime) {
            return mid;
        }
        if (PRIMES[mid] < prime) {
            lo = mid + 1;
        } else {
            hi = mid - 1;
        }
    }
    throw new ParseError(`${prime} is not a prime`, prime);
}

// ============================================================================
// SECTION 2: Primality
// ============================================================================

// Deterministic Miller-Rabin witnesses for n < 3.3 * 10^24
const WITNESSES = [2n, 3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n, 41n];

function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
    let result = 1n;
    base %= modulus;
    while (exponent > 0n) {
        if (exponent & 1n) {
            result = (result * base) % modulus;
        }
        base = (base * base) % modulus;
        exponent >>= 1n;
    }
    return result;
}

export function isProbablePrime(n: bigint): boolean {
    if (n < 2n) {
        return false;
    }
    for (const w of WITNESSES) {
        if (n === w) {
            return true;
        }
        if (n % w === 0n) {
            return false;
        }
    }

    let d = n - 1n;
    let s = 0;
    while (d % 2n === 0n) {
        d /= 2n;
        s++;
    }

    witness: for (const a of WITNESSES) {
        let x = modPow(a, d, n);
        if (x === 1n || x === n - 1n) {
            continue;
        }
        for (let r = 1; r < s; r++) {
            x = (x * x) % n;
            if (x === n - 1n) {
                continue witness;
            }
        }
        return false;
    }
    return true;
}

// ============================================================================
// SECTION 3: Factorisation
// ============================================================================

/** Brent's variant of Pollard's rho; `n` must be an odd composite. */
function pollardBrent(n: bigint): bigint {
    const BATCH = 128;
    for (let c = 1n; ; c++) {
        const step = (v: bigint): bigint => (v * v + c) % n;
        let x = 2n;
        let y = 2n;
        let ys = 2n;
        let q = 1n;
        let g = 1n;
        let r = 1;

        while (g === 1n) {
            x = y;
            for (let i = 0; i < r; i++) {
                y = step(y);
            }
            for (let k = 0; k < r && g === 1n; k += BATCH) {
                ys = y;
                const limit = Math.min(BATCH, r - k);
                for (let i = 0; i < limit; i++) {
                    y = step(y);
                    q = (q * (x > y ? x - y : y - x)) % n;
                }
                g = gcd(q, n);
            }
            r *= 2;
        }

        if (g === n) {
            do {
                ys = step(ys);
                g = gcd(x > ys ? x - ys : ys - x, n);
            } while (g === 1n);
        }
        if (g !== n) {
            return g;
        }
    }
}

function splitIntoPrimes(n: bigint, into: bigint[]): void {
    if (n === 1n) {
        return;
    }
    if (isProbablePrime(n)) {
        into.push(n);
        return;
    }
    const divisor = n % 2n === 0n ? 2n : pollardBrent(n);
    splitIntoPrimes(divisor, into);
    splitIntoPrimes(n / divisor, into);
}

/**
 * Prime factorisation of a positive integer as an ascending
 * prime → multiplicity map. `factorInteger(1n)` is empty.
 *
 * @example
 * factorInteger(360n) // Map { 2n => 3, 3n => 2, 5n => 1 }
 */
export function factorInteger(n: bigint): Map<bigint, number> {
    if (n < 1n) {
        throw new ParseError(`Cannot factorise non-positive integer ${n}`, n);
    }

    const factors = new Map<bigint, number>();
    let remaining = n;
    extendTable(TRIAL_DIVISION_BOUND);
    for (const p of PRIMES) {
        if (p >= TRIAL_DIVISION_BOUND) {
            break;
        }
        const prime = BigInt(p);
        if (prime * prime > remaining) {
            break;
        }
        let count = 0;
        while (remaining % prime === 0n) {
            remaining /= prime;
            count++;
        }
        if (count > 0) {
            factors.set(prime, count);
        }
    }

    const large: bigint[] = [];
    splitIntoPrimes(remaining, large);
    for (const prime of large) {
        factors.set(prime, (factors.get(prime) ?? 0) + 1);
    }

    return new Map([...factors.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
