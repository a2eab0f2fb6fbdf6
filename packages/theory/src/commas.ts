import { Fraction } from '@intonal/rational';
import { UnknownCommaError } from './errors';

/**
 * Tuning commas and compounds of them, as used by the Helmholtz-Ellis
 * notation to describe how far a just interval sits from its closest
 * pythagorean neighbour.
 */

export class Comma {
    constructor(
        readonly ratio: Fraction,
        readonly name?: string
    ) {}

    toString(): string {
        return `Comma(${this.ratio.toString()})`;
    }
}

/** prime → the comma that stands for one step of that prime. */
export type PrimeCommaTable = ReadonlyMap<number, Comma>;

/**
 * Frozen prime → exponent mapping bound to a comma table.
 * Iterating yields each comma ratio raised to its exponent.
 *
 * @example
 * const compound = new CommaCompound(new Map([[5, 1], [7, -1]]), table);
 * compound.size   // 2
 * compound.ratio  // (80/81) / (63/64)
 */
export class CommaCompound implements Iterable<Fraction> {
    private readonly primeToExponent: ReadonlyMap<number, number>;

    /**
     * @throws UnknownCommaError if a prime with a non-zero exponent has no comma
     */
    constructor(
        primeToExponent: ReadonlyMap<number, number>,
        readonly table: PrimeCommaTable
    ) {
        for (const [prime, exponent] of primeToExponent) {
            if (exponent !== 0 && !table.has(prime)) {
                throw new UnknownCommaError(prime);
            }
        }
        this.primeToExponent = new Map(primeToExponent);
    }

    /** Sum of absolute exponents. */
    get size(): number {
        let total = 0;
        for (const exponent of this.primeToExponent.values()) {
            total += Math.abs(exponent);
        }
        return total;
    }

    get primeToExponentMap(): Map<number, number> {
        return new Map(this.primeToExponent);
    }

    *[Symbol.iterator](): Iterator<Fraction> {
        for (const [prime, exponent] of this.primeToExponent) {
            const comma = this.table.get(prime);
            if (comma !== undefined) {
                yield comma.ratio.pow(exponent);
            }
        }
    }

    get ratio(): Fraction {
        let product = Fraction.ONE;
        for (const factor of this) {
            product = product.mul(factor);
        }
        return product;
    }

    toString(): string {
        const entries = [...this.primeToExponent].map(([prime, exponent]) => `${prime}: ${exponent}`);
        return `CommaCompound({${entries.join(', ')}})`;
    }
}
