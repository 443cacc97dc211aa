import { Candidate, PrimalityOptions, Verdict } from './types';
import { InvalidBaseError } from './errors';
import { toCandidate } from './candidate';
import { decompose, isWitnessComposite } from './witness';

export const DETERMINISTIC_BASES: readonly bigint[] = [2n, 3n, 5n, 7n, 11n, 13n, 17n];

/**
 * Smallest strong pseudoprime to every base in DETERMINISTIC_BASES. Below it
 * the default table never misclassifies.
 */
export const DETERMINISTIC_BASES_LIMIT = 341550071728321n;

/**
 * First twelve primes. Exact for every n below 318665857834031151167461,
 * which covers the whole signed 64-bit range.
 */
export const FIRST_TWELVE_PRIME_BASES: readonly bigint[] = [
    ...DETERMINISTIC_BASES, 19n, 23n, 29n, 31n, 37n
];

function checkBases(bases: readonly bigint[]): readonly bigint[] {
    if (bases.length === 0) {
        throw new InvalidBaseError(null, 'at least one base is required');
    }
    for (const a of bases) {
        if (a < 2n) throw new InvalidBaseError(a, 'bases must be at least 2');
    }
    return bases;
}

export function isPrime(candidate: Candidate, options: PrimalityOptions = {}): boolean {
    const bases = options.bases === undefined ? DETERMINISTIC_BASES : checkBases(options.bases);
    const n = toCandidate(candidate);

    if (n < 2n) return false;
    if ((n & 1n) === 0n) return n === 2n;

    const { d, s } = decompose(n);

    for (const a of bases) {
        if (a >= n) continue;
        if (isWitnessComposite(a, d, n, s)) {
            return false;
        }
    }

    return true;
}

export function classify(candidate: Candidate, options: PrimalityOptions = {}): Verdict {
    return isPrime(candidate, options) ? 'PRIME' : 'COMPOSITE';
}
