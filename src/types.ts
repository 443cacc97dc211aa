export type Candidate = bigint | number;

export type Verdict = 'PRIME' | 'COMPOSITE';

export interface Decomposition {
    /** Odd part of n - 1. */
    d: bigint;
    /** Number of factors of two removed from n - 1. */
    s: number;
}

export interface PrimalityOptions {
    /**
     * Bases tried in order. Bases greater than or equal to the candidate are
     * skipped. Defaults to DETERMINISTIC_BASES.
     */
    bases?: readonly bigint[];
}
