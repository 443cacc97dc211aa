import { Decomposition } from './types';
import { mulMod, powMod } from './modularArithmetic';

/** n - 1 = d * 2^s with d odd. Expects an odd n >= 3. */
export function decompose(n: bigint): Decomposition {
    let d = n - 1n;
    let s = 0;
    while ((d & 1n) === 0n) {
        d >>= 1n;
        s++;
    }
    return { d, s };
}

/**
 * True when base `a` proves `n` composite. False means `n` is prime or a
 * strong pseudoprime to `a`.
 *
 * Expects 2 <= a < n, n odd, and (d, s) from {@link decompose}.
 */
export function isWitnessComposite(a: bigint, d: bigint, n: bigint, s: number): boolean {
    const nMinusOne = n - 1n;
    let x = powMod(a, d, n);
    if (x === 1n || x === nMinusOne) return false;

    for (let r = 1; r < s; r++) {
        x = mulMod(x, x, n);
        if (x === nMinusOne) return false;
        // non-trivial square root of 1
        if (x === 1n) return true;
    }
    return true;
}
