/**
 * (a * b) mod m for 0 <= a, b < m. The product is a bigint, so the full
 * 128-bit intermediate of two 64-bit operands is kept before reduction.
 */
export function mulMod(a: bigint, b: bigint, m: bigint): bigint {
    return (a * b) % m;
}

/**
 * a^e mod m by square-and-multiply over the bits of e, least significant first.
 * Expects m >= 1.
 */
export function powMod(a: bigint, e: bigint, m: bigint): bigint {
    let res = 1n % m;
    let base = a % m;
    let exp = e;
    while (exp > 0n) {
        if ((exp & 1n) === 1n) res = mulMod(res, base, m);
        base = mulMod(base, base, m);
        exp >>= 1n;
    }
    return res;
}
