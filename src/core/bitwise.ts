/**
 * 32-bit word primitives (FIPS PUB 180-4 §3.2, §4.1.2).
 *
 * JavaScript bitwise operators work on signed 32-bit integers, so every
 * result is brought back into the unsigned range with `>>> 0`.
 */

/** Right-rotate `x` by `n` bits (0 < n < 32). */
export function rotr(x: number, n: number): number {
  return ((x >>> n) | (x << (32 - n))) >>> 0;
}

/** Sum of words modulo 2^32. */
export function add32(...words: number[]): number {
  let sum = 0;
  for (const w of words) {
    sum = (sum + w) >>> 0;
  }
  return sum;
}

/** Ch(e, f, g): bits of f where e is set, bits of g elsewhere. */
export function choose(e: number, f: number, g: number): number {
  return ((e & f) ^ (~e & g)) >>> 0;
}

/** Maj(a, b, c): per-bit majority vote. */
export function majority(a: number, b: number, c: number): number {
  return ((a & b) ^ (a & c) ^ (b & c)) >>> 0;
}

/** σ0, message schedule. */
export function smallSigma0(x: number): number {
  return (rotr(x, 7) ^ rotr(x, 18) ^ (x >>> 3)) >>> 0;
}

/** σ1, message schedule. */
export function smallSigma1(x: number): number {
  return (rotr(x, 17) ^ rotr(x, 19) ^ (x >>> 10)) >>> 0;
}

/** Σ0, compression round. */
export function bigSigma0(x: number): number {
  return (rotr(x, 2) ^ rotr(x, 13) ^ rotr(x, 22)) >>> 0;
}

/** Σ1, compression round. */
export function bigSigma1(x: number): number {
  return (rotr(x, 6) ^ rotr(x, 11) ^ rotr(x, 25)) >>> 0;
}
