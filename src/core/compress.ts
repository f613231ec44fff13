/**
 * Block scheduling and the compression function (FIPS PUB 180-4 §6.2.2).
 *
 * Blocks are folded into the running state strictly in order: block N
 * starts from the state block N-1 left behind.
 */

import {
  BLOCK_BYTES,
  K,
  ROUNDS,
  STATE_WORDS,
} from "./constants.js";
import {
  add32,
  bigSigma0,
  bigSigma1,
  choose,
  majority,
  smallSigma0,
  smallSigma1,
} from "./bitwise.js";
import { HashError } from "./errors.js";

/** Eight 32-bit words; `Uint32Array` stores them modulo 2^32. */
export type HashState = Uint32Array;

/**
 * Build the 64-word message schedule W for one 64-byte block.
 */
export function expandSchedule(block: Uint8Array): Uint32Array {
  const w = new Uint32Array(ROUNDS);
  const view = new DataView(block.buffer, block.byteOffset, BLOCK_BYTES);

  for (let t = 0; t < 16; t++) {
    w[t] = view.getUint32(t * 4, false);
  }
  for (let t = 16; t < ROUNDS; t++) {
    w[t] = add32(
      smallSigma1(w[t - 2]!),
      w[t - 7]!,
      smallSigma0(w[t - 15]!),
      w[t - 16]!,
    );
  }
  return w;
}

/**
 * Fold one 64-byte block into `state` (mutated in place).
 */
export function transformBlock(block: Uint8Array, state: HashState): void {
  const w = expandSchedule(block);

  let a = state[0]!;
  let b = state[1]!;
  let c = state[2]!;
  let d = state[3]!;
  let e = state[4]!;
  let f = state[5]!;
  let g = state[6]!;
  let h = state[7]!;

  for (let i = 0; i < ROUNDS; i++) {
    const t1 = add32(h, bigSigma1(e), choose(e, f, g), K[i]!, w[i]!);
    const t2 = add32(bigSigma0(a), majority(a, b, c));
    h = g;
    g = f;
    f = e;
    e = add32(d, t1);
    d = c;
    c = b;
    b = a;
    a = add32(t1, t2);
  }

  state[0] = add32(state[0]!, a);
  state[1] = add32(state[1]!, b);
  state[2] = add32(state[2]!, c);
  state[3] = add32(state[3]!, d);
  state[4] = add32(state[4]!, e);
  state[5] = add32(state[5]!, f);
  state[6] = add32(state[6]!, g);
  state[7] = add32(state[7]!, h);
}

/**
 * Run every block of a padded message through the compression function.
 *
 * @returns the same `state` instance, after the last block.
 * @throws HashError if `padded` is not block-aligned or `state` is not
 *   eight words long.
 */
export function compress(padded: Uint8Array, state: HashState): HashState {
  if (padded.length % BLOCK_BYTES !== 0) {
    throw new HashError(
      `Padded message length ${padded.length} is not a multiple of ${BLOCK_BYTES}`,
      "BLOCK_MISALIGNED",
      { length: padded.length },
    );
  }
  if (state.length !== STATE_WORDS) {
    throw new HashError(
      `Hash state must hold ${STATE_WORDS} words, got ${state.length}`,
      "STATE_INVALID",
      { length: state.length },
    );
  }

  for (let offset = 0; offset < padded.length; offset += BLOCK_BYTES) {
    transformBlock(padded.subarray(offset, offset + BLOCK_BYTES), state);
  }
  return state;
}
