/**
 * Message padding (FIPS PUB 180-4 §5.1.1).
 *
 *   padded = message ‖ 0x80 ‖ 0x00* ‖ bitLength(message) as u64 big-endian
 *
 * Invariants:
 *   - padded.length % 64 === 0
 *   - padded.length >= message.length + 9
 *   - the input buffer is never mutated
 */

import { BLOCK_BYTES } from "./constants.js";

/** Bytes taken by the 0x80 marker plus the 64-bit length field. */
const PAD_OVERHEAD = 9;

const TWO_POW_32 = 0x1_0000_0000;

/** Length in bytes of the padded form of a `byteLength`-byte message. */
export function paddedLength(byteLength: number): number {
  return Math.ceil((byteLength + PAD_OVERHEAD) / BLOCK_BYTES) * BLOCK_BYTES;
}

export function pad(message: Uint8Array): Uint8Array {
  const padded = new Uint8Array(paddedLength(message.length));
  padded.set(message);
  padded[message.length] = 0x80;

  // Zero fill is implicit. The bit length can exceed 2^32, so it goes in
  // as two big-endian halves; integers stay exact up to 2^53.
  const bitLength = message.length * 8;
  const view = new DataView(padded.buffer, padded.byteOffset, padded.byteLength);
  view.setUint32(padded.length - 8, Math.floor(bitLength / TWO_POW_32), false);
  view.setUint32(padded.length - 4, bitLength >>> 0, false);

  return padded;
}
