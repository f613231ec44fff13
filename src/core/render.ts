/**
 * Digest rendering: hash state → hex string or raw bytes, word 0 first,
 * each word big-endian.
 */

import { DIGEST_BYTES } from "./constants.js";
import type { HashState } from "./compress.js";

export function render(state: HashState): string {
  let hex = "";
  for (const word of state) {
    hex += word.toString(16).padStart(8, "0");
  }
  return hex;
}

export function renderBytes(state: HashState): Uint8Array {
  const out = new Uint8Array(DIGEST_BYTES);
  const view = new DataView(out.buffer);
  state.forEach((word, i) => view.setUint32(i * 4, word, false));
  return out;
}
