/**
 * SHA-256 entry points.
 *
 *   hash(input) = render(compress(pad(input), H0))
 *
 * Pure functions: each call owns its padded buffer, schedule and state.
 * Strings are hashed as their UTF-8 bytes.
 */

import { H0 } from "./constants.js";
import { compress, type HashState } from "./compress.js";
import { pad } from "./pad.js";
import { render, renderBytes } from "./render.js";

const utf8 = new TextEncoder();

/** A fresh, caller-owned copy of the initial hash value H(0). */
export function initialState(): HashState {
  return Uint32Array.from(H0);
}

function toBytes(input: Uint8Array | string): Uint8Array {
  return typeof input === "string" ? utf8.encode(input) : input;
}

function run(input: Uint8Array | string): HashState {
  return compress(pad(toBytes(input)), initialState());
}

/** SHA-256 as a 64-char lowercase hex string. */
export function hash(input: Uint8Array | string): string {
  return render(run(input));
}

/** SHA-256 as 32 raw bytes. */
export function digest(input: Uint8Array | string): Uint8Array {
  return renderBytes(run(input));
}
