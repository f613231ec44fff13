/**
 * SHAVS Monte Carlo procedure for SHA-256.
 *
 *   for j in 0..checkpoints-1:
 *     MD0 = MD1 = MD2 = Seed
 *     for i in 3..1002:
 *       Mi  = MD(i-3) ‖ MD(i-2) ‖ MD(i-1)       (96 raw digest bytes)
 *       MDi = SHA-256(Mi)
 *     Seed = MD1002, emitted as checkpoint j
 */

import { digest } from "../core/hash.js";
import { DIGEST_BYTES } from "../core/constants.js";
import { CavpError } from "./errors.js";

export const MONTE_CARLO_ITERATIONS = 1000;

export const MONTE_CARLO_CHECKPOINTS = 100;

/** One checkpoint: 1000 chained hashes starting from `seed`. */
export function monteCarloCheckpoint(seed: Uint8Array): Uint8Array {
  const message = new Uint8Array(DIGEST_BYTES * 3);
  let md0 = seed;
  let md1 = seed;
  let md2 = seed;

  for (let i = 0; i < MONTE_CARLO_ITERATIONS; i++) {
    message.set(md0, 0);
    message.set(md1, DIGEST_BYTES);
    message.set(md2, DIGEST_BYTES * 2);
    const next = digest(message);
    md0 = md1;
    md1 = md2;
    md2 = next;
  }
  return md2;
}

export function runMonteCarlo(
  seed: Uint8Array,
  checkpoints: number = MONTE_CARLO_CHECKPOINTS,
): Uint8Array[] {
  if (seed.length !== DIGEST_BYTES) {
    throw new CavpError(
      `Monte Carlo seed must be ${DIGEST_BYTES} bytes, got ${seed.length}`,
      "MONTE_SEED_INVALID",
      { length: seed.length },
    );
  }

  const outputs: Uint8Array[] = [];
  let current = seed;
  for (let j = 0; j < checkpoints; j++) {
    current = monteCarloCheckpoint(current);
    outputs.push(current);
  }
  return outputs;
}
