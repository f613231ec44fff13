/**
 * Zod schemas for CAVP response-file records.
 *
 * Every record schema uses .passthrough() so fields this tool does not
 * check are kept.
 */

import { z } from "zod";
import { MONTE_CARLO_CHECKPOINTS } from "./monte-carlo.js";

const DIGEST_HEX_RE = /^[0-9a-fA-F]{64}$/;
const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;
const UINT_RE = /^\d+$/;

const uint = z
  .string()
  .regex(UINT_RE, "Must be a non-negative integer")
  .transform((s) => Number(s));

const digestHex = z
  .string()
  .regex(DIGEST_HEX_RE, "Must be a 64-char hex digest")
  .transform((s) => s.toLowerCase());

const hexBytes = z.string().regex(HEX_RE, "Must be an even-length hex string");

/** SHA-256 response files declare a 32-byte digest length. */
export const ParametersSchema = z
  .object({
    L: z.literal("32", {
      errorMap: () => ({ message: "Digest length L must be 32" }),
    }).optional(),
  })
  .passthrough();

export const MessageRecordSchema = z
  .object({
    Len: uint,
    Msg: hexBytes,
    MD: digestHex,
  })
  .passthrough()
  .refine((r) => r.Msg.length / 2 >= Math.ceil(r.Len / 8), {
    message: "Msg is shorter than Len bits",
    path: ["Msg"],
  });

export const MonteRecordSchema = z
  .object({
    COUNT: uint.refine((n) => n < MONTE_CARLO_CHECKPOINTS, {
      message: `COUNT must be below ${MONTE_CARLO_CHECKPOINTS}`,
    }),
    MD: digestHex,
  })
  .passthrough();

export const SeedSchema = digestHex;

export type MessageRecord = z.infer<typeof MessageRecordSchema>;
export type MonteRecord = z.infer<typeof MonteRecordSchema>;
