/**
 * Random SHA-256 test vectors, stored as a JSON array of
 * `{ input, hash }` objects.
 *
 * Expected digests come from node:crypto, an implementation independent
 * of this package's engine; `checkVectors` then runs the engine against
 * them.
 */

import { createHash, randomInt } from "node:crypto";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { hash } from "../core/hash.js";
import { PRINTABLE } from "./charset.js";

const cryptoRandom = (maxExclusive: number): number => randomInt(maxExclusive);

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

export type VectorFileErrorCode =
  | "VECTOR_FILE_NOT_FOUND"
  | "VECTOR_FILE_UNREADABLE"
  | "VECTOR_FILE_INVALID";

export class VectorFileError extends Error {
  public readonly code: VectorFileErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: VectorFileErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "VectorFileError";
    this.code = code;
    this.details = details ?? {};
  }
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const TestVectorSchema = z.object({
  input: z.string(),
  hash: z.string().regex(/^[0-9a-f]{64}$/, "Must be a 64-char lowercase hex digest"),
});

export const VectorFileSchema = z.array(TestVectorSchema);

export type TestVector = z.infer<typeof TestVectorSchema>;

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  count: number;
  /** Inclusive upper bound on input length in characters. */
  maxLength: number;
  /** Uniform integer in [0, maxExclusive). Defaults to crypto.randomInt. */
  random?: (maxExclusive: number) => number;
}

/** Reference digest from node:crypto. */
export function referenceHash(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

export function randomInput(
  maxLength: number,
  random: (maxExclusive: number) => number = cryptoRandom,
): string {
  const length = random(maxLength + 1);
  let s = "";
  for (let i = 0; i < length; i++) {
    s += PRINTABLE.charAt(random(PRINTABLE.length));
  }
  return s;
}

export function generateVectors(options: GenerateOptions): TestVector[] {
  const random = options.random ?? cryptoRandom;
  const vectors: TestVector[] = [];
  for (let i = 0; i < options.count; i++) {
    const input = randomInput(options.maxLength, random);
    vectors.push({ input, hash: referenceHash(input) });
  }
  return vectors;
}

// ---------------------------------------------------------------------------
// File I/O
// ---------------------------------------------------------------------------

export function writeVectorFile(
  path: string,
  vectors: readonly TestVector[],
): string {
  const abs = resolve(path);
  writeFileSync(abs, JSON.stringify(vectors, null, 2) + "\n", "utf8");
  return abs;
}

export function readVectorFile(path: string): TestVector[] {
  const abs = resolve(path);
  if (!existsSync(abs)) {
    throw new VectorFileError(
      `Vector file not found: ${abs}`,
      "VECTOR_FILE_NOT_FOUND",
      { path: abs },
    );
  }

  let text: string;
  try {
    text = readFileSync(abs, "utf8");
  } catch (e: unknown) {
    throw new VectorFileError(
      `Cannot read vector file: ${e instanceof Error ? e.message : String(e)}`,
      "VECTOR_FILE_UNREADABLE",
      { path: abs },
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text) as unknown;
  } catch (e: unknown) {
    throw new VectorFileError(
      `Vector file is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      "VECTOR_FILE_INVALID",
      { path: abs },
    );
  }

  const result = VectorFileSchema.safeParse(data);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first ? `${first.path.join(".")}: ${first.message}` : "unknown";
    throw new VectorFileError(
      `Vector file failed validation at ${where}`,
      "VECTOR_FILE_INVALID",
      { path: abs, issues: result.error.issues },
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Checking
// ---------------------------------------------------------------------------

export interface VectorFailure {
  index: number;
  input: string;
  expected: string;
  actual: string;
}

export interface VectorCheckReport {
  total: number;
  passed: number;
  failed: number;
  ok: boolean;
  failures: VectorFailure[];
}

export function checkVectors(vectors: readonly TestVector[]): VectorCheckReport {
  const failures: VectorFailure[] = [];
  vectors.forEach((v, index) => {
    const actual = hash(v.input);
    if (actual !== v.hash) {
      failures.push({ index, input: v.input, expected: v.hash, actual });
    }
  });
  return {
    total: vectors.length,
    passed: vectors.length - failures.length,
    failed: failures.length,
    ok: failures.length === 0,
    failures,
  };
}
