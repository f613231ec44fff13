/**
 * CLI configuration for the test-vector commands.
 *
 * Defaults:
 *   Vector file:   ./test_vectors.json
 *   Vector count:  100
 *   Max length:    512 characters
 *
 * Environment overrides:
 *   FIPS256_VECTORS_PATH        path to the JSON vector file
 *   FIPS256_VECTOR_COUNT        vectors written by `vectors generate`
 *   FIPS256_VECTOR_MAX_LENGTH   longest random input, in characters
 *
 * The hash engine itself reads no configuration.
 */

import { resolve } from "node:path";
import { z } from "zod";

export interface Fips256Config {
  vectorsPath: string;
  vectorCount: number;
  vectorMaxLength: number;
}

export type ConfigErrorCode = "CONFIG_INVALID";

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ConfigErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
    this.details = details ?? {};
  }
}

const DEFAULT_VECTORS_FILE = "test_vectors.json";
const DEFAULT_VECTOR_COUNT = 100;
const DEFAULT_VECTOR_MAX_LENGTH = 512;

const EnvSchema = z.object({
  FIPS256_VECTORS_PATH: z.string().min(1).optional(),
  FIPS256_VECTOR_COUNT: z.coerce.number().int().positive().optional(),
  FIPS256_VECTOR_MAX_LENGTH: z.coerce.number().int().nonnegative().optional(),
});

export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Fips256Config {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = issue ? issue.path.join(".") : "environment";
    throw new ConfigError(
      `Invalid ${name}: ${issue?.message ?? "unknown error"}`,
      "CONFIG_INVALID",
      { issues: result.error.issues },
    );
  }

  const parsed = result.data;
  return {
    vectorsPath: resolve(cwd, parsed.FIPS256_VECTORS_PATH ?? DEFAULT_VECTORS_FILE),
    vectorCount: parsed.FIPS256_VECTOR_COUNT ?? DEFAULT_VECTOR_COUNT,
    vectorMaxLength: parsed.FIPS256_VECTOR_MAX_LENGTH ?? DEFAULT_VECTOR_MAX_LENGTH,
  };
}

/**
 * Parse an integer CLI flag value, rejecting anything below `min`.
 */
export function parseIntegerFlag(
  name: string,
  value: string,
  min: number,
): number {
  const result = z.coerce.number().int().min(min).safeParse(value);
  if (!result.success || value.trim() === "") {
    throw new ConfigError(
      `--${name} must be an integer >= ${min}, got "${value}"`,
      "CONFIG_INVALID",
      { flag: name, value },
    );
  }
  return result.data;
}
