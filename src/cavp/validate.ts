/**
 * Validate the hash engine against a CAVP response file.
 *
 * Message files (ShortMsg / LongMsg): each record's first Len bits are
 * hashed and compared to MD. Records whose Len is not a whole number of
 * bytes are counted as skipped.
 *
 * Monte Carlo files: the Seed is run through the SHAVS procedure and each
 * COUNT's checkpoint is compared to MD.
 */

import type { z } from "zod";
import { hash } from "../core/hash.js";
import { bytesToHex, hexToBytes } from "../encoding/hex.js";
import { CavpError } from "./errors.js";
import { runMonteCarlo } from "./monte-carlo.js";
import { parseResponseFile, type RawRecord } from "./rsp-parser.js";
import {
  MessageRecordSchema,
  MonteRecordSchema,
  ParametersSchema,
  SeedSchema,
  type MessageRecord,
  type MonteRecord,
} from "./schemas.js";

// ---------------------------------------------------------------------------
// Report types
// ---------------------------------------------------------------------------

export type CavpKind = "message" | "monte-carlo";

export interface CavpFailure {
  /** 0-based position of the record in the file. */
  index: number;
  /** 1-based line number of the record's first field. */
  line: number;
  len?: number;
  count?: number;
  expected: string;
  actual: string;
}

export interface CavpReport {
  kind: CavpKind;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  ok: boolean;
  failures: CavpFailure[];
}

// ---------------------------------------------------------------------------
// Schema helpers
// ---------------------------------------------------------------------------

function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  what: string,
  line?: number,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    const where = line === undefined ? "" : ` at line ${line}`;
    throw new CavpError(
      `Invalid ${what}${where}: ${issues}`,
      "RSP_SCHEMA_INVALID",
      { line, issues: result.error.issues },
    );
  }
  return result.data;
}

function typed<T extends z.ZodTypeAny>(
  records: readonly RawRecord[],
  schema: T,
  what: string,
): Array<{ raw: RawRecord; record: z.output<T> }> {
  return records.map((raw) => ({
    raw,
    record: parseWith(schema, raw.fields, what, raw.line),
  }));
}

function summarize(
  kind: CavpKind,
  total: number,
  skipped: number,
  failures: CavpFailure[],
): CavpReport {
  const failed = failures.length;
  return {
    kind,
    total,
    passed: total - skipped - failed,
    failed,
    skipped,
    ok: failed === 0,
    failures,
  };
}

// ---------------------------------------------------------------------------
// Validators
// ---------------------------------------------------------------------------

function validateMessages(records: readonly RawRecord[]): CavpReport {
  const failures: CavpFailure[] = [];
  let skipped = 0;

  const rows: Array<{ raw: RawRecord; record: MessageRecord }> = typed(
    records,
    MessageRecordSchema,
    "message record",
  );
  rows.forEach(({ raw, record }, index) => {
    if (record.Len % 8 !== 0) {
      skipped++;
      return;
    }
    const message = hexToBytes(record.Msg).subarray(0, record.Len / 8);
    const actual = hash(message);
    if (actual !== record.MD) {
      failures.push({
        index,
        line: raw.line,
        len: record.Len,
        expected: record.MD,
        actual,
      });
    }
  });

  return summarize("message", records.length, skipped, failures);
}

function validateMonteCarlo(
  seedHex: string,
  records: readonly RawRecord[],
): CavpReport {
  const seed = hexToBytes(parseWith(SeedSchema, seedHex, "Seed"));
  const rows: Array<{ raw: RawRecord; record: MonteRecord }> = typed(
    records,
    MonteRecordSchema,
    "Monte Carlo record",
  );

  const checkpoints = rows.reduce((max, { record }) => Math.max(max, record.COUNT + 1), 0);
  const outputs = runMonteCarlo(seed, checkpoints);

  const failures: CavpFailure[] = [];
  rows.forEach(({ raw, record }, index) => {
    const actual = bytesToHex(outputs[record.COUNT]!);
    if (actual !== record.MD) {
      failures.push({
        index,
        line: raw.line,
        count: record.COUNT,
        expected: record.MD,
        actual,
      });
    }
  });

  return summarize("monte-carlo", records.length, 0, failures);
}

/**
 * Parse and validate a CAVP response file.
 *
 * @throws CavpError when the file cannot be parsed or a record fails its
 *   schema. Digest mismatches are reported, not thrown.
 */
export function validateResponseFile(text: string): CavpReport {
  const file = parseResponseFile(text);
  parseWith(ParametersSchema, file.parameters, "section parameters");

  return file.seed === undefined
    ? validateMessages(file.records)
    : validateMonteCarlo(file.seed, file.records);
}
