/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments
 *   - calls library functions (no hashing logic here)
 *   - writes to stdout / stderr
 *   - returns an exit code (0 = success, 1 = usage or I/O error,
 *     3 = conformance check failed)
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { hash } from "../core/hash.js";
import { CavpError } from "../cavp/errors.js";
import { validateResponseFile, type CavpReport } from "../cavp/validate.js";
import { HexError } from "../encoding/hex.js";
import { canonicalJson } from "../shared/canonical-json.js";
import {
  VectorFileError,
  checkVectors,
  generateVectors,
  readVectorFile,
  writeVectorFile,
  type VectorCheckReport,
} from "../vectors/vector-file.js";
import { type Fips256Config } from "./config.js";
import { readLine } from "./prompt.js";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_CHECK_FAILED = 3;

export const PROMPT = "Enter string to hash: ";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function err(msg: string): void {
  process.stderr.write(`error: ${msg}\n`);
}

function out(msg: string): void {
  process.stdout.write(msg + "\n");
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function printDigest(digest: string): number {
  out(`SHA-256: ${digest}`);
  return EXIT_OK;
}

// ---------------------------------------------------------------------------
// hash: -s, -f, prompt
// ---------------------------------------------------------------------------

export function cmdHashString(text: string): number {
  return printDigest(hash(text));
}

export function cmdHashFile(path: string): number {
  let data: Buffer;
  try {
    data = readFileSync(resolve(path));
  } catch (e: unknown) {
    err(`Cannot open file: ${path} (${describe(e)})`);
    return EXIT_ERROR;
  }
  return printDigest(hash(data));
}

export async function cmdHashPrompt(
  input: NodeJS.ReadableStream,
): Promise<number> {
  const line = await readLine(PROMPT, input, process.stdout);
  return printDigest(hash(line));
}

// ---------------------------------------------------------------------------
// cavp
// ---------------------------------------------------------------------------

function printCavpReport(file: string, report: CavpReport): void {
  out(
    `${report.kind} file ${file}: ${report.total} records, ` +
      `${report.passed} passed, ${report.failed} failed, ${report.skipped} skipped`,
  );
  for (const f of report.failures) {
    const label = f.len !== undefined ? `Len = ${f.len}` : `COUNT = ${f.count ?? "?"}`;
    out(`  FAIL line ${f.line} (${label})`);
    out(`    expected: ${f.expected}`);
    out(`    actual:   ${f.actual}`);
  }
  out(report.ok ? "PASS" : "FAIL");
}

export function cmdCavp(filePath: string, json: boolean): number {
  const abs = resolve(filePath);
  if (!existsSync(abs)) {
    err(`File not found: ${abs}`);
    return EXIT_ERROR;
  }

  let text: string;
  try {
    text = readFileSync(abs, "utf8");
  } catch (e: unknown) {
    err(`Cannot open file: ${abs} (${describe(e)})`);
    return EXIT_ERROR;
  }

  let report: CavpReport;
  try {
    report = validateResponseFile(text);
  } catch (e: unknown) {
    if (e instanceof CavpError || e instanceof HexError) {
      err(`${e.code}: ${e.message}`);
      return EXIT_ERROR;
    }
    throw e;
  }

  if (json) {
    out(canonicalJson({ file: abs, ...report }));
  } else {
    printCavpReport(abs, report);
  }
  return report.ok ? EXIT_OK : EXIT_CHECK_FAILED;
}

// ---------------------------------------------------------------------------
// vectors generate / check
// ---------------------------------------------------------------------------

export interface GenerateArgs {
  out?: string;
  count?: number;
  maxLength?: number;
}

export function cmdVectorsGenerate(
  args: GenerateArgs,
  config: Fips256Config,
): number {
  const count = args.count ?? config.vectorCount;
  const vectors = generateVectors({
    count,
    maxLength: args.maxLength ?? config.vectorMaxLength,
  });
  const target = resolve(args.out ?? config.vectorsPath);

  let path: string;
  try {
    path = writeVectorFile(target, vectors);
  } catch (e: unknown) {
    err(`Cannot write file: ${target} (${describe(e)})`);
    return EXIT_ERROR;
  }
  out(`Generated ${count} test vectors to ${path}`);
  return EXIT_OK;
}

function printVectorReport(path: string, report: VectorCheckReport): void {
  out(
    `vectors ${path}: ${report.total} vectors, ` +
      `${report.passed} passed, ${report.failed} failed`,
  );
  for (const f of report.failures) {
    out(`  FAIL #${f.index} input ${JSON.stringify(f.input)}`);
    out(`    expected: ${f.expected}`);
    out(`    actual:   ${f.actual}`);
  }
  out(report.ok ? "PASS" : "FAIL");
}

export function cmdVectorsCheck(
  filePath: string | undefined,
  config: Fips256Config,
  json: boolean,
): number {
  const path = resolve(filePath ?? config.vectorsPath);

  let report: VectorCheckReport;
  try {
    report = checkVectors(readVectorFile(path));
  } catch (e: unknown) {
    if (e instanceof VectorFileError) {
      err(`${e.code}: ${e.message}`);
      return EXIT_ERROR;
    }
    throw e;
  }

  if (json) {
    out(canonicalJson({ file: path, ...report }));
  } else {
    printVectorReport(path, report);
  }
  return report.ok ? EXIT_OK : EXIT_CHECK_FAILED;
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(config: Fips256Config, json: boolean): number {
  if (json) {
    out(canonicalJson(config));
  } else {
    out(`vectorsPath:     ${config.vectorsPath}`);
    out(`vectorCount:     ${config.vectorCount}`);
    out(`vectorMaxLength: ${config.vectorMaxLength}`);
  }
  return EXIT_OK;
}
