/**
 * Tokenizer for NIST CAVP response (.rsp) files.
 *
 * Grammar, one construct per line:
 *   # comment
 *   [Name = Value]        section parameter, e.g. [L = 32]
 *   Key = Value           record field
 *
 * A record is closed by its `MD` field. A `Seed` assignment seen outside
 * an open record is the Monte Carlo seed. Field values are kept as raw
 * strings; typing happens in schemas.ts.
 */

import { CavpError } from "./errors.js";

export interface RawRecord {
  /** 1-based line number of the record's first field. */
  line: number;
  fields: Record<string, string>;
}

export interface ResponseFile {
  parameters: Record<string, string>;
  seed?: string;
  records: RawRecord[];
}

const SECTION_RE = /^\[\s*([^=\]]+?)\s*(?:=\s*([^\]]*?)\s*)?\]$/;
const ASSIGN_RE = /^([A-Za-z][A-Za-z0-9]*)\s*=\s*(.*)$/;

export function parseResponseFile(text: string): ResponseFile {
  const parameters: Record<string, string> = {};
  const records: RawRecord[] = [];
  let seed: string | undefined;
  let open: RawRecord | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i]!.trim();
    if (line === "" || line.startsWith("#")) continue;

    const section = SECTION_RE.exec(line);
    if (section) {
      parameters[section[1]!] = section[2] ?? "";
      continue;
    }

    const assign = ASSIGN_RE.exec(line);
    if (!assign) {
      throw new CavpError(
        `Unrecognized line ${lineNo}: ${line}`,
        "RSP_PARSE_FAILED",
        { line: lineNo },
      );
    }
    const key = assign[1]!;
    const value = assign[2]!.trim();

    if (key === "Seed" && open === null) {
      if (seed !== undefined) {
        throw new CavpError(
          `Duplicate Seed at line ${lineNo}`,
          "RSP_PARSE_FAILED",
          { line: lineNo },
        );
      }
      seed = value;
      continue;
    }

    if (open === null) {
      open = { line: lineNo, fields: {} };
    }
    if (key in open.fields) {
      throw new CavpError(
        `Duplicate field ${key} at line ${lineNo}`,
        "RSP_PARSE_FAILED",
        { line: lineNo, key },
      );
    }
    open.fields[key] = value;

    if (key === "MD") {
      records.push(open);
      open = null;
    }
  }

  if (open !== null) {
    throw new CavpError(
      `Record starting at line ${open.line} has no MD`,
      "RSP_PARSE_FAILED",
      { line: open.line },
    );
  }

  return seed === undefined
    ? { parameters, records }
    : { parameters, seed, records };
}
