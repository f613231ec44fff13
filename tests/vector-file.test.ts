import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  VectorFileError,
  checkVectors,
  generateVectors,
  randomInput,
  readVectorFile,
  referenceHash,
  writeVectorFile,
  type TestVector,
} from "../src/vectors/vector-file.js";
import { PRINTABLE } from "../src/vectors/charset.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Deterministic LCG in place of crypto.randomInt. */
function seeded(seed: number): (maxExclusive: number) => number {
  let s = seed >>> 0;
  return (maxExclusive) => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return s % maxExclusive;
  };
}

/** Replays fixed values, in order. */
function sequence(values: number[]): (maxExclusive: number) => number {
  let i = 0;
  return () => values[i++] ?? 0;
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

const EMPTY_DIGEST =
  "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

// ===================================================================
// Generation
// ===================================================================

describe("PRINTABLE", () => {
  it("holds the 100 printable ASCII characters", () => {
    expect(PRINTABLE).toHaveLength(100);
    expect(new Set(PRINTABLE).size).toBe(100);
    expect(PRINTABLE.startsWith("0123456789abc")).toBe(true);
    expect(PRINTABLE.endsWith(" \t\n\r\x0b\x0c")).toBe(true);
  });
});

describe("randomInput", () => {
  it("draws a length, then one character per position", () => {
    expect(randomInput(3, sequence([3, 0, 10, 36]))).toBe("0aA");
  });

  it("can produce the empty string", () => {
    expect(randomInput(512, sequence([0]))).toBe("");
  });
});

describe("generateVectors", () => {
  it("produces the requested count within the length bound", () => {
    const vectors = generateVectors({ count: 25, maxLength: 40, random: seeded(7) });
    expect(vectors).toHaveLength(25);
    for (const v of vectors) {
      expect(v.input.length).toBeLessThanOrEqual(40);
      expect([...v.input].every((c) => PRINTABLE.includes(c))).toBe(true);
      expect(v.hash).toBe(referenceHash(v.input));
    }
  });

  it("is reproducible for the same random source", () => {
    const a = generateVectors({ count: 5, maxLength: 64, random: seeded(42) });
    const b = generateVectors({ count: 5, maxLength: 64, random: seeded(42) });
    expect(a).toEqual(b);
  });

  it("uses crypto.randomInt when no source is given", () => {
    const vectors = generateVectors({ count: 3, maxLength: 8 });
    expect(vectors).toHaveLength(3);
    expect(checkVectors(vectors).ok).toBe(true);
  });

  it("pairs the empty input with the empty-string digest", () => {
    expect(generateVectors({ count: 1, maxLength: 10, random: () => 0 })).toEqual([
      { input: "", hash: EMPTY_DIGEST },
    ]);
  });
});

// ===================================================================
// Checking
// ===================================================================

describe("checkVectors", () => {
  it("passes vectors generated from node:crypto", () => {
    const vectors = generateVectors({ count: 50, maxLength: 300, random: seeded(1) });
    expect(checkVectors(vectors)).toEqual({
      total: 50,
      passed: 50,
      failed: 0,
      ok: true,
      failures: [],
    });
  });

  it("reports a tampered vector", () => {
    const wrong = "0".repeat(64);
    const vectors: TestVector[] = [
      { input: "", hash: EMPTY_DIGEST },
      { input: "abc", hash: wrong },
    ];
    const report = checkVectors(vectors);
    expect(report.ok).toBe(false);
    expect(report.failures).toEqual([
      {
        index: 1,
        input: "abc",
        expected: wrong,
        actual: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
      },
    ]);
  });
});

// ===================================================================
// File I/O
// ===================================================================

describe("vector files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "fips256-vectors-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes pretty-printed JSON and reads it back", () => {
    const vectors = generateVectors({ count: 4, maxLength: 20, random: seeded(3) });
    const path = writeVectorFile(join(dir, "v.json"), vectors);

    expect(readFileSync(path, "utf8")).toBe(JSON.stringify(vectors, null, 2) + "\n");
    expect(readVectorFile(path)).toEqual(vectors);
  });

  it("reports a missing file", () => {
    const e = thrown(() => readVectorFile(join(dir, "missing.json")));
    expect(e).toBeInstanceOf(VectorFileError);
    expect(e).toMatchObject({ code: "VECTOR_FILE_NOT_FOUND" });
  });

  it("reports invalid JSON", () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, "{ not json");
    expect(thrown(() => readVectorFile(path))).toMatchObject({
      code: "VECTOR_FILE_INVALID",
    });
  });

  it("reports a record with a malformed hash", () => {
    const path = join(dir, "bad-hash.json");
    writeFileSync(path, JSON.stringify([{ input: "a", hash: "XYZ" }]));
    expect(thrown(() => readVectorFile(path))).toMatchObject({
      code: "VECTOR_FILE_INVALID",
      message: "Vector file failed validation at 0.hash: Must be a 64-char lowercase hex digest",
    });
  });
});
