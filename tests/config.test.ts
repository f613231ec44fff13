import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { ConfigError, parseIntegerFlag, resolveConfig } from "../src/cli/config.js";

const CWD = join("/", "work", "hashes");

describe("resolveConfig", () => {
  it("uses defaults when no overrides are set", () => {
    expect(resolveConfig({}, CWD)).toEqual({
      vectorsPath: join(CWD, "test_vectors.json"),
      vectorCount: 100,
      vectorMaxLength: 512,
    });
  });

  it("applies environment overrides", () => {
    const config = resolveConfig(
      {
        FIPS256_VECTORS_PATH: "data/v.json",
        FIPS256_VECTOR_COUNT: "7",
        FIPS256_VECTOR_MAX_LENGTH: "0",
      },
      CWD,
    );
    expect(config).toEqual({
      vectorsPath: join(CWD, "data", "v.json"),
      vectorCount: 7,
      vectorMaxLength: 0,
    });
  });

  it("keeps an absolute vectors path", () => {
    const abs = join("/", "tmp", "vectors.json");
    expect(resolveConfig({ FIPS256_VECTORS_PATH: abs }, CWD).vectorsPath).toBe(abs);
  });

  it("ignores unrelated variables", () => {
    expect(resolveConfig({ HOME: "/home/x", PATH: "/bin" }, CWD).vectorCount).toBe(100);
  });

  it.each([
    ["FIPS256_VECTOR_COUNT", "0"],
    ["FIPS256_VECTOR_COUNT", "abc"],
    ["FIPS256_VECTOR_COUNT", "2.5"],
    ["FIPS256_VECTOR_MAX_LENGTH", "-1"],
  ])("rejects %s=%s", (name, value) => {
    expect(() => resolveConfig({ [name]: value }, CWD)).toThrow(ConfigError);
  });
});

describe("parseIntegerFlag", () => {
  it("parses an integer at or above the minimum", () => {
    expect(parseIntegerFlag("count", "7", 1)).toBe(7);
    expect(parseIntegerFlag("max-length", "0", 0)).toBe(0);
  });

  it.each(["0", "", " ", "1.5", "ten"])("rejects %j for a minimum of 1", (value) => {
    expect(() => parseIntegerFlag("count", value, 1)).toThrow(ConfigError);
  });

  it("rejects a blank value even when 0 is allowed", () => {
    expect(() => parseIntegerFlag("max-length", "", 0)).toThrow(
      '--max-length must be an integer >= 0, got ""',
    );
  });
});
