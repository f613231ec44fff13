/**
 * Argument parsing and command dispatch for `fips-sha256`.
 *
 * Kept apart from the bin entry point so it can be driven in process.
 */

import {
  EXIT_ERROR,
  EXIT_OK,
  cmdCavp,
  cmdConfigShow,
  cmdHashFile,
  cmdHashPrompt,
  cmdHashString,
  cmdVectorsCheck,
  cmdVectorsGenerate,
  type GenerateArgs,
} from "./commands.js";
import {
  ConfigError,
  parseIntegerFlag,
  resolveConfig,
  type Fips256Config,
} from "./config.js";

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Short flags that always consume the next argument, even "" or "-x". */
const SHORT_VALUE_FLAGS: ReadonlyMap<string, string> = new Map([
  ["-s", "string"],
  ["-f", "file"],
]);

const SHORT_BOOL_FLAGS: ReadonlyMap<string, string> = new Map([["-h", "help"]]);

/** Long flags that never take a value. */
const LONG_BOOL_FLAGS: ReadonlySet<string> = new Set(["json", "help"]);

/** Long flags that take the next argument as their value. */
const LONG_VALUE_FLAGS: ReadonlySet<string> = new Set(["out", "count", "max-length"]);

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string>;
  boolFlags: Set<string>;
  /** Flags given without their required value. */
  missing: string[];
  /** Arguments that look like flags but are not recognised ones. */
  unknown: string[];
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const boolFlags = new Set<string>();
  const missing: string[] = [];
  const unknown: string[] = [];

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i]!;
    const shortValue = SHORT_VALUE_FLAGS.get(arg);
    const shortBool = SHORT_BOOL_FLAGS.get(arg);

    if (shortValue !== undefined) {
      const next = argv[i + 1];
      if (next === undefined) {
        missing.push(arg);
      } else {
        flags.set(shortValue, next);
      }
      i += 2;
    } else if (shortBool !== undefined) {
      boolFlags.add(shortBool);
      i += 1;
    } else if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (LONG_BOOL_FLAGS.has(name)) {
        boolFlags.add(name);
        i += 1;
      } else if (!LONG_VALUE_FLAGS.has(name)) {
        unknown.push(arg);
        i += 1;
      } else if (next !== undefined && !next.startsWith("--")) {
        flags.set(name, next);
        i += 2;
      } else {
        missing.push(arg);
        i += 1;
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      unknown.push(arg);
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags, missing, unknown };
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export const USAGE = `fips-sha256 — FIPS 180-4 SHA-256

Usage:
  fips-sha256 -s "string to hash"
  fips-sha256 -f filename.txt
  fips-sha256                                  (prompts for one line on stdin)
  fips-sha256 cavp <file.rsp> [--json]
  fips-sha256 vectors generate [--out <path>] [--count <n>] [--max-length <n>]
  fips-sha256 vectors check [<path>] [--json]
  fips-sha256 config show [--json]

Exit codes:
  0 = success
  1 = usage or I/O error
  3 = conformance check failed

Environment:
  FIPS256_VECTORS_PATH        Default vector file (./test_vectors.json)
  FIPS256_VECTOR_COUNT        Vectors written by \`vectors generate\` (100)
  FIPS256_VECTOR_MAX_LENGTH   Longest random input in characters (512)
`;

function usageError(message: string): number {
  process.stderr.write(`${message}\n\n${USAGE}`);
  return EXIT_ERROR;
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export interface RunOptions {
  /** Source for the interactive prompt. Defaults to process.stdin. */
  input?: NodeJS.ReadableStream;
  /** Environment for configuration. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

function withConfig(
  env: NodeJS.ProcessEnv,
  command: (config: Fips256Config) => number,
): number {
  let config: Fips256Config;
  try {
    config = resolveConfig(env);
  } catch (e: unknown) {
    if (e instanceof ConfigError) {
      process.stderr.write(`error: ${e.message}\n`);
      return EXIT_ERROR;
    }
    throw e;
  }
  return command(config);
}

function generateArgs(flags: Map<string, string>): GenerateArgs {
  const args: GenerateArgs = {};
  const outPath = flags.get("out");
  const count = flags.get("count");
  const maxLength = flags.get("max-length");
  if (outPath !== undefined) args.out = outPath;
  if (count !== undefined) args.count = parseIntegerFlag("count", count, 1);
  if (maxLength !== undefined) {
    args.maxLength = parseIntegerFlag("max-length", maxLength, 0);
  }
  return args;
}

export async function runCli(
  argv: readonly string[],
  options: RunOptions = {},
): Promise<number> {
  const { positional, flags, boolFlags, missing, unknown } = parseArgs(argv);
  const env = options.env ?? process.env;
  const json = boolFlags.has("json");

  if (boolFlags.has("help") || positional[0] === "help") {
    process.stdout.write(USAGE);
    return EXIT_OK;
  }
  if (unknown.length > 0) {
    return usageError(`Unknown option: ${unknown[0]}`);
  }
  if (missing.length > 0) {
    return usageError(`Missing value for ${missing[0]}`);
  }

  // Hash modes: -s, -f, or a bare invocation.
  const text = flags.get("string");
  const file = flags.get("file");
  if (text !== undefined || file !== undefined) {
    if (positional.length > 0 || (text !== undefined && file !== undefined)) {
      return usageError("Use exactly one of -s <text> or -f <file>");
    }
    if (text !== undefined) return cmdHashString(text);
  }
  if (file !== undefined) {
    return cmdHashFile(file);
  }
  if (positional.length === 0) {
    return cmdHashPrompt(options.input ?? process.stdin);
  }

  const command = positional[0];
  switch (command) {
    case "cavp": {
      const rsp = positional[1];
      if (!rsp) {
        return usageError("Usage: fips-sha256 cavp <file.rsp> [--json]");
      }
      return cmdCavp(rsp, json);
    }

    case "vectors":
      if (positional[1] === "generate") {
        return withConfig(env, (config) => {
          try {
            return cmdVectorsGenerate(generateArgs(flags), config);
          } catch (e: unknown) {
            if (e instanceof ConfigError) {
              return usageError(e.message);
            }
            throw e;
          }
        });
      }
      if (positional[1] === "check") {
        return withConfig(env, (config) =>
          cmdVectorsCheck(positional[2], config, json),
        );
      }
      return usageError("Unknown vectors subcommand. Use: vectors generate | vectors check");

    case "config":
      if (positional[1] === "show") {
        return withConfig(env, (config) => cmdConfigShow(config, json));
      }
      return usageError("Unknown config subcommand. Use: config show");

    default:
      return usageError(`Unknown command: ${command}`);
  }
}
