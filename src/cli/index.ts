#!/usr/bin/env node
/**
 * fips-sha256 — CLI entry point.
 *
 * Usage:
 *   fips-sha256 -s <text>                 Hash a literal string
 *   fips-sha256 -f <path>                 Hash a file's raw bytes
 *   fips-sha256                           Prompt and hash one line of stdin
 *   fips-sha256 cavp <file.rsp>           Validate against a CAVP response file
 *   fips-sha256 vectors generate|check    Random test vectors vs node:crypto
 *   fips-sha256 config show               Show resolved configuration
 */

import { runCli } from "./run.js";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    process.stderr.write(`Fatal: ${e instanceof Error ? e.message : String(e)}\n`);
    process.exit(2);
  },
);
