/**
 * Interactive input: print a prompt, read one line.
 */

import { createInterface } from "node:readline";

/**
 * Write `prompt` to `output` and resolve with the first line read from
 * `input`, without its line terminator. Resolves with "" if `input` ends
 * before a line arrives.
 */
export async function readLine(
  prompt: string,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Promise<string> {
  output.write(prompt);
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      return line;
    }
    return "";
  } finally {
    rl.close();
  }
}
