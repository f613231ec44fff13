/**
 * Lowercase hex codec for digests and CAVP message fields.
 */

export type HexErrorCode = "HEX_ODD_LENGTH" | "HEX_INVALID_DIGIT";

export class HexError extends Error {
  public readonly code: HexErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: HexErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "HexError";
    this.code = code;
    this.details = details ?? {};
  }
}

const HEX_PAIR_RE = /^[0-9a-fA-F]{2}$/;

export function bytesToHex(bytes: Uint8Array): string {
  let hex = "";
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, "0");
  }
  return hex;
}

/**
 * Decode a hex string. Surrounding whitespace is ignored and an empty
 * string decodes to an empty array.
 */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.trim();
  if (clean.length % 2 !== 0) {
    throw new HexError(
      `Hex string must have even length, got ${clean.length}`,
      "HEX_ODD_LENGTH",
      { length: clean.length },
    );
  }

  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const pair = clean.slice(i * 2, i * 2 + 2);
    if (!HEX_PAIR_RE.test(pair)) {
      throw new HexError(
        `Invalid hex digit in input: ${pair}`,
        "HEX_INVALID_DIGIT",
        { offset: i * 2, pair },
      );
    }
    bytes[i] = parseInt(pair, 16);
  }
  return bytes;
}
