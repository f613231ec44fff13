/**
 * CAVP conformance error types.
 */

export type CavpErrorCode =
  | "RSP_PARSE_FAILED"
  | "RSP_SCHEMA_INVALID"
  | "MONTE_SEED_INVALID";

export class CavpError extends Error {
  public readonly code: CavpErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: CavpErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CavpError";
    this.code = code;
    this.details = details ?? {};
  }
}
