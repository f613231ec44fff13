/**
 * Hash-engine error types.
 *
 * The engine is total over byte input; these only fire when a caller
 * drives `compress` directly with a buffer or state that breaks its
 * preconditions.
 */

export type HashErrorCode = "BLOCK_MISALIGNED" | "STATE_INVALID";

export class HashError extends Error {
  public readonly code: HashErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: HashErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "HashError";
    this.code = code;
    this.details = details ?? {};
  }
}
