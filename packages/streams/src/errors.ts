/**
 * Stream ledger errors.
 *
 * Every failure aborts the whole operation with no partial state change.
 * Codes are stable and caller-visible so clients can branch on the cause.
 */

export type StreamErrorCode =
  | "NO_ACTIVE_STREAM"
  | "NOT_ENOUGH_FUNDS_IN_STREAM"
  | "NOT_ENOUGH_FUNDS_IN_CONTRACT"
  | "TRANSFER_FAILED"
  | "INVALID_ARRAY_INPUT"
  | "NOT_OWNER"
  | "INVALID_ADDRESS"
  | "INVALID_CAP"
  | "INVALID_AMOUNT"
  | "STREAM_EXISTS"
  | "ARITHMETIC_OVERFLOW"
  | "INVALID_SNAPSHOT";

export class StreamError extends Error {
  public readonly code: StreamErrorCode;
  constructor(code: StreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StreamError";
    this.code = code;
  }
}

export function isStreamError(err: unknown): err is StreamError {
  return err instanceof StreamError;
}

/**
 * Thrown by a gateway when a transfer was broadcast but its outcome could
 * not be observed. The funds may already have moved.
 */
export class TransferPendingError extends Error {
  public readonly txHash: string;
  constructor(txHash: string, options?: { cause?: unknown }) {
    super(`Transfer ${txHash} was broadcast but not confirmed`, options);
    this.name = "TransferPendingError";
    this.txHash = txHash;
  }
}
