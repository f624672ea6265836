export type QueueErrorCode =
  | "DUPLICATE_KEY"
  | "NOT_FOUND"
  | "EMPTY_QUEUE"
  | "INSUFFICIENT_ELEMENTS"
  | "LENGTH_MISMATCH"
  | "INCOMPATIBLE_QUEUE_TYPE"
  | "INVALID_PRIORITY"
  | "CORRUPT_SNAPSHOT";

/**
 * Precondition failure of a queue operation. The queue is left exactly as it
 * was before the failing call.
 */
export class QueueError extends Error {
  readonly code: QueueErrorCode;
  /** The offending key, when the failure concerns one. */
  readonly value?: unknown;

  constructor(code: QueueErrorCode, message: string, value?: unknown) {
    super(message);
    this.name = "QueueError";
    this.code = code;
    this.value = value;
  }
}

export function isQueueError(e: unknown): e is QueueError {
  return e instanceof QueueError;
}
