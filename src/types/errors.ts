/**
 * Error codes for the tag-reader client.
 *
 * Recoverable conditions (no worker, worker-reported failure, malformed
 * answer, timeout) surface as unsuccessful replies and log lines. Only the
 * fatal codes are ever thrown at callers.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  /** No live worker could take the request. */
  WORKER_UNAVAILABLE: 'WORKER_UNAVAILABLE',
  /** No worker registered before the startup deadline. */
  WORKER_FAILED_TO_START: 'WORKER_FAILED_TO_START',
  /** The worker's handler failed and answered with an error frame. */
  WORKER_ERROR: 'WORKER_ERROR',
  /** The worker's answer could not be decoded or failed schema validation. */
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
  /** The optional per-request timeout expired. */
  REQUEST_TIMEOUT: 'REQUEST_TIMEOUT',
  /** A reply or envelope was completed twice, or read before completion. */
  PROTOCOL_VIOLATION: 'PROTOCOL_VIOLATION',
  /** A blocking call was made from the completion dispatch loop. */
  DISPATCH_LOOP_VIOLATION: 'DISPATCH_LOOP_VIOLATION',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Fatal codes
// ---------------------------------------------------------------------------

/** Programming defects. These abort instead of degrading to a neutral value. */
export const FATAL_CODES: ReadonlySet<ErrorCodeValue> = new Set<ErrorCodeValue>([
  ErrorCode.PROTOCOL_VIOLATION,
  ErrorCode.DISPATCH_LOOP_VIOLATION,
]);
