/**
 * ClientError — structured error class for tagpool defects.
 *
 * Thrown only for programming errors (a reply completed twice, a response
 * read before completion, a blocking call made from the dispatch loop).
 * Recoverable failures never throw; they finish the reply unsuccessfully.
 */

import type { ErrorCodeValue } from '../types/errors.js';
import { FATAL_CODES } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Private symbol used to brand ClientError instances so the check holds
 * across duplicated module copies.
 */
const CLIENT_ERROR_BRAND = Symbol.for('tagpool.ClientError');

// ---------------------------------------------------------------------------
// ClientError class
// ---------------------------------------------------------------------------

export class ClientError extends Error {
  /** Machine-readable error code. */
  readonly code: ErrorCodeValue;

  /** @internal Brand for safe instanceof checks across module boundaries. */
  readonly [CLIENT_ERROR_BRAND] = true as const;

  constructor(code: ErrorCodeValue, message: string) {
    super(message);
    this.name = 'ClientError';
    this.code = code;
  }

  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isClientError(value: unknown): value is ClientError {
  if (value instanceof ClientError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    CLIENT_ERROR_BRAND in value &&
    value[CLIENT_ERROR_BRAND] === true
  );
}

/**
 * True when the error, or any error aggregated inside it, is a fatal
 * ClientError.
 */
export function isFatalClientError(value: unknown): boolean {
  if (value instanceof AggregateError) {
    return value.errors.some((inner: unknown) => isFatalClientError(inner));
  }
  return isClientError(value) && FATAL_CODES.has(value.code);
}
