/**
 * Payload validation for worker messages.
 *
 * Validates request and response payloads against the per-operation JSON
 * Schemas using ajv, after rejecting prototype pollution keys. Schemas are
 * compiled once when the validator is constructed and reused for every
 * message; a successful check narrows the payload to the operation's type.
 */

import _Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import type { OperationName, RequestOf, ResponseOf } from '../types/protocol.js';
import { REQUEST_SCHEMAS, RESPONSE_SCHEMAS } from '../types/message-schema.js';

// ---------------------------------------------------------------------------
// Prototype pollution keys
// ---------------------------------------------------------------------------

const POLLUTION_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

// ---------------------------------------------------------------------------
// Validation result
// ---------------------------------------------------------------------------

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

type RequestValidators = { [P in OperationName]: ValidateFunction<RequestOf<P>> };
type ResponseValidators = { [P in OperationName]: ValidateFunction<ResponseOf<P>> };

// ---------------------------------------------------------------------------
// MessageValidator
// ---------------------------------------------------------------------------

export class MessageValidator {
  private readonly requests: RequestValidators;
  private readonly responses: ResponseValidators;

  constructor() {
    const ajv: InstanceType<typeof Ajv> = new Ajv({ allErrors: true, strict: false });

    this.requests = {
      read_file: ajv.compile<RequestOf<'read_file'>>(REQUEST_SCHEMAS.read_file),
      save_file: ajv.compile<RequestOf<'save_file'>>(REQUEST_SCHEMAS.save_file),
      save_song_statistics_to_file: ajv.compile<RequestOf<'save_song_statistics_to_file'>>(
        REQUEST_SCHEMAS.save_song_statistics_to_file,
      ),
      save_song_rating_to_file: ajv.compile<RequestOf<'save_song_rating_to_file'>>(
        REQUEST_SCHEMAS.save_song_rating_to_file,
      ),
      is_media_file: ajv.compile<RequestOf<'is_media_file'>>(REQUEST_SCHEMAS.is_media_file),
      load_embedded_art: ajv.compile<RequestOf<'load_embedded_art'>>(
        REQUEST_SCHEMAS.load_embedded_art,
      ),
      read_cloud_file: ajv.compile<RequestOf<'read_cloud_file'>>(REQUEST_SCHEMAS.read_cloud_file),
      network_statistics: ajv.compile<RequestOf<'network_statistics'>>(
        REQUEST_SCHEMAS.network_statistics,
      ),
    };

    this.responses = {
      read_file: ajv.compile<ResponseOf<'read_file'>>(RESPONSE_SCHEMAS.read_file),
      save_file: ajv.compile<ResponseOf<'save_file'>>(RESPONSE_SCHEMAS.save_file),
      save_song_statistics_to_file: ajv.compile<ResponseOf<'save_song_statistics_to_file'>>(
        RESPONSE_SCHEMAS.save_song_statistics_to_file,
      ),
      save_song_rating_to_file: ajv.compile<ResponseOf<'save_song_rating_to_file'>>(
        RESPONSE_SCHEMAS.save_song_rating_to_file,
      ),
      is_media_file: ajv.compile<ResponseOf<'is_media_file'>>(RESPONSE_SCHEMAS.is_media_file),
      load_embedded_art: ajv.compile<ResponseOf<'load_embedded_art'>>(
        RESPONSE_SCHEMAS.load_embedded_art,
      ),
      read_cloud_file: ajv.compile<ResponseOf<'read_cloud_file'>>(
        RESPONSE_SCHEMAS.read_cloud_file,
      ),
      network_statistics: ajv.compile<ResponseOf<'network_statistics'>>(
        RESPONSE_SCHEMAS.network_statistics,
      ),
    };
  }

  /** Check a request payload received by a worker. */
  validateRequest<K extends OperationName>(
    operation: K,
    body: unknown,
  ): ValidationResult<RequestOf<K>> {
    const validate: ValidateFunction<RequestOf<K>> = this.requests[operation];
    return this.check(validate, body);
  }

  /** Check a response payload received from a worker. */
  validateResponse<K extends OperationName>(
    operation: K,
    body: unknown,
  ): ValidationResult<ResponseOf<K>> {
    const validate: ValidateFunction<ResponseOf<K>> = this.responses[operation];
    return this.check(validate, body);
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private check<T>(validate: ValidateFunction<T>, body: unknown): ValidationResult<T> {
    const pollutionErrors = this.checkPollutionKeys(body, '');
    if (pollutionErrors.length > 0) {
      return { valid: false, errors: pollutionErrors };
    }

    if (validate(body)) {
      return { valid: true, value: body };
    }

    return { valid: false, errors: (validate.errors ?? []).map(formatError) };
  }

  /**
   * Recursively check for prototype pollution keys in an object.
   */
  private checkPollutionKeys(value: unknown, path: string): string[] {
    if (value === null || typeof value !== 'object') {
      return [];
    }

    const errors: string[] = [];
    for (const [key, child] of Object.entries(value)) {
      if (POLLUTION_KEYS.has(key)) {
        errors.push(`${path}/${key}: prototype pollution key "${key}" is not allowed`);
      }
      errors.push(...this.checkPollutionKeys(child, `${path}/${key}`));
    }
    return errors;
  }
}

function formatError(err: ErrorObject): string {
  const path = err.instancePath || '';
  if (err.keyword === 'required' && typeof err.params['missingProperty'] === 'string') {
    return `${path}: required property "${err.params['missingProperty']}" is missing`;
  }
  return `${path}: ${err.message ?? 'unknown error'}`;
}
