/**
 * Envelope — one typed request and, once answered, its typed response.
 *
 * An envelope is either request-only (in flight) or request+response
 * (answered); it is never response-only. The request payload is an owned
 * copy and never changes; the response is written exactly once by the pool.
 */

import { ErrorCode } from '../types/errors.js';
import { requestField } from '../types/protocol.js';
import type { OperationName, RequestOf, ResponseOf } from '../types/protocol.js';
import { ClientError } from './client-error.js';

export class Envelope<K extends OperationName = OperationName> {
  /** Correlation number; assigned by the pool on dispatch, 0 before that. */
  readonly id: number;
  readonly operation: K;
  readonly request: RequestOf<K>;
  private answer: { response: ResponseOf<K> } | null = null;

  private constructor(id: number, operation: K, request: RequestOf<K>) {
    this.id = id;
    this.operation = operation;
    this.request = request;
  }

  /** Build an unsent request envelope. */
  static request<K extends OperationName>(operation: K, request: RequestOf<K>): Envelope<K> {
    return new Envelope(0, operation, structuredClone(request));
  }

  /** An owned, unanswered copy of this request under a new correlation id. */
  withId(id: number): Envelope<K> {
    return new Envelope(id, this.operation, structuredClone(this.request));
  }

  get answered(): boolean {
    return this.answer !== null;
  }

  /**
   * The worker's response.
   *
   * @throws ClientError(PROTOCOL_VIOLATION) when read before the answer.
   */
  get response(): ResponseOf<K> {
    if (this.answer === null) {
      throw new ClientError(
        ErrorCode.PROTOCOL_VIOLATION,
        `Response of ${this.operation} #${this.id} read before it was answered`,
      );
    }
    return this.answer.response;
  }

  /**
   * Record the worker's response.
   *
   * @throws ClientError(PROTOCOL_VIOLATION) when already answered.
   */
  setResponse(response: ResponseOf<K>): void {
    if (this.answer !== null) {
      throw new ClientError(
        ErrorCode.PROTOCOL_VIOLATION,
        `${this.operation} #${this.id} answered twice`,
      );
    }
    this.answer = { response };
  }

  /** Wire form: `{ id, "<operation>_request": payload }`. */
  toWire(): Record<string, unknown> {
    return { id: this.id, [requestField(this.operation)]: this.request };
  }
}
