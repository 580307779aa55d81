/**
 * Reply — single-shot future for one outstanding worker request.
 *
 * Lifecycle: `pending` → `finished(success)`, terminal. The pool finishes a
 * reply exactly once, on its dispatch loop; a second completion is a
 * protocol violation. Any caller may poll the state or await
 * {@link Reply.waitForFinished}; the response payload may only be read once
 * the reply has finished successfully.
 */

import { ErrorCode } from '../types/errors.js';
import type { OperationName } from '../types/protocol.js';
import { ClientError } from './client-error.js';
import type { CompletionDispatcher } from './dispatcher.js';
import type { Envelope } from './envelope.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Completion listener. Listeners run once, in registration order; a
 * returned promise is awaited before the next listener runs.
 */
export type FinishedListener = (success: boolean) => void | Promise<void>;

export type ReplyState = { status: 'pending' } | { status: 'finished'; success: boolean };

/** The caller-facing contract shared by plain and broadcast replies. */
export interface ReplyHandle {
  isFinished(): boolean;
  isSuccessful(): boolean;
  waitForFinished(): Promise<boolean>;
  onFinished(listener: FinishedListener): void;
  release(): void;
}

export interface ReplyOptions {
  /** Invoked by {@link Reply.release} while the reply is still pending. */
  onRelease?: () => void;
  /** The loop that runs this reply's listeners; waiting on it is refused. */
  dispatcher?: CompletionDispatcher;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Reply
// ---------------------------------------------------------------------------

export class Reply<K extends OperationName = OperationName> implements ReplyHandle {
  /** The request this reply answers; carries the response once finished. */
  readonly message: Envelope<K>;
  protected readonly logger: Logger;
  private readonly dispatcher: CompletionDispatcher | null;
  private state: ReplyState = { status: 'pending' };
  private listeners: FinishedListener[] = [];
  private readonly settled: Promise<boolean>;
  private resolveSettled: (success: boolean) => void = () => {};
  private onRelease: (() => void) | null;
  private released = false;

  constructor(message: Envelope<K>, options?: ReplyOptions) {
    this.message = message;
    this.onRelease = options?.onRelease ?? null;
    this.dispatcher = options?.dispatcher ?? null;
    this.logger = options?.logger ?? createLogger('reply');
    this.settled = new Promise<boolean>((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get id(): number {
    return this.message.id;
  }

  get operation(): K {
    return this.message.operation;
  }

  get isReleased(): boolean {
    return this.released;
  }

  isFinished(): boolean {
    return this.state.status === 'finished';
  }

  isSuccessful(): boolean {
    return this.state.status === 'finished' && this.state.success;
  }

  /**
   * Resolve with the success flag once finished. Returns the same promise
   * on every call.
   *
   * @throws ClientError(DISPATCH_LOOP_VIOLATION) when called from a task on
   *   the dispatcher that finishes replies.
   */
  waitForFinished(): Promise<boolean> {
    this.dispatcher?.assertNotDispatching(`${this.operation} #${this.id} waitForFinished`);
    return this.settled;
  }

  /**
   * Register a completion listener. On an already finished reply the
   * listener runs once on the next microtask.
   */
  onFinished(listener: FinishedListener): void {
    if (this.released) return;

    if (this.state.status === 'finished') {
      const success = this.state.success;
      void Promise.resolve(success)
        .then(listener)
        .catch((error: unknown) => {
          this.logger.error('late finished listener failed', {
            correlation: this.id,
            operation: this.operation,
            error,
          });
        });
      return;
    }

    this.listeners.push(listener);
  }

  /**
   * Complete the reply and notify listeners.
   *
   * Every listener runs even when an earlier one throws; errors are
   * re-thrown afterwards (several as an AggregateError).
   *
   * @throws ClientError(PROTOCOL_VIOLATION) when already finished.
   */
  async finish(success: boolean): Promise<void> {
    const listeners = this.transition(success);
    const errors: unknown[] = [];

    for (const listener of listeners) {
      try {
        await listener(success);
      } catch (error: unknown) {
        errors.push(error);
      }
    }

    if (errors.length === 1) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} finished listeners failed`);
    }
  }

  /**
   * End the caller's ownership. Drops listeners; a still pending request is
   * forgotten by the pool and its late answer ignored.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.listeners = [];

    if (this.state.status === 'pending' && this.onRelease) {
      this.onRelease();
    }
    this.onRelease = null;
  }

  // -------------------------------------------------------------------------
  // Protected
  // -------------------------------------------------------------------------

  /**
   * Move to `finished` and hand back the listeners to notify. Synchronous,
   * so the state check and the transition cannot interleave with another
   * completion.
   */
  protected transition(success: boolean): FinishedListener[] {
    if (this.state.status === 'finished') {
      throw new ClientError(
        ErrorCode.PROTOCOL_VIOLATION,
        `${this.operation} #${this.id} finished twice`,
      );
    }

    this.state = { status: 'finished', success };
    this.resolveSettled(success);

    const listeners = this.listeners;
    this.listeners = [];
    return listeners;
  }
}
