/**
 * Completion dispatcher — the pool's single dispatch loop.
 *
 * Every reply completion is delivered through one serial task queue: a task
 * (finishing a reply and running its listeners, including any promise a
 * listener returns) completes before the next one starts. Tasks run inside
 * an AsyncLocalStorage frame so code can tell whether it is executing on
 * the loop, directly or through an async continuation of a listener.
 *
 * Awaiting a reply from inside that frame can never resolve: the awaited
 * completion is queued behind the task doing the waiting. The blocking
 * client calls therefore refuse to start there (see
 * {@link CompletionDispatcher.assertNotDispatching}).
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ErrorCode } from '../types/errors.js';
import { ClientError, isFatalClientError } from './client-error.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Receives defects raised while a task ran. */
export type FatalErrorHandler = (error: unknown, label: string) => void;

export interface CompletionDispatcherOptions {
  logger?: Logger;
  /**
   * Called with fatal ClientErrors escaping a task. Defaults to re-throwing
   * on a fresh tick, which terminates the process.
   */
  onFatal?: FatalErrorHandler;
}

/** Frame stored for the duration of a task. */
interface DispatchFrame {
  label: string;
}

function crash(error: unknown): void {
  process.nextTick(() => {
    throw error;
  });
}

// ---------------------------------------------------------------------------
// CompletionDispatcher
// ---------------------------------------------------------------------------

export class CompletionDispatcher {
  private readonly storage = new AsyncLocalStorage<DispatchFrame>();
  private readonly logger: Logger;
  private readonly onFatal: FatalErrorHandler;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(options?: CompletionDispatcherOptions) {
    this.logger = options?.logger ?? createLogger('dispatcher');
    this.onFatal = options?.onFatal ?? crash;
  }

  /**
   * Queue a task behind every task scheduled before it.
   *
   * The task's errors never reject anything: fatal ones go to `onFatal`,
   * the rest are logged.
   */
  schedule(label: string, task: () => void | Promise<void>): void {
    this.queued += 1;
    this.tail = this.tail.then(() => this.run(label, task));
  }

  /** True when the caller runs on the dispatch loop. */
  isDispatching(): boolean {
    return this.storage.getStore() !== undefined;
  }

  /**
   * Refuse to continue on the dispatch loop.
   *
   * @param operation - Name of the blocking call, for the error message.
   * @throws ClientError(DISPATCH_LOOP_VIOLATION)
   */
  assertNotDispatching(operation: string): void {
    const frame = this.storage.getStore();
    if (frame === undefined) return;

    throw new ClientError(
      ErrorCode.DISPATCH_LOOP_VIOLATION,
      `${operation} called on the completion dispatch loop (inside "${frame.label}"); ` +
        'waiting there would deadlock',
    );
  }

  /** Number of tasks scheduled and not yet finished. */
  get pendingTasks(): number {
    return this.queued;
  }

  /** Resolve once every task scheduled so far, and any they schedule, has run. */
  async drain(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.tail;
      await current;
    } while (current !== this.tail);
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async run(label: string, task: () => void | Promise<void>): Promise<void> {
    try {
      await this.storage.run({ label }, task);
    } catch (error: unknown) {
      if (isFatalClientError(error)) {
        this.logger.error('fatal error on dispatch loop', { task: label, error });
        this.onFatal(error, label);
      } else {
        this.logger.error('completion task failed', { task: label, error });
      }
    } finally {
      this.queued -= 1;
    }
  }
}
