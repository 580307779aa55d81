/**
 * ZeroMQ ROUTER-side worker pool.
 *
 * The pool binds a ROUTER socket; every worker process connects a DEALER,
 * announces itself with a `ready` frame and from then on answers requests
 * routed to it. Requests go to live workers round-robin; each outstanding
 * request is tracked by correlation id until its answer arrives, the
 * worker leaves, the optional timeout expires or the pool closes. All
 * completions are delivered on the pool's {@link CompletionDispatcher}.
 *
 * Workers are keyed by the hex form of their routing id; the socket
 * layer in types/socket.ts describes the frame layout.
 */

import { ErrorCode, type ErrorCodeValue } from '../types/errors.js';
import type { OperationName } from '../types/protocol.js';
import {
  EMPTY_DELIMITER,
  workerIdentity,
  workerKey,
  type RouterSocket,
  type SocketFactory,
} from '../types/socket.js';
import { CompletionDispatcher } from './dispatcher.js';
import type { Envelope } from './envelope.js';
import { createLogger, type Logger } from './logger.js';
import { MessageValidator } from './message-validator.js';
import { Reply } from './reply.js';
import { decodeWorkerFrame, encodeFrame } from './wire-codec.js';
import type { WorkerFailedToStartHandler, WorkerPool } from './worker-pool.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ZmqWorkerPoolOptions {
  /** Transport address the ROUTER binds (e.g. "ipc:///tmp/tagpool-workers.sock"). */
  address: string;
  /** Workers the pool expects; also the broadcast fan-out. */
  workerCount: number;
  /** How long start() waits for `workerCount` workers to say ready. */
  startupTimeoutMs: number;
  /** Per-request deadline in milliseconds. 0 or absent disables it. */
  requestTimeoutMs?: number;
  logger?: Logger;
  dispatcher?: CompletionDispatcher;
  validator?: MessageValidator;
}

// ---------------------------------------------------------------------------
// Internal records
// ---------------------------------------------------------------------------

interface WorkerEntry {
  /** ROUTER connection identity as a hex string. */
  identity: string;
  pid: number | null;
}

/** An outstanding request. The closures capture its typed reply. */
interface PendingRequest {
  operation: OperationName;
  worker: string;
  startedAt: number;
  timer: ReturnType<typeof setTimeout> | null;
  accept(operation: OperationName, body: unknown): void;
  fail(code: ErrorCodeValue, reason: string): void;
}

// ---------------------------------------------------------------------------
// ZmqWorkerPool
// ---------------------------------------------------------------------------

export class ZmqWorkerPool implements WorkerPool {
  readonly dispatcher: CompletionDispatcher;
  private readonly factory: SocketFactory;
  private readonly options: ZmqWorkerPoolOptions;
  private readonly logger: Logger;
  private readonly validator: MessageValidator;
  private socket: RouterSocket | null = null;
  private readonly workers: WorkerEntry[] = [];
  private readonly pending: Map<number, PendingRequest> = new Map();
  private readonly failedToStartHandlers: WorkerFailedToStartHandler[] = [];
  private startupWaiter: (() => void) | null = null;
  private nextId = 1;
  private nextWorker = 0;
  private closed = false;

  constructor(factory: SocketFactory, options: ZmqWorkerPoolOptions) {
    this.factory = factory;
    this.options = options;
    this.logger = options.logger ?? createLogger('worker-pool');
    this.dispatcher = options.dispatcher ?? new CompletionDispatcher({ logger: this.logger });
    this.validator = options.validator ?? new MessageValidator();
  }

  get liveWorkerCount(): number {
    return this.workers.length;
  }

  get expectedWorkerCount(): number {
    return this.options.workerCount;
  }

  /** Number of requests awaiting an answer. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Bind the ROUTER socket and wait for the expected workers.
   *
   * @throws If the pool was already started or has been closed.
   */
  async start(): Promise<void> {
    if (this.socket || this.closed) {
      throw new Error('ZmqWorkerPool is already started');
    }

    const socket = this.factory.createRouter();
    socket.on('message', (identity: Buffer, delimiter: Buffer, payload: Buffer) => {
      this.handleIncoming(identity, delimiter, payload);
    });
    this.socket = socket;

    await socket.bind(this.options.address);
    this.logger.info('ROUTER socket bound', { address: this.options.address });
    if (this.closed) return;

    await this.waitForWorkers();
    if (this.closed) return;

    const expected = this.options.workerCount;
    const live = this.workers.length;
    if (live === 0) {
      this.logger.error('no worker registered before the startup deadline', {
        error_code: ErrorCode.WORKER_FAILED_TO_START,
        expected,
        startup_timeout_ms: this.options.startupTimeoutMs,
      });
      for (const handler of this.failedToStartHandlers) {
        handler();
      }
    } else if (live < expected) {
      this.logger.warn('fewer workers than expected', { live, expected });
    } else {
      this.logger.info('worker pool ready', { live });
    }
  }

  onWorkerFailedToStart(handler: WorkerFailedToStartHandler): void {
    this.failedToStartHandlers.push(handler);
  }

  sendMessageWithReply<K extends OperationName>(message: Envelope<K>): Reply<K> {
    const envelope = message.withId(this.nextId++);
    const reply = this.createReply(envelope);

    const worker = this.selectWorker();
    if (worker === null) {
      this.logger.warn('no live worker for request', {
        correlation: envelope.id,
        operation: envelope.operation,
        error_code: ErrorCode.WORKER_UNAVAILABLE,
      });
      this.complete(reply, false);
      return reply;
    }

    this.dispatch(reply, worker);
    return reply;
  }

  broadcastMessageWithReply<K extends OperationName>(message: Envelope<K>): Reply<K>[] {
    const replies = this.workers.map((worker) => {
      const reply = this.createReply(message.withId(this.nextId++));
      this.dispatch(reply, worker);
      return reply;
    });

    this.logger.debug('broadcast sent', {
      operation: message.operation,
      workers: replies.length,
    });
    return replies;
  }

  /**
   * Fail every pending reply, forget all workers and close the ROUTER
   * socket. Idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.startupWaiter?.();

    const outstanding = [...this.pending.values()];
    this.pending.clear();
    for (const entry of outstanding) {
      if (entry.timer) clearTimeout(entry.timer);
      entry.fail(ErrorCode.WORKER_UNAVAILABLE, 'worker pool closed');
    }
    this.workers.length = 0;

    if (this.socket) {
      await this.socket.close();
      this.socket = null;
    }
    this.logger.info('worker pool closed', { failed: outstanding.length });
  }

  // -------------------------------------------------------------------------
  // Private: requests
  // -------------------------------------------------------------------------

  private createReply<K extends OperationName>(envelope: Envelope<K>): Reply<K> {
    const id = envelope.id;
    return new Reply(envelope, {
      dispatcher: this.dispatcher,
      logger: this.logger,
      onRelease: () => this.forget(id),
    });
  }

  /** Round-robin over live workers, in registration order. */
  private selectWorker(): WorkerEntry | null {
    if (this.workers.length === 0) return null;
    const worker = this.workers[this.nextWorker % this.workers.length];
    this.nextWorker = (this.nextWorker + 1) % this.workers.length;
    return worker;
  }

  /** Track the reply, then hand its request to the worker. */
  private dispatch<K extends OperationName>(reply: Reply<K>, worker: WorkerEntry): void {
    this.track(reply, worker);

    const envelope = reply.message;
    const socket = this.socket;
    if (socket === null) {
      this.abandon(envelope.id, ErrorCode.WORKER_UNAVAILABLE, 'socket is not bound');
      return;
    }

    this.logger.debug('request sent', {
      correlation: envelope.id,
      operation: envelope.operation,
      worker: worker.identity,
    });
    void socket
      .send(workerIdentity(worker.identity), EMPTY_DELIMITER, encodeFrame(envelope.toWire()))
      .catch((error: unknown) => {
        this.abandon(envelope.id, ErrorCode.WORKER_UNAVAILABLE, `send failed: ${String(error)}`);
      });
  }

  private track<K extends OperationName>(reply: Reply<K>, worker: WorkerEntry): void {
    const id = reply.id;
    const expected: K = reply.operation;
    const log = this.logger.withContext({
      correlation: id,
      operation: expected,
      worker: worker.identity,
    });

    const entry: PendingRequest = {
      operation: expected,
      worker: worker.identity,
      startedAt: Date.now(),
      timer: null,
      accept: (operation, body) => {
        if (operation !== expected) {
          entry.fail(ErrorCode.MALFORMED_RESPONSE, `answered with a ${operation} response`);
          return;
        }
        const result = this.validator.validateResponse(expected, body);
        if (!result.valid) {
          entry.fail(ErrorCode.MALFORMED_RESPONSE, result.errors.join('; '));
          return;
        }
        const response = result.value;
        log.debug('response received', { duration_ms: Date.now() - entry.startedAt });
        this.dispatcher.schedule(`${expected} #${id}`, async () => {
          reply.message.setResponse(response);
          await reply.finish(true);
        });
      },
      fail: (code, reason) => {
        log.warn('request failed', {
          error_code: code,
          reason,
          duration_ms: Date.now() - entry.startedAt,
        });
        this.complete(reply, false);
      },
    };

    const timeoutMs = this.options.requestTimeoutMs ?? 0;
    if (timeoutMs > 0) {
      entry.timer = setTimeout(() => {
        this.abandon(id, ErrorCode.REQUEST_TIMEOUT, `no answer within ${timeoutMs}ms`);
      }, timeoutMs);
    }

    this.pending.set(id, entry);
  }

  /** Finish a reply on the dispatch loop. */
  private complete<K extends OperationName>(reply: Reply<K>, success: boolean): void {
    this.dispatcher.schedule(`${reply.operation} #${reply.id}`, () => reply.finish(success));
  }

  /** Fail a pending request, if it is still pending. */
  private abandon(id: number, code: ErrorCodeValue, reason: string): void {
    const entry = this.pending.get(id);
    if (!entry) return;
    this.pending.delete(id);
    if (entry.timer) clearTimeout(entry.timer);
    entry.fail(code, reason);
  }

  /** Drop a released request; its late answer will be ignored. */
  private forget(id: number): void {
    const entry = this.pending.get(id);
    if (!entry) return;
    this.pending.delete(id);
    if (entry.timer) clearTimeout(entry.timer);
    this.logger.debug('released request forgotten', {
      correlation: id,
      operation: entry.operation,
    });
  }

  /**
   * Remove the pending request answered by `worker`.
   *
   * An unknown id (released, timed out, or never sent) is ignored; an id
   * owned by another worker is rejected and stays pending.
   */
  private take(id: number, worker: string): PendingRequest | null {
    const entry = this.pending.get(id);
    if (!entry) {
      this.logger.debug('answer for unknown request dropped', { correlation: id, worker });
      return null;
    }
    if (entry.worker !== worker) {
      this.logger.warn('answer from the wrong worker dropped', {
        correlation: id,
        worker,
        expected_worker: entry.worker,
      });
      return null;
    }

    this.pending.delete(id);
    if (entry.timer) clearTimeout(entry.timer);
    return entry;
  }

  // -------------------------------------------------------------------------
  // Private: workers
  // -------------------------------------------------------------------------

  private waitForWorkers(): Promise<void> {
    const timeoutMs = this.options.startupTimeoutMs;
    if (this.workers.length >= this.options.workerCount || timeoutMs <= 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.startupWaiter = null;
        resolve();
      }, timeoutMs);

      this.startupWaiter = () => {
        clearTimeout(timer);
        this.startupWaiter = null;
        resolve();
      };
    });
  }

  private registerWorker(identity: string, pid: number | null): void {
    if (this.workers.some((worker) => worker.identity === identity)) {
      this.logger.debug('duplicate ready ignored', { worker: identity });
      return;
    }

    this.workers.push({ identity, pid });
    this.logger.info('worker registered', { worker: identity, pid, live: this.workers.length });

    if (this.workers.length >= this.options.workerCount) {
      this.startupWaiter?.();
    }
  }

  private unregisterWorker(identity: string): void {
    const index = this.workers.findIndex((worker) => worker.identity === identity);
    if (index === -1) return;
    this.workers.splice(index, 1);

    const orphaned = [...this.pending.entries()].filter(([, entry]) => entry.worker === identity);
    this.logger.info('worker left', {
      worker: identity,
      live: this.workers.length,
      failed: orphaned.length,
    });
    for (const [id] of orphaned) {
      this.abandon(id, ErrorCode.WORKER_UNAVAILABLE, 'worker left before answering');
    }
  }

  // -------------------------------------------------------------------------
  // Private: incoming frames
  // -------------------------------------------------------------------------

  private handleIncoming(identity: Buffer, _delimiter: Buffer, payload: Buffer): void {
    if (this.closed) return;
    const worker = workerKey(identity);
    const frame = decodeWorkerFrame(payload);

    switch (frame.kind) {
      case 'ready':
        this.registerWorker(worker, frame.pid);
        return;
      case 'goodbye':
        this.unregisterWorker(worker);
        return;
      case 'response':
        this.take(frame.id, worker)?.accept(frame.operation, frame.body);
        return;
      case 'error':
        this.take(frame.id, worker)?.fail(ErrorCode.WORKER_ERROR, frame.message);
        return;
      case 'malformed':
        if (frame.id === null) {
          this.logger.warn('malformed frame dropped', { worker, reason: frame.reason });
          return;
        }
        this.take(frame.id, worker)?.fail(ErrorCode.MALFORMED_RESPONSE, frame.reason);
        return;
    }
  }
}
