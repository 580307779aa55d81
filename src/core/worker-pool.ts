/**
 * Worker pool contract consumed by the tag-reader client.
 *
 * A pool routes each request to one live worker and finishes the matching
 * reply when that worker answers. Process supervision (spawning, restarts,
 * executable discovery) belongs to whatever launches the workers, not to
 * the pool contract.
 *
 * @see ZmqWorkerPool for the ZeroMQ implementation
 * @see FakeWorkerPool (src/testing) for the test double
 */

import type { OperationName } from '../types/protocol.js';
import type { CompletionDispatcher } from './dispatcher.js';
import type { Envelope } from './envelope.js';
import type { Reply } from './reply.js';

/** Invoked when the pool could not get any worker running. */
export type WorkerFailedToStartHandler = () => void;

export interface WorkerPool {
  /** The loop on which every reply of this pool is finished. */
  readonly dispatcher: CompletionDispatcher;

  /** Workers currently registered and accepting requests. */
  readonly liveWorkerCount: number;

  /** Workers the pool is configured to expect (the broadcast fan-out). */
  readonly expectedWorkerCount: number;

  /** Begin accepting workers. Resolves once the startup phase is over. */
  start(): Promise<void>;

  /**
   * Send a request to exactly one live worker.
   *
   * The returned reply owns a copy of the envelope. Without a live worker
   * it finishes unsuccessfully.
   */
  sendMessageWithReply<K extends OperationName>(message: Envelope<K>): Reply<K>;

  /**
   * Send a request to every worker live at call time, one reply per worker
   * in pool order. Workers joining later do not receive it.
   */
  broadcastMessageWithReply<K extends OperationName>(message: Envelope<K>): Reply<K>[];

  onWorkerFailedToStart(handler: WorkerFailedToStartHandler): void;

  /** Fail every pending reply and stop accepting workers. */
  close(): Promise<void>;
}
