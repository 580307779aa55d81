/**
 * Transport seam of the worker channel.
 *
 * The pool binds one ROUTER socket and each worker process connects one
 * DEALER. Every message carries exactly one JSON frame (see wire-codec.ts).
 * On the pool's side a message is
 *
 *   [identity, empty delimiter, JSON frame]
 *
 * where `identity` is the routing id ZeroMQ gave the worker's connection.
 * The pool keys workers by {@link workerKey} and addresses one again with
 * {@link workerIdentity}. DEALER implementations add and strip the
 * delimiter, so a worker only ever handles the JSON frame.
 */

/** Delimiter frame between the routing id and the JSON frame. */
export const EMPTY_DELIMITER: Buffer = Buffer.alloc(0);

/** A message from a worker, as the pool's ROUTER delivers it. */
export type WorkerFrameHandler = (identity: Buffer, delimiter: Buffer, frame: Buffer) => void;

/** A message from the pool, as a worker's DEALER delivers it. */
export type PoolFrameHandler = (frame: Buffer) => void;

/** Stable map key for a worker connection. */
export function workerKey(identity: Buffer): string {
  return identity.toString('hex');
}

/** Routing id frame for a worker key. */
export function workerIdentity(key: string): Buffer {
  return Buffer.from(key, 'hex');
}

/** The pool's end of the channel. */
export interface RouterSocket {
  /** e.g. "ipc:///tmp/tagpool-workers.sock" */
  bind(address: string): Promise<void>;

  on(event: 'message', handler: WorkerFrameHandler): void;

  /** Route one JSON frame to the worker behind `identity`. */
  send(identity: Buffer, delimiter: Buffer, frame: Buffer): Promise<void>;

  close(): Promise<void>;
}

/** A worker's end of the channel. */
export interface DealerSocket {
  connect(address: string): Promise<void>;

  /** Send one JSON frame to the pool. */
  send(frame: Buffer): Promise<void>;

  on(event: 'message', handler: PoolFrameHandler): void;

  close(): Promise<void>;
}

/** Creates channel sockets; the pool takes one so tests can run in process. */
export interface SocketFactory {
  createRouter(): RouterSocket;
  createDealer(): DealerSocket;
}
