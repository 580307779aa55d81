/**
 * In-process worker channel for tests.
 *
 * A FakeRouterSocket plays the pool's bound ROUTER and each
 * FakeDealerSocket a worker's DEALER. Delivery happens synchronously
 * inside send(). Routing ids are five bytes, the shape ZeroMQ gives
 * anonymous peers, and the router finds a dealer by {@link workerKey}
 * just as the pool does.
 */

import type { GoodbyeFrame, ReadyFrame } from '../types/protocol.js';
import {
  EMPTY_DELIMITER,
  workerKey,
  type DealerSocket,
  type PoolFrameHandler,
  type RouterSocket,
  type WorkerFrameHandler,
} from '../types/socket.js';

let nextRoutingId = 0x80000000;

function allocateIdentity(): Buffer {
  const identity = Buffer.alloc(5);
  identity.writeUInt32BE(nextRoutingId++ % 0x100000000, 1);
  return identity;
}

function decode(frame: Buffer): unknown {
  return JSON.parse(frame.toString('utf-8'));
}

/** Open/closed state and one-shot send failures. */
abstract class FakeChannelSocket {
  closed = false;
  private sendFailure: Error | null = null;

  /** Make the next send() reject with `message`. */
  failNextSend(message = 'Connection refused'): void {
    this.sendFailure = new Error(message);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  protected beforeSend(): void {
    this.assertOpen();
    const failure = this.sendFailure;
    if (failure) {
      this.sendFailure = null;
      throw failure;
    }
  }

  protected assertOpen(): void {
    if (this.closed) {
      throw new Error('Socket is closed');
    }
  }
}

// ---------------------------------------------------------------------------
// Pool side
// ---------------------------------------------------------------------------

/** A frame the router took from a worker. */
export interface FrameFromWorker {
  /** workerKey of the sender. */
  worker: string;
  frame: Buffer;
}

export class FakeRouterSocket extends FakeChannelSocket implements RouterSocket {
  boundAddress: string | null = null;
  /** Frames from workers, in arrival order. */
  readonly received: FrameFromWorker[] = [];
  /** Connected workers by workerKey. */
  readonly workers: Map<string, FakeDealerSocket> = new Map();
  private readonly handlers: WorkerFrameHandler[] = [];

  async bind(address: string): Promise<void> {
    this.assertOpen();
    this.boundAddress = address;
  }

  on(_event: 'message', handler: WorkerFrameHandler): void {
    this.assertOpen();
    this.handlers.push(handler);
  }

  /** Frames to an unknown or departed worker are dropped, as ROUTER does. */
  async send(identity: Buffer, delimiter: Buffer, frame: Buffer): Promise<void> {
    this.beforeSend();
    if (delimiter.length !== 0) {
      throw new Error('Non-empty delimiter frame');
    }
    this.workers.get(workerKey(identity))?.deliver(Buffer.from(frame));
  }

  /** Decoded JSON of every frame from workers. */
  decoded(): unknown[] {
    return this.received.map(({ frame }) => decode(frame));
  }

  /** @internal */
  attach(dealer: FakeDealerSocket): void {
    this.workers.set(dealer.key, dealer);
  }

  /** @internal */
  detach(dealer: FakeDealerSocket): void {
    this.workers.delete(dealer.key);
  }

  /** @internal Called by a connected dealer's send(). */
  deliver(identity: Buffer, frame: Buffer): void {
    if (this.closed) return;
    const copy = Buffer.from(frame);
    this.received.push({ worker: workerKey(identity), frame: copy });
    for (const handler of this.handlers) {
      handler(Buffer.from(identity), EMPTY_DELIMITER, copy);
    }
  }
}

// ---------------------------------------------------------------------------
// Worker side
// ---------------------------------------------------------------------------

/** Finds the fake router bound at an address, if any. */
export type RouterResolver = (address: string) => FakeRouterSocket | null;

export class FakeDealerSocket extends FakeChannelSocket implements DealerSocket {
  readonly identity: Buffer = allocateIdentity();
  /** Frames from the pool, in arrival order. */
  readonly received: Buffer[] = [];
  private readonly handlers: PoolFrameHandler[] = [];
  private connected: FakeRouterSocket | null = null;

  constructor(private readonly resolveRouter: RouterResolver) {
    super();
  }

  /** The key the pool files this worker under. */
  get key(): string {
    return workerKey(this.identity);
  }

  /** Router reached by connect(), or null when nothing was bound there. */
  get router(): FakeRouterSocket | null {
    return this.connected;
  }

  async connect(address: string): Promise<void> {
    this.assertOpen();
    this.connected = this.resolveRouter(address);
    this.connected?.attach(this);
  }

  async send(frame: Buffer): Promise<void> {
    this.beforeSend();
    this.connected?.deliver(this.identity, frame);
  }

  on(_event: 'message', handler: PoolFrameHandler): void {
    this.assertOpen();
    this.handlers.push(handler);
  }

  override async close(): Promise<void> {
    this.connected?.detach(this);
    await super.close();
  }

  /** Register with the pool the way a started worker does. */
  async sendReady(pid: number): Promise<void> {
    await this.sendJson({ ready: { pid } } satisfies ReadyFrame);
  }

  /** Leave the pool the way a stopping worker does. */
  async sendGoodbye(): Promise<void> {
    await this.sendJson({ goodbye: {} } satisfies GoodbyeFrame);
  }

  async sendJson(frame: object): Promise<void> {
    await this.send(Buffer.from(JSON.stringify(frame), 'utf-8'));
  }

  /** Decoded JSON of every frame from the pool. */
  decoded(): unknown[] {
    return this.received.map(decode);
  }

  /** @internal Called by the router's send(). */
  deliver(frame: Buffer): void {
    if (this.closed) return;
    this.received.push(frame);
    for (const handler of this.handlers) {
      handler(frame);
    }
  }
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

let nextPairAddress = 0;

/** A bound router with one dealer connected to it. */
export async function createConnectedPair(): Promise<{
  router: FakeRouterSocket;
  dealer: FakeDealerSocket;
}> {
  const router = new FakeRouterSocket();
  const address = `inproc://fake-pair-${nextPairAddress++}`;
  await router.bind(address);

  const dealer = new FakeDealerSocket((dialled) => (dialled === address ? router : null));
  await dealer.connect(address);
  return { router, dealer };
}
