/**
 * Worker channel sockets on zeromq v6.
 *
 * zeromq hands out received messages through an async iterator; the
 * adapters here pump it into the callback handlers of types/socket.ts and
 * keep the frame layout consistent on both ends. A DEALER sends
 * `[delimiter, frame]`, so the ROUTER receives `[identity, delimiter, frame]`
 * and its replies reach the DEALER as `[delimiter, frame]` again.
 */

import * as zmq from 'zeromq';

import {
  EMPTY_DELIMITER,
  workerKey,
  type DealerSocket,
  type PoolFrameHandler,
  type RouterSocket,
  type SocketFactory,
  type WorkerFrameHandler,
} from '../types/socket.js';
import { createLogger, type Logger } from './logger.js';

/**
 * Receive loop shared by both ends. The loop starts with the first handler
 * and runs until the socket closes; a handler that throws is logged and the
 * loop moves on to the next message.
 */
abstract class ChannelSocket<S extends zmq.Router | zmq.Dealer, H> {
  protected readonly handlers: H[] = [];
  private receiving: Promise<void> | null = null;
  private closing = false;

  constructor(
    protected readonly socket: S,
    protected readonly logger: Logger,
  ) {
    // close() must not wait for undelivered messages.
    socket.linger = 0;
  }

  on(_event: 'message', handler: H): void {
    this.handlers.push(handler);
    if (this.receiving === null) {
      this.receiving = this.receive();
    }
  }

  async close(): Promise<void> {
    this.closing = true;
    this.socket.close();
  }

  /** Hand one received multipart message to the handlers. */
  protected abstract deliver(frames: Buffer[]): void;

  private async receive(): Promise<void> {
    try {
      for await (const frames of this.socket) {
        try {
          this.deliver(frames);
        } catch (error: unknown) {
          this.logger.error('message handler failed', { error });
        }
      }
    } catch (error: unknown) {
      // A closed socket ends the iterator with an error.
      if (!this.closing) {
        this.logger.error('receive loop stopped', { error });
      }
    }
  }
}

class ZmqRouterSocket extends ChannelSocket<zmq.Router, WorkerFrameHandler> implements RouterSocket {
  async bind(address: string): Promise<void> {
    await this.socket.bind(address);
  }

  async send(identity: Buffer, delimiter: Buffer, frame: Buffer): Promise<void> {
    await this.socket.send([identity, delimiter, frame]);
  }

  protected deliver(frames: Buffer[]): void {
    const [identity, delimiter, frame] = frames;
    if (frames.length !== 3 || delimiter.length !== 0) {
      this.logger.warn('message without delimiter dropped', {
        worker: workerKey(identity),
        frames: frames.length,
      });
      return;
    }
    for (const handler of this.handlers) {
      handler(identity, delimiter, frame);
    }
  }
}

class ZmqDealerSocket extends ChannelSocket<zmq.Dealer, PoolFrameHandler> implements DealerSocket {
  async connect(address: string): Promise<void> {
    this.socket.connect(address);
  }

  async send(frame: Buffer): Promise<void> {
    await this.socket.send([EMPTY_DELIMITER, frame]);
  }

  protected deliver(frames: Buffer[]): void {
    const [delimiter, frame] = frames;
    if (frames.length !== 2 || delimiter.length !== 0) {
      this.logger.warn('message without delimiter dropped', { frames: frames.length });
      return;
    }
    for (const handler of this.handlers) {
      handler(frame);
    }
  }
}

export interface ZmqSocketFactoryOptions {
  logger?: Logger;
}

export class ZmqSocketFactory implements SocketFactory {
  private readonly logger: Logger;

  constructor(options?: ZmqSocketFactoryOptions) {
    this.logger = options?.logger ?? createLogger('zmq');
  }

  createRouter(): RouterSocket {
    return new ZmqRouterSocket(new zmq.Router(), this.logger);
  }

  createDealer(): DealerSocket {
    return new ZmqDealerSocket(new zmq.Dealer(), this.logger);
  }
}
