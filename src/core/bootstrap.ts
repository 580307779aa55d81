/**
 * Wire a tag-reader client from configuration.
 *
 * Applies the configured log level, then builds the dispatch loop, the
 * ZeroMQ worker pool and the client on top of it, and starts the pool.
 */

import type { TagpoolConfig } from '../types/config.js';
import type { SocketFactory } from '../types/socket.js';
import { CompletionDispatcher, type FatalErrorHandler } from './dispatcher.js';
import { configureLogging, createLogger } from './logger.js';
import { TagReaderClient } from './tag-reader-client.js';
import { ZmqSocketFactory } from './zmq-socket-factory.js';
import { ZmqWorkerPool } from './zmq-worker-pool.js';

export interface BootstrapOptions {
  /** Defaults to real ZeroMQ sockets. */
  socketFactory?: SocketFactory;
  onFatal?: FatalErrorHandler;
}

/** A running client and the pool it owns. */
export interface TagpoolRuntime {
  client: TagReaderClient;
  pool: ZmqWorkerPool;
  dispatcher: CompletionDispatcher;
  /** Close the pool, then wait for queued completions to run. */
  close(): Promise<void>;
}

export async function bootstrap(
  config: TagpoolConfig,
  options?: BootstrapOptions,
): Promise<TagpoolRuntime> {
  configureLogging({ level: config.logging.level });
  const logger = createLogger('tagpool');

  const dispatcher = new CompletionDispatcher({
    logger: logger.child('dispatcher'),
    onFatal: options?.onFatal,
  });
  const pool = new ZmqWorkerPool(options?.socketFactory ?? new ZmqSocketFactory(), {
    address: config.pool.address,
    workerCount: config.pool.worker_count,
    startupTimeoutMs: config.pool.startup_timeout_ms,
    requestTimeoutMs: config.pool.request_timeout_ms,
    logger: logger.child('worker-pool'),
    dispatcher,
  });
  const client = new TagReaderClient(pool, { logger: logger.child('client') });

  await client.start();
  logger.info('tag reader client started', {
    address: config.pool.address,
    workers: pool.liveWorkerCount,
  });

  return {
    client,
    pool,
    dispatcher,
    async close() {
      await pool.close();
      await dispatcher.drain();
    },
  };
}
