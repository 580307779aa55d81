export const VERSION = '0.1.0';

export * from './types/index.js';

export { Envelope } from './core/envelope.js';
export {
  Reply,
  type FinishedListener,
  type ReplyState,
  type ReplyHandle,
  type ReplyOptions,
} from './core/reply.js';
export { BroadcastReply } from './core/broadcast-reply.js';
export { type WorkerPool, type WorkerFailedToStartHandler } from './core/worker-pool.js';
export { ZmqWorkerPool, type ZmqWorkerPoolOptions } from './core/zmq-worker-pool.js';
export { ZmqSocketFactory, type ZmqSocketFactoryOptions } from './core/zmq-socket-factory.js';
export {
  CompletionDispatcher,
  type CompletionDispatcherOptions,
  type FatalErrorHandler,
} from './core/dispatcher.js';
export {
  TagReaderClient,
  type TagReaderClientOptions,
  localFilename,
} from './core/tag-reader-client.js';
export {
  aggregateByHost,
  mergeNetworkStatistics,
  urlAuthority,
  type HostStatistics,
} from './core/network-statistics.js';
export { ClientError, isClientError, isFatalClientError } from './core/client-error.js';
export { MessageValidator, type ValidationResult } from './core/message-validator.js';
export {
  createLogger,
  configureLogging,
  resetLogging,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LogContext,
} from './core/logger.js';
export { loadConfig } from './core/config-loader.js';
export { bootstrap, type BootstrapOptions, type TagpoolRuntime } from './core/bootstrap.js';

export {
  WorkerEndpoint,
  createWorkerHandlers,
  type WorkerEndpointOptions,
  type WorkerHandlers,
  type OperationHandler,
} from './worker/worker-endpoint.js';
