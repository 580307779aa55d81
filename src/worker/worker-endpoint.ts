/**
 * Worker-side endpoint of the tag-reader channel.
 *
 * Runs inside a worker process: connects a DEALER socket to the pool's
 * ROUTER, announces itself with a `ready` frame, validates every incoming
 * request against its schema and answers it through the typed handler for
 * its operation. A handler that throws is answered with an `error` frame;
 * the worker keeps serving.
 *
 * The tag-format work itself (parsing files, writing tags, fetching remote
 * files) belongs to the handlers the worker process supplies.
 */

import type {
  GoodbyeFrame,
  OperationName,
  ReadyFrame,
  RequestOf,
  ResponseOf,
} from '../types/protocol.js';
import type { DealerSocket } from '../types/socket.js';
import { createLogger, type Logger } from '../core/logger.js';
import { MessageValidator } from '../core/message-validator.js';
import { decodePoolFrame, encodeError, encodeFrame, encodeResponse } from '../core/wire-codec.js';

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

/** Serves one operation. Throwing answers the request with an error frame. */
export type OperationHandler<K extends OperationName> = (
  request: RequestOf<K>,
) => ResponseOf<K> | Promise<ResponseOf<K>>;

/** One handler per operation. */
export type WorkerHandlers = { [K in OperationName]: OperationHandler<K> };

function unsupported(operation: OperationName): () => never {
  return () => {
    throw new Error(`${operation} is not supported by this worker`);
  };
}

/**
 * Complete a partial handler table. Operations without a handler answer
 * with an error frame.
 */
export function createWorkerHandlers(overrides: Partial<WorkerHandlers>): WorkerHandlers {
  return {
    read_file: overrides.read_file ?? unsupported('read_file'),
    save_file: overrides.save_file ?? unsupported('save_file'),
    save_song_statistics_to_file:
      overrides.save_song_statistics_to_file ?? unsupported('save_song_statistics_to_file'),
    save_song_rating_to_file:
      overrides.save_song_rating_to_file ?? unsupported('save_song_rating_to_file'),
    is_media_file: overrides.is_media_file ?? unsupported('is_media_file'),
    load_embedded_art: overrides.load_embedded_art ?? unsupported('load_embedded_art'),
    read_cloud_file: overrides.read_cloud_file ?? unsupported('read_cloud_file'),
    network_statistics: overrides.network_statistics ?? unsupported('network_statistics'),
  };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface WorkerEndpointOptions {
  /** The pool's ROUTER address. */
  address: string;
  /** Reported in the ready frame. Defaults to the current process id. */
  pid?: number;
  logger?: Logger;
  validator?: MessageValidator;
}

// ---------------------------------------------------------------------------
// WorkerEndpoint
// ---------------------------------------------------------------------------

export class WorkerEndpoint {
  private readonly socket: DealerSocket;
  private readonly handlers: WorkerHandlers;
  private readonly options: WorkerEndpointOptions;
  private readonly logger: Logger;
  private readonly validator: MessageValidator;
  private readonly inFlight: Set<Promise<void>> = new Set();
  private started = false;
  private closed = false;

  constructor(socket: DealerSocket, handlers: WorkerHandlers, options: WorkerEndpointOptions) {
    this.socket = socket;
    this.handlers = handlers;
    this.options = options;
    this.logger = options.logger ?? createLogger('worker');
    this.validator = options.validator ?? new MessageValidator();
  }

  /** Requests received and not yet answered. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Connect to the pool and announce readiness.
   *
   * @throws If the endpoint was already started.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error('WorkerEndpoint is already started');
    }
    this.started = true;

    this.socket.on('message', (payload: Buffer) => {
      this.handleIncoming(payload);
    });
    await this.socket.connect(this.options.address);

    const pid = this.options.pid ?? process.pid;
    await this.socket.send(encodeFrame({ ready: { pid } } satisfies ReadyFrame));
    this.logger.info('worker ready', { address: this.options.address, pid });
  }

  /** Finish in-flight requests, say goodbye and close the socket. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await Promise.all([...this.inFlight]);
    if (this.started) {
      await this.socket.send(encodeFrame({ goodbye: {} } satisfies GoodbyeFrame));
    }
    await this.socket.close();
    this.logger.info('worker closed');
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private handleIncoming(payload: Buffer): void {
    if (this.closed) return;

    const task = this.handle(payload).catch((error: unknown) => {
      this.logger.error('failed to answer request', { error });
    });
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  private async handle(payload: Buffer): Promise<void> {
    const frame = decodePoolFrame(payload);
    if (frame.kind === 'malformed') {
      this.logger.warn('malformed request', { correlation: frame.id, reason: frame.reason });
      if (frame.id !== null) {
        await this.socket.send(encodeError(frame.id, frame.reason));
      }
      return;
    }

    await this.serve(frame.operation, frame.id, frame.body);
  }

  private async serve<K extends OperationName>(operation: K, id: number, body: unknown): Promise<void> {
    const log = this.logger.withContext({ correlation: id, operation });

    const request = this.validator.validateRequest(operation, body);
    if (!request.valid) {
      log.warn('invalid request', { errors: request.errors });
      await this.socket.send(encodeError(id, `invalid ${operation} request: ${request.errors.join('; ')}`));
      return;
    }

    const handler: OperationHandler<K> = this.handlers[operation];
    const startedAt = Date.now();
    let response: ResponseOf<K>;
    try {
      response = await handler(request.value);
    } catch (error: unknown) {
      log.warn('handler failed', { error, duration_ms: Date.now() - startedAt });
      await this.socket.send(encodeError(id, error instanceof Error ? error.message : String(error)));
      return;
    }

    log.debug('request served', { duration_ms: Date.now() - startedAt });
    await this.socket.send(encodeResponse(id, operation, response));
  }
}
