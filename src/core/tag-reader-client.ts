/**
 * TagReaderClient — typed façade over a worker pool.
 *
 * Every operation has an async form that returns a {@link Reply} at once
 * and a blocking form that awaits the reply and returns a plain value,
 * falling back to a neutral default (empty song, `false`, empty buffer)
 * when the request failed. Blocking forms refuse to run on the pool's
 * completion dispatch loop; awaiting a reply there would never resolve.
 *
 * The client is an ordinary object: construct one per pool and pass it to
 * whatever needs it.
 */

import { fileURLToPath } from 'node:url';

import { ErrorCode } from '../types/errors.js';
import type { OperationName, RequestOf, ResponseOf } from '../types/protocol.js';
import { emptySong, songFromWire, songToWire, type SongMetadata } from '../types/song.js';
import { BroadcastReply } from './broadcast-reply.js';
import { Envelope } from './envelope.js';
import { createLogger, type Logger } from './logger.js';
import {
  aggregateByHost,
  mergeNetworkStatistics,
  type HostStatistics,
} from './network-statistics.js';
import type { Reply } from './reply.js';
import type { WorkerPool } from './worker-pool.js';

export interface TagReaderClientOptions {
  logger?: Logger;
}

/** Local path of a `file:` URL; `''` for any other or unparsable URL. */
export function localFilename(url: string): string {
  try {
    return new URL(url).protocol === 'file:' ? fileURLToPath(url) : '';
  } catch {
    return '';
  }
}

export class TagReaderClient {
  private readonly pool: WorkerPool;
  private readonly logger: Logger;

  constructor(pool: WorkerPool, options?: TagReaderClientOptions) {
    this.pool = pool;
    this.logger = options?.logger ?? createLogger('tag-reader');

    this.pool.onWorkerFailedToStart(() => {
      this.logger.error('tag reader worker failed to start', {
        error_code: ErrorCode.WORKER_FAILED_TO_START,
        expected: this.pool.expectedWorkerCount,
      });
    });
  }

  /** Start the pool. Resolves once its startup phase is over. */
  async start(): Promise<void> {
    await this.pool.start();
  }

  // -------------------------------------------------------------------------
  // Async operations
  // -------------------------------------------------------------------------

  readFile(filename: string): Reply<'read_file'> {
    return this.send('read_file', { filename });
  }

  saveFile(filename: string, metadata: SongMetadata): Reply<'save_file'> {
    return this.send('save_file', { filename, metadata: songToWire(metadata) });
  }

  /** Write play statistics into the file behind `metadata.url`. */
  updateStatistics(metadata: SongMetadata): Reply<'save_song_statistics_to_file'> {
    return this.send('save_song_statistics_to_file', {
      filename: localFilename(metadata.url),
      metadata: songToWire(metadata),
    });
  }

  /** Write the rating into the file behind `metadata.url`. */
  updateRating(metadata: SongMetadata): Reply<'save_song_rating_to_file'> {
    return this.send('save_song_rating_to_file', {
      filename: localFilename(metadata.url),
      metadata: songToWire(metadata),
    });
  }

  isMediaFile(filename: string): Reply<'is_media_file'> {
    return this.send('is_media_file', { filename });
  }

  loadEmbeddedArt(filename: string): Reply<'load_embedded_art'> {
    return this.send('load_embedded_art', { filename });
  }

  /** Read the tags of a remote file. The authorisation header is passed through untouched. */
  readCloudFile(
    url: URL,
    title: string,
    size: number,
    mimeType: string,
    authorisationHeader: string,
  ): Reply<'read_cloud_file'> {
    return this.send('read_cloud_file', {
      download_url: url.href,
      title,
      size,
      mime_type: mimeType,
      authorisation_header: authorisationHeader,
    });
  }

  /** Ask every live worker for its fetch log. */
  getNetworkStatistics(): BroadcastReply<'network_statistics'> {
    const message = Envelope.request('network_statistics', {});
    const reply = new BroadcastReply(message, this.pool.broadcastMessageWithReply(message), {
      dispatcher: this.pool.dispatcher,
      logger: this.logger,
    });

    if (reply.isEmpty) {
      this.logger.warn('network statistics requested with no live worker', {
        operation: 'network_statistics',
        error_code: ErrorCode.WORKER_UNAVAILABLE,
      });
    }
    return reply;
  }

  // -------------------------------------------------------------------------
  // Batch operations
  // -------------------------------------------------------------------------

  /** One independent statistics update per song. Failures are only logged. */
  updateStatisticsForAll(songs: readonly SongMetadata[]): void {
    for (const song of songs) {
      this.detach(this.updateStatistics(song), song.url);
    }
  }

  /** One independent rating update per song. Failures are only logged. */
  updateRatingForAll(songs: readonly SongMetadata[]): void {
    for (const song of songs) {
      this.detach(this.updateRating(song), song.url);
    }
  }

  // -------------------------------------------------------------------------
  // Blocking operations
  // -------------------------------------------------------------------------

  readFileBlocking(filename: string): Promise<SongMetadata> {
    this.pool.dispatcher.assertNotDispatching('readFileBlocking');
    return this.settle(
      this.readFile(filename),
      (response) => songFromWire(response.metadata),
      emptySong(),
    );
  }

  saveFileBlocking(filename: string, metadata: SongMetadata): Promise<boolean> {
    this.pool.dispatcher.assertNotDispatching('saveFileBlocking');
    return this.settle(this.saveFile(filename, metadata), isSuccess, false);
  }

  updateStatisticsBlocking(metadata: SongMetadata): Promise<boolean> {
    this.pool.dispatcher.assertNotDispatching('updateStatisticsBlocking');
    return this.settle(this.updateStatistics(metadata), isSuccess, false);
  }

  updateRatingBlocking(metadata: SongMetadata): Promise<boolean> {
    this.pool.dispatcher.assertNotDispatching('updateRatingBlocking');
    return this.settle(this.updateRating(metadata), isSuccess, false);
  }

  isMediaFileBlocking(filename: string): Promise<boolean> {
    this.pool.dispatcher.assertNotDispatching('isMediaFileBlocking');
    return this.settle(this.isMediaFile(filename), isSuccess, false);
  }

  /** Embedded art bytes; empty when the file has none or the request failed. */
  loadEmbeddedArtBlocking(filename: string): Promise<Buffer> {
    this.pool.dispatcher.assertNotDispatching('loadEmbeddedArtBlocking');
    return this.settle(
      this.loadEmbeddedArt(filename),
      (response) => Buffer.from(response.data ?? '', 'base64'),
      Buffer.alloc(0),
    );
  }

  readCloudFileBlocking(
    url: URL,
    title: string,
    size: number,
    mimeType: string,
    authorisationHeader: string,
  ): Promise<SongMetadata> {
    this.pool.dispatcher.assertNotDispatching('readCloudFileBlocking');
    return this.settle(
      this.readCloudFile(url, title, size, mimeType, authorisationHeader),
      (response) => songFromWire(response.metadata),
      emptySong(),
    );
  }

  /** Fold every worker's fetch log into per-host totals. */
  getNetworkStatisticsBlocking(): Promise<HostStatistics> {
    this.pool.dispatcher.assertNotDispatching('getNetworkStatisticsBlocking');
    return this.collectNetworkStatistics(this.getNetworkStatistics());
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private send<K extends OperationName>(operation: K, request: RequestOf<K>): Reply<K> {
    return this.pool.sendMessageWithReply(Envelope.request(operation, request));
  }

  /** Await the reply, extract its value (or the fallback), then release it. */
  private async settle<K extends OperationName, T>(
    reply: Reply<K>,
    extract: (response: ResponseOf<K>) => T,
    fallback: T,
  ): Promise<T> {
    try {
      const success = await reply.waitForFinished();
      return success && reply.message.answered ? extract(reply.message.response) : fallback;
    } finally {
      reply.release();
    }
  }

  private async collectNetworkStatistics(
    reply: BroadcastReply<'network_statistics'>,
  ): Promise<HostStatistics> {
    try {
      await reply.waitForFinished();
      const statistics = aggregateByHost(mergeNetworkStatistics(reply.responses()));

      for (const [host, requests] of statistics.requestsByHost) {
        this.logger.debug('network statistics', {
          host,
          requests,
          bytes_received: statistics.bytesReceivedByHost.get(host) ?? 0,
        });
      }
      return statistics;
    } finally {
      reply.release();
    }
  }

  /** Release the reply once it finishes, logging a failure. */
  private detach<K extends OperationName>(reply: Reply<K>, subject: string): void {
    reply.onFinished((success) => {
      if (!success) {
        this.logger.warn('batch item failed', {
          correlation: reply.id,
          operation: reply.operation,
          url: subject,
        });
      }
      reply.release();
    });
  }
}

function isSuccess(response: { success?: boolean }): boolean {
  return response.success ?? false;
}
