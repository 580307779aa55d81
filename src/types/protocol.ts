/**
 * Tag-reader worker protocol types.
 *
 * Every request kind is a typed request/response pair in {@link Operations}.
 * On the wire a message is a JSON object carrying a correlation `id` and
 * exactly one `<operation>_request` or `<operation>_response` field, the
 * JSON mapping of the worker's protocol definition (snake_case names,
 * omitted defaults, base64 bytes, enum names).
 */

import type { Int64, WireSongMetadata } from './song.js';

// ---------------------------------------------------------------------------
// Request payloads
// ---------------------------------------------------------------------------

export interface ReadFileRequest {
  filename: string;
}

export interface SaveFileRequest {
  filename: string;
  metadata: WireSongMetadata;
}

export interface IsMediaFileRequest {
  filename: string;
}

export interface LoadEmbeddedArtRequest {
  filename: string;
}

export interface ReadCloudFileRequest {
  download_url: string;
  title: string;
  size: Int64;
  mime_type: string;
  authorisation_header: string;
}

export type NetworkStatisticsRequest = Record<string, never>;

// ---------------------------------------------------------------------------
// Response payloads
// ---------------------------------------------------------------------------

export interface ReadFileResponse {
  metadata?: WireSongMetadata;
}

/** Shared by the save, statistics, rating and is-media-file responses. */
export interface SuccessResponse {
  success?: boolean;
}

export interface LoadEmbeddedArtResponse {
  /** Base64-encoded image bytes; absent or empty when the file has no art. */
  data?: string;
}

export interface NetworkStatisticsEntry {
  url?: string;
  bytes_received?: Int64;
}

export interface NetworkStatisticsResponse {
  entry?: NetworkStatisticsEntry[];
}

// ---------------------------------------------------------------------------
// Operation table
// ---------------------------------------------------------------------------

/** Request/response pair for every operation a worker serves. */
export interface Operations {
  read_file: { request: ReadFileRequest; response: ReadFileResponse };
  save_file: { request: SaveFileRequest; response: SuccessResponse };
  save_song_statistics_to_file: { request: SaveFileRequest; response: SuccessResponse };
  save_song_rating_to_file: { request: SaveFileRequest; response: SuccessResponse };
  is_media_file: { request: IsMediaFileRequest; response: SuccessResponse };
  load_embedded_art: { request: LoadEmbeddedArtRequest; response: LoadEmbeddedArtResponse };
  read_cloud_file: { request: ReadCloudFileRequest; response: ReadFileResponse };
  network_statistics: { request: NetworkStatisticsRequest; response: NetworkStatisticsResponse };
}

export type OperationName = keyof Operations;

export type RequestOf<K extends OperationName> = Operations[K]['request'];

export type ResponseOf<K extends OperationName> = Operations[K]['response'];

/** All operation names, in protocol declaration order. */
export const OPERATION_NAMES: readonly OperationName[] = [
  'read_file',
  'save_file',
  'save_song_statistics_to_file',
  'save_song_rating_to_file',
  'is_media_file',
  'load_embedded_art',
  'read_cloud_file',
  'network_statistics',
];

export function isOperationName(value: string): value is OperationName {
  return OPERATION_NAMES.some((name) => name === value);
}

// ---------------------------------------------------------------------------
// Wire field names
// ---------------------------------------------------------------------------

export function requestField(operation: OperationName): `${OperationName}_request` {
  return `${operation}_request`;
}

export function responseField(operation: OperationName): `${OperationName}_response` {
  return `${operation}_response`;
}

// ---------------------------------------------------------------------------
// Control frames (worker → pool)
// ---------------------------------------------------------------------------

/** Sent once by a worker after connecting; registers it as live. */
export interface ReadyFrame {
  ready: { pid?: number };
}

/** Sent by a worker before disconnecting; its in-flight requests fail. */
export interface GoodbyeFrame {
  goodbye: Record<string, never>;
}

/** Sent instead of a response when the worker's handler failed. */
export interface ErrorFrame {
  id: number;
  error: string;
}
