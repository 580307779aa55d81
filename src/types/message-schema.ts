/**
 * Runtime JSON Schemas for worker request and response payloads.
 *
 * Kept as plain objects so they can be fed directly to ajv. Payloads may
 * carry fields newer workers add, so additional properties are allowed;
 * known fields must have the right type.
 */

import type { OperationName } from './protocol.js';
import { FILE_TYPES } from './song.js';

const STRING = { type: 'string' } as const;
const INTEGER = { type: 'integer' } as const;
const NUMBER = { type: 'number' } as const;
const BOOLEAN = { type: 'boolean' } as const;
/** int64: a JSON number or, as the protobuf JSON mapping writes it, a decimal string. */
const INT64 = { anyOf: [INTEGER, { type: 'string', pattern: '^-?[0-9]+$' }] } as const;

export const SONG_METADATA_SCHEMA = {
  type: 'object' as const,
  properties: {
    valid: BOOLEAN,
    title: STRING,
    album: STRING,
    artist: STRING,
    albumartist: STRING,
    composer: STRING,
    performer: STRING,
    grouping: STRING,
    lyrics: STRING,
    genre: STRING,
    comment: STRING,
    track: INTEGER,
    disc: INTEGER,
    bpm: NUMBER,
    year: INTEGER,
    originalyear: INTEGER,
    compilation: BOOLEAN,
    rating: NUMBER,
    length_nanosec: INT64,
    bitrate: INTEGER,
    samplerate: INTEGER,
    url: STRING,
    basefilename: STRING,
    mtime: INT64,
    ctime: INT64,
    filesize: INT64,
    suspicious_tags: BOOLEAN,
    art_automatic: STRING,
    type: { type: 'string', enum: [...FILE_TYPES] },
    playcount: INTEGER,
    skipcount: INTEGER,
    lastplayed: INT64,
    score: INTEGER,
  },
};

const FILENAME_REQUEST = {
  type: 'object' as const,
  required: ['filename'],
  properties: { filename: STRING },
};

const SAVE_REQUEST = {
  type: 'object' as const,
  required: ['filename', 'metadata'],
  properties: { filename: STRING, metadata: SONG_METADATA_SCHEMA },
};

const METADATA_RESPONSE = {
  type: 'object' as const,
  properties: { metadata: SONG_METADATA_SCHEMA },
};

const SUCCESS_RESPONSE = {
  type: 'object' as const,
  properties: { success: BOOLEAN },
};

/** Request payload schema per operation. */
export const REQUEST_SCHEMAS: Record<OperationName, Record<string, unknown>> = {
  read_file: FILENAME_REQUEST,
  save_file: SAVE_REQUEST,
  save_song_statistics_to_file: SAVE_REQUEST,
  save_song_rating_to_file: SAVE_REQUEST,
  is_media_file: FILENAME_REQUEST,
  load_embedded_art: FILENAME_REQUEST,
  read_cloud_file: {
    type: 'object',
    required: ['download_url', 'title', 'size', 'mime_type', 'authorisation_header'],
    properties: {
      download_url: STRING,
      title: STRING,
      size: INT64,
      mime_type: STRING,
      authorisation_header: STRING,
    },
  },
  network_statistics: {
    type: 'object',
    maxProperties: 0,
  },
};

/** Response payload schema per operation. */
export const RESPONSE_SCHEMAS: Record<OperationName, Record<string, unknown>> = {
  read_file: METADATA_RESPONSE,
  save_file: SUCCESS_RESPONSE,
  save_song_statistics_to_file: SUCCESS_RESPONSE,
  save_song_rating_to_file: SUCCESS_RESPONSE,
  is_media_file: SUCCESS_RESPONSE,
  load_embedded_art: {
    type: 'object',
    properties: { data: { type: 'string', contentEncoding: 'base64' } },
  },
  read_cloud_file: METADATA_RESPONSE,
  network_statistics: {
    type: 'object',
    properties: {
      entry: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            url: STRING,
            bytes_received: {
              anyOf: [
                { type: 'integer', minimum: 0 },
                { type: 'string', pattern: '^[0-9]+$' },
              ],
            },
          },
        },
      },
    },
  },
};
