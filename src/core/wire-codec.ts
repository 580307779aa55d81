/**
 * JSON framing for the worker channel.
 *
 * Each ZeroMQ payload frame is one JSON object:
 *
 *   pool → worker   { "id": 7, "save_file_request": { ... } }
 *   worker → pool   { "ready": { "pid": 4242 } }
 *                   { "goodbye": {} }
 *                   { "id": 7, "save_file_response": { ... } }
 *                   { "id": 7, "error": "file is read-only" }
 *
 * Decoding identifies the frame and the operation; payload validation is
 * left to {@link MessageValidator}.
 */

import { OPERATION_NAMES, requestField, responseField } from '../types/protocol.js';
import type { ErrorFrame, OperationName } from '../types/protocol.js';

// ---------------------------------------------------------------------------
// Frame types
// ---------------------------------------------------------------------------

/** A frame received by the pool from a worker. */
export type WorkerFrame =
  | { kind: 'ready'; pid: number | null }
  | { kind: 'goodbye' }
  | { kind: 'response'; id: number; operation: OperationName; body: unknown }
  | { kind: 'error'; id: number; message: string }
  | { kind: 'malformed'; id: number | null; reason: string };

/** A frame received by a worker from the pool. */
export type PoolFrame =
  | { kind: 'request'; id: number; operation: OperationName; body: unknown }
  | { kind: 'malformed'; id: number | null; reason: string };

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function encodeFrame(frame: Record<string, unknown>): Buffer {
  return Buffer.from(JSON.stringify(frame), 'utf-8');
}

export function encodeResponse(id: number, operation: OperationName, body: unknown): Buffer {
  return encodeFrame({ id, [responseField(operation)]: body });
}

export function encodeError(id: number, message: string): Buffer {
  return encodeFrame({ id, error: message } satisfies ErrorFrame);
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(payload: Buffer): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString('utf-8'));
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

function readId(frame: Record<string, unknown>): number | null {
  const id = frame['id'];
  return typeof id === 'number' && Number.isSafeInteger(id) && id > 0 ? id : null;
}

/** Operations whose `field(operation)` key is present on the frame. */
function findOperation(
  frame: Record<string, unknown>,
  field: (operation: OperationName) => string,
): OperationName[] {
  return OPERATION_NAMES.filter((operation) => field(operation) in frame);
}

export function decodeWorkerFrame(payload: Buffer): WorkerFrame {
  const frame = parseObject(payload);
  if (frame === null) {
    return { kind: 'malformed', id: null, reason: 'payload is not a JSON object' };
  }

  const ready = frame['ready'];
  if (isRecord(ready)) {
    const pid = ready['pid'];
    return { kind: 'ready', pid: typeof pid === 'number' ? pid : null };
  }
  if ('goodbye' in frame) {
    return { kind: 'goodbye' };
  }

  const id = readId(frame);
  if (id === null) {
    return { kind: 'malformed', id: null, reason: 'missing or invalid id' };
  }

  const error = frame['error'];
  if (typeof error === 'string') {
    return { kind: 'error', id, message: error };
  }

  const operations = findOperation(frame, responseField);
  if (operations.length !== 1) {
    return { kind: 'malformed', id, reason: `expected one response field, found ${operations.length}` };
  }
  const operation = operations[0];
  return { kind: 'response', id, operation, body: frame[responseField(operation)] };
}

export function decodePoolFrame(payload: Buffer): PoolFrame {
  const frame = parseObject(payload);
  if (frame === null) {
    return { kind: 'malformed', id: null, reason: 'payload is not a JSON object' };
  }

  const id = readId(frame);
  if (id === null) {
    return { kind: 'malformed', id: null, reason: 'missing or invalid id' };
  }

  const operations = findOperation(frame, requestField);
  if (operations.length !== 1) {
    return { kind: 'malformed', id, reason: `expected one request field, found ${operations.length}` };
  }
  const operation = operations[0];
  return { kind: 'request', id, operation, body: frame[requestField(operation)] };
}
