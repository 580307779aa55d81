import { describe, it, expect } from 'vitest';
import { ErrorCode, FATAL_CODES } from './errors.js';
import { ClientError, isClientError, isFatalClientError } from '../core/client-error.js';

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

describe('ErrorCode', () => {
  it('values are identical to their keys', () => {
    for (const [key, value] of Object.entries(ErrorCode)) {
      expect(key).toBe(value);
    }
  });

  it('treats only the defect codes as fatal', () => {
    expect([...FATAL_CODES].sort()).toEqual([
      ErrorCode.DISPATCH_LOOP_VIOLATION,
      ErrorCode.PROTOCOL_VIOLATION,
    ]);
  });
});

// ---------------------------------------------------------------------------
// ClientError
// ---------------------------------------------------------------------------

describe('ClientError', () => {
  it('carries its code, message and name', () => {
    const error = new ClientError(ErrorCode.PROTOCOL_VIOLATION, 'read_file #3 finished twice');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ClientError');
    expect(error.code).toBe('PROTOCOL_VIOLATION');
    expect(error.message).toBe('read_file #3 finished twice');
    expect(error.fatal).toBe(true);
  });

  it('is not fatal for recoverable codes', () => {
    expect(new ClientError(ErrorCode.REQUEST_TIMEOUT, 'late').fatal).toBe(false);
  });
});

describe('isClientError', () => {
  it('recognizes instances and branded look-alikes', () => {
    const branded = { [Symbol.for('tagpool.ClientError')]: true, code: 'WORKER_ERROR' };

    expect(isClientError(new ClientError(ErrorCode.WORKER_ERROR, 'x'))).toBe(true);
    expect(isClientError(branded)).toBe(true);
  });

  it('rejects plain errors and non-objects', () => {
    expect(isClientError(new Error('x'))).toBe(false);
    expect(isClientError('WORKER_ERROR')).toBe(false);
    expect(isClientError(null)).toBe(false);
  });
});

describe('isFatalClientError', () => {
  it('looks inside an AggregateError', () => {
    const aggregate = new AggregateError([
      new Error('listener failed'),
      new ClientError(ErrorCode.DISPATCH_LOOP_VIOLATION, 'blocked'),
    ]);

    expect(isFatalClientError(aggregate)).toBe(true);
    expect(isFatalClientError(new AggregateError([new Error('a'), new Error('b')]))).toBe(false);
  });

  it('is false for a recoverable ClientError', () => {
    expect(isFatalClientError(new ClientError(ErrorCode.WORKER_UNAVAILABLE, 'gone'))).toBe(false);
  });
});
