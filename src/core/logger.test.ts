import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  isLogLevel,
  NEVER_LOG_FIELDS,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';

// ---------------------------------------------------------------------------
// Test sink that captures log entries
// ---------------------------------------------------------------------------

function createTestSink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return { sink, entries };
}

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'debug', sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
  });

  describe('createLogger', () => {
    it('writes level, timestamp, component and message', () => {
      createLogger('pool').info('worker registered');

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ level: 'info', component: 'pool', msg: 'worker registered' });
      expect(new Date(entries[0].ts).toISOString()).toBe(entries[0].ts);
    });

    it('omits meta when none is given', () => {
      createLogger('pool').warn('no meta');
      expect(entries[0].meta).toBeUndefined();
    });
  });

  describe('level filtering', () => {
    it('drops entries below the configured level', () => {
      configureLogging({ level: 'warn' });
      const logger = createLogger('pool');

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('resetLogging restores info as the minimum level', () => {
      const sink = vi.fn<LogSink>();
      resetLogging();
      configureLogging({ sink });

      createLogger('pool').debug('hidden');
      createLogger('pool').info('shown');

      expect(sink).toHaveBeenCalledTimes(1);
    });
  });

  describe('promoted fields', () => {
    it('moves request fields from meta to the entry', () => {
      createLogger('pool').warn('request failed', {
        correlation: 7,
        operation: 'save_file',
        worker: 'abcd',
        duration_ms: 12,
        ok: false,
        error_code: 'WORKER_ERROR',
        reason: 'read-only',
      });

      expect(entries[0]).toMatchObject({
        correlation: 7,
        operation: 'save_file',
        worker: 'abcd',
        duration_ms: 12,
        ok: false,
        error_code: 'WORKER_ERROR',
      });
      expect(entries[0].meta).toEqual({ reason: 'read-only' });
    });

    it('ignores promoted keys of the wrong type', () => {
      createLogger('pool').info('odd', { correlation: null, extra: 1 });

      expect(entries[0].correlation).toBeUndefined();
      expect(entries[0].meta).toEqual({ extra: 1 });
    });

    it('withContext binds fields to every entry', () => {
      const logger = createLogger('pool').withContext({ correlation: 3, operation: 'read_file' });
      logger.debug('sent');
      logger.withContext({ worker: 'ff' }).debug('answered');

      expect(entries[0]).toMatchObject({ correlation: 3, operation: 'read_file' });
      expect(entries[1]).toMatchObject({ correlation: 3, operation: 'read_file', worker: 'ff' });
    });

    it('child appends to the component name and keeps the context', () => {
      createLogger('tagpool').withContext({ correlation: 1 }).child('client').info('x');

      expect(entries[0].component).toBe('tagpool:client');
      expect(entries[0].correlation).toBe(1);
    });
  });

  describe('metadata sanitization', () => {
    it('drops every deny-listed field', () => {
      const meta: Record<string, unknown> = { kept: 'yes' };
      for (const field of NEVER_LOG_FIELDS) {
        meta[field] = 'test-secret';
      }

      createLogger('client').info('cloud read', meta);

      expect(entries[0].meta).toEqual({ kept: 'yes' });
    });

    it('truncates long strings', () => {
      createLogger('client').info('long', { text: 'x'.repeat(META_STRING_MAX_LENGTH + 5) });

      expect(entries[0].meta?.['text']).toBe('x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('serializes Error values', () => {
      createLogger('client').error('failed', { error: new TypeError('bad input') });

      expect(entries[0].meta?.['error']).toMatchObject({ name: 'TypeError', message: 'bad input' });
    });
  });
});

describe('isLogLevel', () => {
  it('accepts the four levels and nothing else', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });
});
