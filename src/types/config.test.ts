import { describe, it, expect, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { resolveHome, parseConfig, DEFAULT_CONFIG } from './config.js';

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

describe('resolveHome', () => {
  const originalEnv = process.env['TAGPOOL_HOME'];

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env['TAGPOOL_HOME'] = originalEnv;
    } else {
      delete process.env['TAGPOOL_HOME'];
    }
  });

  it('returns $TAGPOOL_HOME when set', () => {
    process.env['TAGPOOL_HOME'] = '/custom/path';
    expect(resolveHome()).toBe('/custom/path');
  });

  it('returns $TAGPOOL_HOME with trailing slash stripped', () => {
    process.env['TAGPOOL_HOME'] = '/custom/path/';
    expect(resolveHome()).toBe('/custom/path');
  });

  it('expands a leading ~', () => {
    process.env['TAGPOOL_HOME'] = '~/music/tagpool';
    expect(resolveHome()).toBe(join(homedir(), 'music/tagpool'));
  });

  it('falls back to ~/.tagpool when $TAGPOOL_HOME is not set or empty', () => {
    delete process.env['TAGPOOL_HOME'];
    expect(resolveHome()).toBe(join(homedir(), '.tagpool'));

    process.env['TAGPOOL_HOME'] = '';
    expect(resolveHome()).toBe(join(homedir(), '.tagpool'));
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('applies defaults to an empty object', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('defaults the worker count to at least one worker', () => {
    expect(DEFAULT_CONFIG.pool.worker_count).toBeGreaterThanOrEqual(1);
  });

  it('fills missing pool keys from the defaults', () => {
    const config = parseConfig({ pool: { worker_count: 2, request_timeout_ms: 500 } });

    expect(config.pool).toEqual({
      address: DEFAULT_CONFIG.pool.address,
      worker_count: 2,
      startup_timeout_ms: 10_000,
      request_timeout_ms: 500,
    });
  });

  it('reads the log level', () => {
    expect(parseConfig({ logging: { level: 'debug' } }).logging.level).toBe('debug');
  });

  it('preserves unknown sections', () => {
    const config = parseConfig({ player: { theme: 'dark' } });
    expect(config['player']).toEqual({ theme: 'dark' });
  });

  it.each([
    [{ pool: 'fast' }, '[pool] must be a table'],
    [{ pool: { address: '' } }, 'pool.address must be a non-empty string'],
    [{ pool: { worker_count: 0 } }, 'pool.worker_count must be an integer >= 1'],
    [{ pool: { worker_count: 2.5 } }, 'pool.worker_count must be an integer >= 1'],
    [{ pool: { startup_timeout_ms: -1 } }, 'pool.startup_timeout_ms must be an integer >= 0'],
    [{ pool: { request_timeout_ms: '5s' } }, 'pool.request_timeout_ms must be an integer >= 0'],
    [
      { logging: { level: 'trace' } },
      'Invalid logging.level: "trace". Must be one of: debug, info, warn, error',
    ],
  ])('rejects %j', (raw, message) => {
    expect(() => parseConfig(raw)).toThrow(message);
  });
});
