/**
 * tagpool configuration schema and TAGPOOL_HOME resolution.
 *
 * Defines the TypeScript types for config.toml sections, the defaults
 * applied to missing values and the $TAGPOOL_HOME resolution algorithm.
 */

import { availableParallelism, homedir } from 'node:os';
import { join } from 'node:path';

import { LOG_LEVELS, isLogLevel, type LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[pool]` section of config.toml. */
export interface PoolConfig {
  /** Transport address the pool's ROUTER socket binds. */
  address: string;
  /** Workers the pool expects to register. */
  worker_count: number;
  /** How long start() waits for the workers, in milliseconds. */
  startup_timeout_ms: number;
  /** Per-request deadline in milliseconds; 0 disables it. */
  request_timeout_ms: number;
}

/** `[logging]` section of config.toml. */
export interface LoggingConfig {
  level: LogLevel;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full tagpool configuration.
 *
 * Known sections are strongly typed. Unknown top-level keys are
 * preserved as-is so other tools can keep their settings in the same file.
 */
export interface TagpoolConfig {
  pool: PoolConfig;
  logging: LoggingConfig;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default configuration applied when config.toml is absent or partial. */
export const DEFAULT_CONFIG: TagpoolConfig = {
  pool: {
    address: 'ipc:///tmp/tagpool-workers.sock',
    worker_count: availableParallelism(),
    startup_timeout_ms: 10_000,
    request_timeout_ms: 0,
  },
  logging: { level: 'info' },
};

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

/**
 * Resolve the tagpool home directory.
 *
 * Precedence:
 *  1. `$TAGPOOL_HOME` environment variable (if non-empty)
 *  2. `~/.tagpool/` default
 *
 * Trailing slashes are stripped. A leading `~` is expanded to the
 * user's home directory.
 */
export function resolveHome(): string {
  const envValue = process.env['TAGPOOL_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    // Expand leading ~
    if (resolved.startsWith('~/') || resolved === '~') {
      resolved = join(homedir(), resolved.slice(2));
    }
    // Strip trailing slash
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(homedir(), '.tagpool');
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

const KNOWN_SECTIONS: ReadonlySet<string> = new Set(['pool', 'logging']);

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isTable(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return value;
}

function readInteger(
  section: Record<string, unknown>,
  key: string,
  fallback: number,
  min: number,
): number {
  const value = section[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new Error(`pool.${key} must be an integer >= ${min}`);
  }
  return value;
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into
 * a fully typed `TagpoolConfig`. Applies defaults for missing sections
 * and values, and validates known fields.
 *
 * Unknown top-level sections are passed through.
 */
export function parseConfig(raw: Record<string, unknown>): TagpoolConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.has(key)) {
      extra[key] = raw[key];
    }
  }

  // --- pool ---
  const rawPool = readSection(raw, 'pool');
  const address = rawPool['address'] ?? DEFAULT_CONFIG.pool.address;
  if (typeof address !== 'string' || address.length === 0) {
    throw new Error('pool.address must be a non-empty string');
  }
  const pool: PoolConfig = {
    address,
    worker_count: readInteger(rawPool, 'worker_count', DEFAULT_CONFIG.pool.worker_count, 1),
    startup_timeout_ms: readInteger(
      rawPool,
      'startup_timeout_ms',
      DEFAULT_CONFIG.pool.startup_timeout_ms,
      0,
    ),
    request_timeout_ms: readInteger(
      rawPool,
      'request_timeout_ms',
      DEFAULT_CONFIG.pool.request_timeout_ms,
      0,
    ),
  };

  // --- logging ---
  const rawLogging = readSection(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${String(level)}". Must be one of: ${LOG_LEVELS.join(', ')}`,
    );
  }

  return { ...extra, pool, logging: { level } };
}
