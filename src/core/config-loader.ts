/**
 * TOML-based configuration loader for tagpool.
 *
 * Reads `config.toml` from `$TAGPOOL_HOME`, parses it with smol-toml,
 * validates it and returns a fully typed `TagpoolConfig`.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseConfig, DEFAULT_CONFIG, resolveHome } from '../types/config.js';
import type { TagpoolConfig } from '../types/config.js';

/**
 * Load and validate `config.toml` from a tagpool home directory.
 *
 * If `config.toml` does not exist or is empty, returns `DEFAULT_CONFIG`.
 * Throws on invalid TOML syntax or schema validation errors.
 *
 * @param home - Defaults to {@link resolveHome}.
 */
export function loadConfig(home: string = resolveHome()): TagpoolConfig {
  const configPath = join(home, 'config.toml');

  if (!existsSync(configPath)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return structuredClone(DEFAULT_CONFIG);
  }

  return parseConfig(parseTOML(content));
}
