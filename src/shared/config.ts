import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import type { DatabaseConfig } from './types.js';

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `STONETRAIL_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `<dataDir>/config.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 *
 * The result is cached after the first call.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.STONETRAIL_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  const config = readJsonConfig('config.json');
  if (config?.debug === true) {
    _debugCached = true;
    return true;
  }

  _debugCached = false;
  return false;
}

/**
 * Default busy timeout in milliseconds.
 * Must be >= 5000ms to prevent SQLITE_BUSY when a second process
 * (webhook worker, MCP server) writes to the same file.
 */
export const DEFAULT_BUSY_TIMEOUT = 5000;

/**
 * Returns the stonetrail data directory.
 * Default: ~/.stonetrail/
 * Creates the directory recursively if it does not exist.
 *
 * STONETRAIL_DATA_DIR redirects all data (database, images, config files)
 * to another directory; tests rely on this.
 */
export function getConfigDir(): string {
  const dir = process.env.STONETRAIL_DATA_DIR || join(homedir(), '.stonetrail');
  mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Returns the path to the stonetrail database file.
 */
export function getDbPath(): string {
  return join(getConfigDir(), 'stonetrail.db');
}

/**
 * Returns the directory holding photos stored by the image store.
 */
export function getImageDir(): string {
  const dir = join(getConfigDir(), 'images');
  mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Returns the default database configuration.
 */
export function getDatabaseConfig(): DatabaseConfig {
  return {
    dbPath: getDbPath(),
    busyTimeout: DEFAULT_BUSY_TIMEOUT,
  };
}

/**
 * Reads a JSON object from the data directory.
 *
 * Returns null when the file is missing, unreadable, or not a JSON object.
 * Callers fall back to their defaults in that case.
 */
export function readJsonConfig(fileName: string): Record<string, unknown> | null {
  let content: string;
  try {
    content = readFileSync(join(getConfigDir(), fileName), 'utf-8');
  } catch {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return parsed as Record<string, unknown>;
    }
  } catch (err) {
    process.stderr.write(
      `stonetrail: ignoring malformed ${fileName}: ${err instanceof Error ? err.message : String(err)}\n`,
    );
  }
  return null;
}
