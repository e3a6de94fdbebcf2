import { isDebugEnabled } from './config.js';

/**
 * Internal cached state for debug mode.
 * Resolved on first call and never changes (debug mode is process-lifetime).
 */
let _enabled: boolean | null = null;

function enabled(): boolean {
  if (_enabled === null) {
    _enabled = isDebugEnabled();
  }
  return _enabled;
}

/**
 * Logs a debug message to stderr when debug mode is active.
 *
 * When debug is disabled (the default), this is a no-op after the first
 * call -- the cached flag short-circuits immediately.
 *
 * Format: `[ISO_TIMESTAMP] [STONETRAIL:category] message {json_data}`
 *
 * @param category - Debug category (e.g., 'db', 'registry', 'index', 'intake')
 * @param message - Human-readable log message
 * @param data - Optional structured data (never image bytes or full vectors)
 */
export function debug(
  category: string,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!enabled()) {
    return;
  }

  const timestamp = new Date().toISOString();
  let line = `[${timestamp}] [STONETRAIL:${category}] ${message}`;
  if (data !== undefined) {
    line += ` ${JSON.stringify(data)}`;
  }
  process.stderr.write(line + '\n');
}

/**
 * Extracts a loggable message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wraps a synchronous function with timing instrumentation.
 *
 * When debug is disabled, calls `fn()` directly -- no timing measurement.
 */
export function debugTimed<T>(
  category: string,
  message: string,
  fn: () => T,
): T {
  if (!enabled()) {
    return fn();
  }

  const start = performance.now();
  const result = fn();
  const duration = (performance.now() - start).toFixed(2);
  debug(category, `${message} (${duration}ms)`);
  return result;
}

/**
 * Async counterpart of debugTimed, used around extractor and geocoder calls.
 * The timing line is written whether the promise resolves or rejects.
 */
export async function debugTimedAsync<T>(
  category: string,
  message: string,
  fn: () => Promise<T>,
): Promise<T> {
  if (!enabled()) {
    return fn();
  }

  const start = performance.now();
  try {
    return await fn();
  } finally {
    const duration = (performance.now() - start).toFixed(2);
    debug(category, `${message} (${duration}ms)`);
  }
}
