// ---------------------------------------------------------------------------
// Server Configuration
// ---------------------------------------------------------------------------
// Port for the webhook/read API and the optional shared secret webhook
// callers must present. Loaded from <dataDir>/server.json;
// STONETRAIL_WEB_PORT and STONETRAIL_WEBHOOK_SECRET override the file.
// ---------------------------------------------------------------------------

import { debug } from '../shared/debug.js';
import { readJsonConfig } from '../shared/config.js';

export interface ServerConfig {
  webPort: number;
  /** Null disables the secret check. */
  webhookSecret: string | null;
}

interface RawConfigJson {
  webPort?: unknown;
  webhookSecret?: unknown;
}

const DEFAULTS: ServerConfig = {
  webPort: 37830,
  webhookSecret: null,
};

function parsePort(value: unknown): number | null {
  const port = typeof value === 'string' && value !== '' ? Number(value) : value;
  return typeof port === 'number' && Number.isInteger(port) && port > 0 && port < 65536
    ? port
    : null;
}

function parseSecret(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function loadServerConfig(): ServerConfig {
  const raw = (readJsonConfig('server.json') ?? {}) as RawConfigJson;

  const webPort =
    parsePort(process.env.STONETRAIL_WEB_PORT) ?? parsePort(raw.webPort) ?? DEFAULTS.webPort;
  const webhookSecret =
    parseSecret(process.env.STONETRAIL_WEBHOOK_SECRET) ??
    parseSecret(raw.webhookSecret) ??
    DEFAULTS.webhookSecret;

  debug('config', 'Server config', { webPort, webhookSecret: webhookSecret ? 'set' : 'unset' });
  return { webPort, webhookSecret };
}
