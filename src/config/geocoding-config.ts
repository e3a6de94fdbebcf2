// ---------------------------------------------------------------------------
// Geocoding Configuration
// ---------------------------------------------------------------------------
// Nominatim-compatible endpoint used to enrich sightings. Public Nominatim
// requires an identifying User-Agent, so it is configurable rather than
// hard-coded. Loaded from <dataDir>/geocoding.json.
// ---------------------------------------------------------------------------

import { debug } from '../shared/debug.js';
import { readJsonConfig } from '../shared/config.js';

export interface GeocodingConfig {
  /** When false, sightings are stored exactly as the user gave them. */
  enabled: boolean;
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

interface RawConfigJson {
  enabled?: unknown;
  baseUrl?: unknown;
  userAgent?: unknown;
  timeoutMs?: unknown;
}

const DEFAULTS: GeocodingConfig = {
  enabled: true,
  baseUrl: 'https://nominatim.openstreetmap.org',
  userAgent: 'stonetrail/1.0',
  timeoutMs: 10_000,
};

export function loadGeocodingConfig(): GeocodingConfig {
  const raw = (readJsonConfig('geocoding.json') ?? {}) as RawConfigJson;

  const enabled = typeof raw.enabled === 'boolean' ? raw.enabled : DEFAULTS.enabled;
  const baseUrl =
    typeof raw.baseUrl === 'string' && /^https?:\/\//.test(raw.baseUrl)
      ? raw.baseUrl.replace(/\/+$/, '')
      : DEFAULTS.baseUrl;
  const userAgent =
    typeof raw.userAgent === 'string' && raw.userAgent.trim().length > 0
      ? raw.userAgent.trim()
      : DEFAULTS.userAgent;
  const timeoutMs =
    typeof raw.timeoutMs === 'number' && raw.timeoutMs > 0 ? raw.timeoutMs : DEFAULTS.timeoutMs;

  debug('config', 'Geocoding config', { enabled, baseUrl });
  return { enabled, baseUrl, userAgent, timeoutMs };
}
