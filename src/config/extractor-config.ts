// ---------------------------------------------------------------------------
// Extractor Configuration
// ---------------------------------------------------------------------------
// Where the CLIP inference service lives and how photos are cropped before
// they are embedded. Loaded from <dataDir>/extractor.json;
// STONETRAIL_EXTRACTOR_URL overrides the endpoint.
// ---------------------------------------------------------------------------

import { debug } from '../shared/debug.js';
import { readJsonConfig } from '../shared/config.js';

export interface ExtractorConfig {
  /** Base URL of the CLIP service (no trailing slash). */
  endpoint: string;
  timeoutMs: number;
  /** Crop margin as a fraction of the subject's longer side. */
  paddingRatio: number;
  /** Longest thumbnail edge in pixels. */
  thumbnailSize: number;
}

interface RawConfigJson {
  endpoint?: unknown;
  timeoutMs?: unknown;
  paddingRatio?: unknown;
  thumbnailSize?: unknown;
}

const DEFAULTS: ExtractorConfig = {
  endpoint: 'http://127.0.0.1:8765',
  timeoutMs: 60_000,
  paddingRatio: 0.1,
  thumbnailSize: 200,
};

function parseEndpoint(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  try {
    const url = new URL(value);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    return value.replace(/\/+$/, '');
  } catch {
    return null;
  }
}

export function loadExtractorConfig(): ExtractorConfig {
  const raw = (readJsonConfig('extractor.json') ?? {}) as RawConfigJson;

  const endpoint =
    parseEndpoint(process.env.STONETRAIL_EXTRACTOR_URL) ??
    parseEndpoint(raw.endpoint) ??
    DEFAULTS.endpoint;

  const timeoutMs =
    typeof raw.timeoutMs === 'number' && raw.timeoutMs > 0 ? raw.timeoutMs : DEFAULTS.timeoutMs;

  const paddingRatio =
    typeof raw.paddingRatio === 'number' && raw.paddingRatio >= 0 && raw.paddingRatio <= 1
      ? raw.paddingRatio
      : DEFAULTS.paddingRatio;

  const thumbnailSize =
    typeof raw.thumbnailSize === 'number' && Number.isInteger(raw.thumbnailSize) && raw.thumbnailSize >= 16
      ? raw.thumbnailSize
      : DEFAULTS.thumbnailSize;

  debug('config', 'Extractor config', { endpoint, timeoutMs });
  return { endpoint, timeoutMs, paddingRatio, thumbnailSize };
}
