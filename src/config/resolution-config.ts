// ---------------------------------------------------------------------------
// Resolution Configuration
// ---------------------------------------------------------------------------
// Thresholds for "same stone" and "is this a stone at all", plus the choice
// and tuning of the identity index. Both thresholds are tied to the
// embedding model: swapping the model means re-tuning them here.
//
// Loaded from <dataDir>/resolution.json; STONETRAIL_SIMILARITY_THRESHOLD
// overrides the file.
// ---------------------------------------------------------------------------

import { debug } from '../shared/debug.js';
import { readJsonConfig } from '../shared/config.js';
import { INDEX_KINDS, type IndexKind } from '../matching/identity-index.js';
import { DEFAULT_HNSW_OPTIONS, type HnswOptions } from '../matching/hnsw.js';
import { DEFAULT_SIMILARITY_THRESHOLD } from '../matching/resolver.js';

export interface ResolutionConfig {
  /** Minimum cosine similarity for a photo to resolve to an existing stone. */
  similarityThreshold: number;
  /** Minimum positive-minus-negative prompt score for "this is a stone". */
  decisionMargin: number;
  indexKind: IndexKind;
  hnsw: HnswOptions;
}

interface RawConfigJson {
  similarityThreshold?: unknown;
  decisionMargin?: unknown;
  indexKind?: unknown;
  hnsw?: { m?: unknown; efConstruction?: unknown; efSearch?: unknown; seed?: unknown };
}

const DEFAULTS: ResolutionConfig = {
  similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
  decisionMargin: 0.05,
  indexKind: 'auto',
  hnsw: { ...DEFAULT_HNSW_OPTIONS },
};

function isCosine(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= -1 && value <= 1;
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function isIndexKind(value: unknown): value is IndexKind {
  return typeof value === 'string' && (INDEX_KINDS as readonly string[]).includes(value);
}

/**
 * Loads resolution configuration. Invalid fields fall back to defaults
 * one at a time.
 */
export function loadResolutionConfig(): ResolutionConfig {
  const raw = (readJsonConfig('resolution.json') ?? {}) as RawConfigJson;

  let similarityThreshold = isCosine(raw.similarityThreshold)
    ? raw.similarityThreshold
    : DEFAULTS.similarityThreshold;

  const envThreshold = process.env.STONETRAIL_SIMILARITY_THRESHOLD;
  if (envThreshold !== undefined && envThreshold !== '') {
    const parsed = Number(envThreshold);
    if (isCosine(parsed)) {
      similarityThreshold = parsed;
    } else {
      debug('config', 'Ignoring invalid STONETRAIL_SIMILARITY_THRESHOLD', { value: envThreshold });
    }
  }

  const decisionMargin = isCosine(raw.decisionMargin) ? raw.decisionMargin : DEFAULTS.decisionMargin;
  const indexKind = isIndexKind(raw.indexKind) ? raw.indexKind : DEFAULTS.indexKind;

  const hnswRaw = raw.hnsw ?? {};
  const m = positiveInt(hnswRaw.m, DEFAULTS.hnsw.m);
  const hnsw: HnswOptions = {
    m: m >= 2 ? m : DEFAULTS.hnsw.m,
    efConstruction: positiveInt(hnswRaw.efConstruction, DEFAULTS.hnsw.efConstruction),
    efSearch: positiveInt(hnswRaw.efSearch, DEFAULTS.hnsw.efSearch),
    seed: typeof hnswRaw.seed === 'number' && Number.isInteger(hnswRaw.seed)
      ? hnswRaw.seed
      : DEFAULTS.hnsw.seed,
  };

  const config = { similarityThreshold, decisionMargin, indexKind, hnsw };
  debug('config', 'Resolution config', { similarityThreshold, decisionMargin, indexKind });
  return config;
}
