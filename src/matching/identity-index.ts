/**
 * IdentityIndex interface and factory.
 *
 * The Resolution Engine and the Registry depend on this interface only --
 * never on a concrete index.
 */

import type { StonetrailDatabase } from '../storage/database.js';
import { debug } from '../shared/debug.js';
import { HnswIdentityIndex } from './hnsw-index.js';
import type { HnswOptions } from './hnsw.js';
import { LinearScanIndex } from './linear-index.js';
import { VecIdentityIndex } from './vec-index.js';

/** Best match for a query embedding. */
export interface NearestStone {
  stoneId: number;
  /** 1 - cosine distance; 1.0 means identical direction. */
  similarity: number;
}

/**
 * Nearest-neighbour lookup over every known stone embedding.
 *
 * `insert` and `remove` are called by the Registry right after the
 * creating/deleting transaction commits, in the same tick, so a committed
 * stone is visible to the next `nearest` call. Table-backed indexes read
 * the committed rows directly and treat both as no-ops.
 */
export interface IdentityIndex {
  name(): string;
  nearest(query: Float32Array): NearestStone | null;
  insert(stoneId: number, embedding: Float32Array): void;
  remove(stoneId: number): void;
  size(): number;
}

/**
 * Index selection.
 *
 * - 'hnsw':   in-memory graph-based approximate search (default)
 * - 'vec':    sqlite-vec KNN over the stone_embeddings vec0 table
 * - 'linear': exact scan over stones.embedding (correctness reference)
 * - 'auto':   resolves to 'hnsw'
 */
export type IndexKind = 'auto' | 'hnsw' | 'vec' | 'linear';

export const INDEX_KINDS: readonly IndexKind[] = ['auto', 'hnsw', 'vec', 'linear'];

/**
 * Creates the identity index for an open database.
 *
 * A 'vec' request without sqlite-vec loaded degrades to 'hnsw'.
 */
export function createIdentityIndex(
  ldb: StonetrailDatabase,
  kind: IndexKind,
  hnswOptions?: Partial<HnswOptions>,
): IdentityIndex {
  let resolved: Exclude<IndexKind, 'auto'> = kind === 'auto' ? 'hnsw' : kind;

  if (resolved === 'vec' && !ldb.hasVectorSupport) {
    debug('index', 'vec index requested without sqlite-vec, using hnsw');
    resolved = 'hnsw';
  }

  switch (resolved) {
    case 'vec':
      return new VecIdentityIndex(ldb.db);
    case 'linear':
      return new LinearScanIndex(ldb.db);
    case 'hnsw':
      return new HnswIdentityIndex(ldb.db, hnswOptions);
  }
}
