import { debug } from '../shared/debug.js';
import type { IdentityIndex } from './identity-index.js';

/** Default cut-off for "same stone", tuned on CLIP ViT-B/32 image features. */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.82;

export type Resolution =
  | { kind: 'matched'; stoneId: number; similarity: number }
  | { kind: 'no_match'; bestSimilarity: number | null };

/**
 * Decides whether an embedding belongs to a known stone.
 *
 * Pure over the index: the same embedding against the same registry state
 * always yields the same outcome. A best similarity exactly at the
 * threshold counts as a match.
 */
export class Resolver {
  constructor(
    private readonly index: IdentityIndex,
    private readonly threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
  ) {
    if (!Number.isFinite(threshold) || threshold < -1 || threshold > 1) {
      throw new RangeError(`Similarity threshold out of range: ${threshold}`);
    }
  }

  get similarityThreshold(): number {
    return this.threshold;
  }

  resolve(embedding: Float32Array): Resolution {
    const best = this.index.nearest(embedding);

    if (best === null) {
      debug('resolve', 'Registry empty, no match');
      return { kind: 'no_match', bestSimilarity: null };
    }

    if (best.similarity >= this.threshold) {
      debug('resolve', 'Matched', { stoneId: best.stoneId, similarity: best.similarity });
      return { kind: 'matched', stoneId: best.stoneId, similarity: best.similarity };
    }

    debug('resolve', 'Below threshold', {
      closest: best.stoneId,
      similarity: best.similarity,
      threshold: this.threshold,
    });
    return { kind: 'no_match', bestSimilarity: best.similarity };
  }
}
