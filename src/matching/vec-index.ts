import type BetterSqlite3 from 'better-sqlite3';

import { StoneEmbeddingStore } from '../storage/embeddings.js';
import type { IdentityIndex, NearestStone } from './identity-index.js';

/**
 * Exact KNN through sqlite-vec's vec0 table.
 *
 * The Registry writes stone_embeddings inside its own transactions, so
 * insert/remove have nothing left to do here.
 */
export class VecIdentityIndex implements IdentityIndex {
  private readonly store: StoneEmbeddingStore;

  constructor(db: BetterSqlite3.Database) {
    this.store = new StoneEmbeddingStore(db);
  }

  name(): string {
    return 'vec';
  }

  nearest(query: Float32Array): NearestStone | null {
    const [best] = this.store.search(query, 1);
    if (!best) return null;
    return { stoneId: best.stoneId, similarity: 1 - best.distance };
  }

  insert(): void {}

  remove(): void {}

  size(): number {
    return this.store.count();
  }
}
