import type BetterSqlite3 from 'better-sqlite3';

import { bufferToVector } from '../shared/types.js';
import { cosineSimilarity } from '../shared/vector.js';
import type { IdentityIndex, NearestStone } from './identity-index.js';

/**
 * Exact nearest neighbour by scanning every stored embedding.
 *
 * O(n) per query; kept as the reference the approximate index is checked
 * against, and as a fallback for tiny registries.
 */
export class LinearScanIndex implements IdentityIndex {
  private readonly stmtAll: BetterSqlite3.Statement;
  private readonly stmtCount: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.stmtAll = db.prepare('SELECT id, embedding FROM stones ORDER BY id');
    this.stmtCount = db.prepare('SELECT COUNT(*) AS count FROM stones');
  }

  name(): string {
    return 'linear';
  }

  nearest(query: Float32Array): NearestStone | null {
    let best: NearestStone | null = null;

    for (const row of this.stmtAll.iterate() as Iterable<{ id: number; embedding: Buffer }>) {
      const similarity = cosineSimilarity(query, bufferToVector(row.embedding));
      if (best === null || similarity > best.similarity) {
        best = { stoneId: row.id, similarity };
      }
    }

    return best;
  }

  insert(): void {}

  remove(): void {}

  size(): number {
    const row = this.stmtCount.get() as { count: number };
    return row.count;
  }
}
