/**
 * StoneEmbeddingStore for sqlite-vec vec0 table operations.
 *
 * Provides store/delete/search against the cosine-distance vec0 table
 * (stone_embeddings). The Registry calls store/delete from inside its
 * transactions, so these methods throw instead of degrading: a failed
 * vector write must roll the whole registration back.
 *
 * Float32Array passes directly to better-sqlite3 for vec0 operations.
 * vec0 primary keys only accept INTEGER bindings, hence BigInt ids.
 */

import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';

/** A single KNN result with stone ID and cosine distance. */
export interface EmbeddingSearchResult {
  stoneId: number;
  distance: number;
}

export class StoneEmbeddingStore {
  private readonly stmtInsert: BetterSqlite3.Statement;
  private readonly stmtSearch: BetterSqlite3.Statement;
  private readonly stmtDelete: BetterSqlite3.Statement;
  private readonly stmtCount: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.stmtInsert = db.prepare(
      'INSERT OR REPLACE INTO stone_embeddings(stone_id, embedding) VALUES (?, ?)',
    );

    this.stmtSearch = db.prepare(`
      SELECT stone_id, distance
      FROM stone_embeddings
      WHERE embedding MATCH ?
      ORDER BY distance
      LIMIT ?
    `);

    this.stmtDelete = db.prepare('DELETE FROM stone_embeddings WHERE stone_id = ?');

    this.stmtCount = db.prepare('SELECT COUNT(*) AS count FROM stone_embeddings');
  }

  store(stoneId: number, embedding: Float32Array): void {
    this.stmtInsert.run(BigInt(stoneId), embedding);
    debug('embed', 'Stored embedding', { stoneId, dimensions: embedding.length });
  }

  /**
   * KNN search using cosine distance, nearest first.
   */
  search(queryEmbedding: Float32Array, limit = 1): EmbeddingSearchResult[] {
    const rows = this.stmtSearch.all(queryEmbedding, limit) as Array<{
      stone_id: number;
      distance: number;
    }>;

    debug('embed', 'Search completed', { results: rows.length, limit });

    return rows.map((row) => ({
      stoneId: Number(row.stone_id),
      distance: row.distance,
    }));
  }

  delete(stoneId: number): void {
    this.stmtDelete.run(BigInt(stoneId));
    debug('embed', 'Deleted embedding', { stoneId });
  }

  count(): number {
    const row = this.stmtCount.get() as { count: number };
    return row.count;
  }
}
