import type BetterSqlite3 from 'better-sqlite3';

import { debug, debugTimed } from '../shared/debug.js';
import { bufferToVector } from '../shared/types.js';
import { HnswGraph, type HnswOptions } from './hnsw.js';
import type { IdentityIndex, NearestStone } from './identity-index.js';

/**
 * In-memory HNSW index over the stones table.
 *
 * Built from stones.embedding on construction. Before each query it pulls
 * stones another process registered since the last look (ids only grow),
 * and it confirms the winner still exists so a stone deleted elsewhere
 * never resolves.
 */
export class HnswIdentityIndex implements IdentityIndex {
  private readonly graph: HnswGraph;
  private lastSeenId = 0;

  private readonly stmtSince: BetterSqlite3.Statement;
  private readonly stmtExists: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database, options?: Partial<HnswOptions>) {
    this.graph = new HnswGraph(options);

    this.stmtSince = db.prepare(
      'SELECT id, embedding FROM stones WHERE id > ? ORDER BY id',
    );
    this.stmtExists = db.prepare('SELECT 1 FROM stones WHERE id = ?');

    debugTimed('index', 'HNSW index built', () => this.catchUp());
    debug('index', 'HnswIdentityIndex initialized', { size: this.graph.size });
  }

  name(): string {
    return 'hnsw';
  }

  nearest(query: Float32Array): NearestStone | null {
    this.catchUp();

    for (;;) {
      const best = this.graph.nearest(query);
      if (best === null) return null;

      if (this.stmtExists.get(best.id) !== undefined) {
        return { stoneId: best.id, similarity: 1 - best.distance };
      }

      debug('index', 'Dropping stone deleted by another process', { stoneId: best.id });
      this.graph.remove(best.id);
    }
  }

  insert(stoneId: number, embedding: Float32Array): void {
    this.graph.add(stoneId, embedding);
    if (stoneId > this.lastSeenId) {
      this.lastSeenId = stoneId;
    }
  }

  remove(stoneId: number): void {
    this.graph.remove(stoneId);
  }

  size(): number {
    return this.graph.size;
  }

  private catchUp(): void {
    const rows = this.stmtSince.all(this.lastSeenId) as Array<{ id: number; embedding: Buffer }>;
    for (const row of rows) {
      this.insert(row.id, bufferToVector(row.embedding));
    }
    if (rows.length > 0) {
      debug('index', 'Indexed new stones', { count: rows.length, lastSeenId: this.lastSeenId });
    }
  }
}
