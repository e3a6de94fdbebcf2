import type BetterSqlite3 from 'better-sqlite3';
import type { ZodType, ZodTypeDef } from 'zod';

import type { IdentityIndex } from '../matching/identity-index.js';
import { debug, errorMessage } from '../shared/debug.js';
import { StoneError, isStoneError } from '../shared/errors.js';
import {
  SightingInsertSchema,
  StoneInsertSchema,
  rowToSighting,
  rowToStone,
  vectorToBuffer,
  type SightingInsert,
  type SightingLocation,
  type SightingRow,
  type Stone,
  type StoneInsert,
  type StoneOverview,
  type StonePage,
  type StoneRow,
  type StoneWithSightings,
} from '../shared/types.js';
import type { StonetrailDatabase } from './database.js';
import { StoneEmbeddingStore } from './embeddings.js';

export const PAGE_SIZE = 10;

type StoneCountRow = StoneRow & { sighting_count: number };

/**
 * Persistent store of stones and their sightings.
 *
 * Every write that touches more than one row runs in a single transaction;
 * the identity index hears about a stone only after that transaction
 * commits, in the same tick.
 *
 * All SQL statements are prepared once in the constructor.
 */
export class Registry {
  private readonly db: BetterSqlite3.Database;
  private readonly index: IdentityIndex;
  private readonly embeddings: StoneEmbeddingStore | null;

  private readonly stmtInsertStone: BetterSqlite3.Statement;
  private readonly stmtInsertSighting: BetterSqlite3.Statement;
  private readonly stmtGetStone: BetterSqlite3.Statement;
  private readonly stmtSightings: BetterSqlite3.Statement;
  private readonly stmtCountByRegistrant: BetterSqlite3.Statement;
  private readonly stmtPageByRegistrant: BetterSqlite3.Statement;
  private readonly stmtAllWithCounts: BetterSqlite3.Statement;
  private readonly stmtLatestLocated: BetterSqlite3.Statement;
  private readonly stmtDeleteSightings: BetterSqlite3.Statement;
  private readonly stmtDeleteStone: BetterSqlite3.Statement;
  private readonly stmtCount: BetterSqlite3.Statement;

  constructor(ldb: StonetrailDatabase, index: IdentityIndex) {
    this.db = ldb.db;
    this.index = index;
    this.embeddings = ldb.hasVectorSupport ? new StoneEmbeddingStore(ldb.db) : null;

    this.stmtInsertStone = this.db.prepare(`
      INSERT INTO stones (name, description, image_ref, embedding, registrant)
      VALUES (?, ?, ?, ?, ?)
    `);

    this.stmtInsertSighting = this.db.prepare(`
      INSERT INTO sightings (stone_id, reporter, image_ref, latitude, longitude, postal_code)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.stmtGetStone = this.db.prepare('SELECT * FROM stones WHERE id = ?');

    this.stmtSightings = this.db.prepare(`
      SELECT * FROM sightings
      WHERE stone_id = ?
      ORDER BY observed_at ASC, id ASC
    `);

    this.stmtCountByRegistrant = this.db.prepare(
      'SELECT COUNT(*) AS count FROM stones WHERE registrant = ?',
    );

    this.stmtPageByRegistrant = this.db.prepare(`
      SELECT s.*, (SELECT COUNT(*) FROM sightings WHERE stone_id = s.id) AS sighting_count
      FROM stones s
      WHERE s.registrant = ?
      ORDER BY s.id ASC
      LIMIT ? OFFSET ?
    `);

    this.stmtAllWithCounts = this.db.prepare(`
      SELECT s.*, (SELECT COUNT(*) FROM sightings WHERE stone_id = s.id) AS sighting_count
      FROM stones s
      ORDER BY s.id ASC
    `);

    this.stmtLatestLocated = this.db.prepare(`
      SELECT * FROM sightings
      WHERE stone_id = ? AND latitude IS NOT NULL AND longitude IS NOT NULL
      ORDER BY observed_at DESC, id DESC
      LIMIT 1
    `);

    this.stmtDeleteSightings = this.db.prepare('DELETE FROM sightings WHERE stone_id = ?');
    this.stmtDeleteStone = this.db.prepare('DELETE FROM stones WHERE id = ?');
    this.stmtCount = this.db.prepare('SELECT COUNT(*) AS count FROM stones');

    debug('registry', 'Registry initialized', {
      index: index.name(),
      vectorTable: this.embeddings !== null,
    });
  }

  /**
   * Registers a new stone with its embedding and first sighting.
   * Returns the new stone id.
   */
  createStone(input: StoneInsert): number {
    const v = validate(StoneInsertSchema, input);

    const id = this.write('createStone', () => {
      const result = this.stmtInsertStone.run(
        v.name,
        v.description || null,
        v.imageRef,
        vectorToBuffer(v.embedding),
        v.registrant,
      );
      const stoneId = Number(result.lastInsertRowid);

      this.embeddings?.store(stoneId, v.embedding);
      this.insertSighting(stoneId, v.registrant, v.imageRef, v.location);

      return stoneId;
    });

    this.index.insert(id, v.embedding);
    debug('registry', 'Stone created', { stoneId: id, registrant: v.registrant });
    return id;
  }

  /**
   * Records a new sighting of an existing stone. Returns the sighting id.
   */
  appendSighting(input: SightingInsert): number {
    const v = validate(SightingInsertSchema, input);

    const id = this.write('appendSighting', () => {
      if (this.stmtGetStone.get(v.stoneId) === undefined) {
        throw new StoneError('NOT_FOUND', `Stone ${v.stoneId} not found`);
      }
      return this.insertSighting(v.stoneId, v.reporter, v.imageRef, v.location);
    });

    debug('registry', 'Sighting appended', { stoneId: v.stoneId, sightingId: id });
    return id;
  }

  /**
   * One page of the stones a user registered, oldest first.
   * Out-of-range pages are clamped to the nearest valid page.
   */
  listByRegistrant(registrant: string, page: number, pageSize = PAGE_SIZE): StonePage {
    const { count: total } = this.stmtCountByRegistrant.get(registrant) as { count: number };
    const totalPages = Math.ceil(total / pageSize);
    const requested = Number.isFinite(page) ? Math.floor(page) : 0;
    const clamped = Math.min(Math.max(requested, 0), Math.max(totalPages - 1, 0));

    const rows = this.stmtPageByRegistrant.all(
      registrant,
      pageSize,
      clamped * pageSize,
    ) as StoneCountRow[];

    return {
      items: rows.map((row) => ({ stone: rowToStone(row), sightingCount: row.sighting_count })),
      page: clamped,
      totalPages,
      total,
    };
  }

  /**
   * A stone with its sightings, earliest first. Null when absent.
   */
  get(stoneId: number): StoneWithSightings | null {
    const row = this.stmtGetStone.get(stoneId) as StoneRow | undefined;
    if (!row) return null;

    const sightings = (this.stmtSightings.all(stoneId) as SightingRow[]).map(rowToSighting);
    return { ...rowToStone(row), sightings };
  }

  /**
   * Returns the stone when `user` registered it.
   * Throws NOT_FOUND or NOT_OWNER otherwise.
   */
  findOwned(stoneId: number, user: string): Stone {
    const row = this.stmtGetStone.get(stoneId) as StoneRow | undefined;
    if (!row) {
      throw new StoneError('NOT_FOUND', `Stone ${stoneId} not found`);
    }
    if (row.registrant !== user) {
      throw new StoneError('NOT_OWNER', `Stone ${stoneId} belongs to another user`);
    }
    return rowToStone(row);
  }

  /**
   * Deletes a stone, its sightings and its embedding. Only the registrant
   * may delete. Returns the deleted stone's name.
   */
  delete(stoneId: number, requester: string): string {
    const name = this.write('delete', () => {
      const stone = this.findOwned(stoneId, requester);
      this.stmtDeleteSightings.run(stoneId);
      this.embeddings?.delete(stoneId);
      this.stmtDeleteStone.run(stoneId);
      return stone.name;
    });

    this.index.remove(stoneId);
    debug('registry', 'Stone deleted', { stoneId, requester });
    return name;
  }

  /**
   * Every stone with its sighting count and latest located sighting.
   */
  listAll(): StoneOverview[] {
    const rows = this.stmtAllWithCounts.all() as StoneCountRow[];
    return rows.map((row) => {
      const latest = this.stmtLatestLocated.get(row.id) as SightingRow | undefined;
      return {
        stone: rowToStone(row),
        sightingCount: row.sighting_count,
        latestLocated: latest ? rowToSighting(latest) : null,
      };
    });
  }

  count(): number {
    const row = this.stmtCount.get() as { count: number };
    return row.count;
  }

  private insertSighting(
    stoneId: number,
    reporter: string,
    imageRef: string,
    location: SightingLocation | null,
  ): number {
    const result = this.stmtInsertSighting.run(
      stoneId,
      reporter,
      imageRef,
      location?.latitude ?? null,
      location?.longitude ?? null,
      location?.postalCode ?? null,
    );
    return Number(result.lastInsertRowid);
  }

  /**
   * Runs `fn` in a transaction. Domain errors pass through; anything else
   * becomes PERSISTENCE_FAILURE.
   */
  private write<T>(op: string, fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      if (isStoneError(err)) throw err;
      debug('registry', `${op} failed, rolled back`, { error: errorMessage(err) });
      throw new StoneError('PERSISTENCE_FAILURE', `${op} failed`, { cause: err });
    }
  }
}

function validate<Out, In>(schema: ZodType<Out, ZodTypeDef, In>, input: In): Out {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new StoneError('INVALID_INPUT', parsed.error.issues.map((i) => i.message).join('; '), {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
