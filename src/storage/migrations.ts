import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';

/**
 * A versioned schema migration.
 * Migrations are applied in order and tracked in the _migrations table.
 */
export interface Migration {
  version: number;
  name: string;
  up: string; // SQL to execute
  /** Only applied when the sqlite-vec extension is loaded. */
  requiresVector?: boolean;
}

/** Millisecond ISO-8601 timestamp, so sightings filed in one second keep their order. */
const NOW_ISO = "(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))";

/**
 * All schema migrations in order.
 *
 * Migration 001: Stones with their embedding BLOB (the source of truth the
 *   in-memory and linear indexes are built from).
 * Migration 002: Sightings, one row per sighting, FK to stones.
 * Migration 003: sqlite-vec vec0 table for 512-dim cosine KNN (conditional),
 *   back-filled from stones.embedding.
 * Migration 004: Per-user preferences (locale).
 */
export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_stones',
    up: `
      CREATE TABLE stones (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL CHECK (length(name) >= 2),
        description TEXT,
        image_ref TEXT NOT NULL,
        embedding BLOB NOT NULL,
        registrant TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT ${NOW_ISO}
      );

      CREATE INDEX idx_stones_registrant ON stones(registrant, id);
    `,
  },
  {
    version: 2,
    name: 'create_sightings',
    up: `
      CREATE TABLE sightings (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        stone_id INTEGER NOT NULL REFERENCES stones(id),
        reporter TEXT NOT NULL,
        image_ref TEXT NOT NULL,
        latitude REAL,
        longitude REAL,
        postal_code TEXT,
        observed_at TEXT NOT NULL DEFAULT ${NOW_ISO}
      );

      CREATE INDEX idx_sightings_stone_observed ON sightings(stone_id, observed_at, id);
    `,
  },
  {
    version: 3,
    name: 'create_vec0_stone_embeddings',
    requiresVector: true,
    up: `
      CREATE VIRTUAL TABLE IF NOT EXISTS stone_embeddings USING vec0(
        stone_id INTEGER PRIMARY KEY,
        embedding float[512] distance_metric=cosine
      );

      INSERT INTO stone_embeddings(stone_id, embedding)
        SELECT id, embedding FROM stones;
    `,
  },
  {
    version: 4,
    name: 'create_user_preferences',
    up: `
      CREATE TABLE user_preferences (
        user_id TEXT PRIMARY KEY,
        locale TEXT NOT NULL,
        updated_at TEXT NOT NULL DEFAULT ${NOW_ISO}
      );
    `,
  },
];

/**
 * Applies unapplied schema migrations in order.
 *
 * Creates a _migrations tracking table if it does not exist, then applies
 * every migration not yet recorded there. Each migration runs inside a
 * transaction for atomicity.
 *
 * Vector migrations are skipped while sqlite-vec is unavailable and picked up
 * on a later run when the extension loads; the back-fill in migration 003
 * then indexes every stone registered in the meantime.
 *
 * @param db - An open better-sqlite3 database connection
 * @param hasVectorSupport - Whether sqlite-vec loaded successfully
 */
export function runMigrations(
  db: BetterSqlite3.Database,
  hasVectorSupport: boolean,
): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  // Applied set rather than max version: a skipped vector migration must
  // still run once the extension shows up.
  const applied = new Set(
    db.prepare('SELECT version FROM _migrations').pluck().all() as number[],
  );

  const insertMigration = db.prepare(
    'INSERT INTO _migrations (version, name) VALUES (?, ?)',
  );

  const applyMigration = db.transaction((m: Migration) => {
    db.exec(m.up);
    insertMigration.run(m.version, m.name);
  });

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.version)) {
      continue;
    }

    if (migration.requiresVector && !hasVectorSupport) {
      debug('db', 'Skipping vector migration (sqlite-vec unavailable)', {
        version: migration.version,
      });
      continue;
    }

    applyMigration(migration);
    debug('db', 'Applied migration', { version: migration.version, name: migration.name });
  }
}
