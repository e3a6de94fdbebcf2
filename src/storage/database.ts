import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { debug, errorMessage } from '../shared/debug.js';
import type { DatabaseConfig } from '../shared/types.js';
import { runMigrations } from './migrations.js';

/**
 * The one connection a stonetrail process holds. The MCP and webhook
 * servers of different processes share the file through WAL.
 */
export interface StonetrailDatabase {
  readonly db: Database.Database;
  /** False when sqlite-vec could not load; `stone_embeddings` is then absent. */
  readonly hasVectorSupport: boolean;
  readonly path: string;
  /** Checkpoints the WAL and closes. A second call does nothing. */
  close(): void;
}

// Applied in order after journal_mode. NORMAL sync is only durable under WAL.
const CONNECTION_PRAGMAS = [
  'synchronous = NORMAL',
  'cache_size = -32000',
  'foreign_keys = ON',
  'temp_store = MEMORY',
] as const;

export function openDatabase(config: DatabaseConfig): StonetrailDatabase {
  mkdirSync(dirname(config.dbPath), { recursive: true });
  const db = new Database(config.dbPath);

  const journalMode = db.pragma('journal_mode = WAL', { simple: true });
  if (journalMode !== 'wal') {
    debug('db', 'WAL unavailable, concurrent writers will block', { journalMode });
  }
  db.pragma(`busy_timeout = ${config.busyTimeout}`);
  for (const pragma of CONNECTION_PRAGMAS) {
    db.pragma(pragma);
  }

  const hasVectorSupport = loadVectorExtension(db);
  runMigrations(db, hasVectorSupport);
  debug('db', 'Database opened', { path: config.dbPath, hasVectorSupport });

  return {
    db,
    hasVectorSupport,
    path: config.dbPath,

    close(): void {
      if (!db.open) return;
      try {
        db.pragma('wal_checkpoint(PASSIVE)');
      } catch (err) {
        debug('db', 'Checkpoint before close failed', { error: errorMessage(err) });
      }
      db.close();
    },
  };
}

function loadVectorExtension(db: Database.Database): boolean {
  try {
    sqliteVec.load(db);
    return true;
  } catch (err) {
    debug('db', 'sqlite-vec unavailable, vec index disabled', { error: errorMessage(err) });
    return false;
  }
}
