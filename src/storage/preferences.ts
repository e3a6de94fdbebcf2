import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import { DEFAULT_LOCALE, isLocale, type Locale } from '../shared/types.js';

/**
 * Per-user language preference.
 *
 * Read on every inbound event and passed along as context; there is no
 * in-process cache to go stale when another process writes.
 */
export class PreferenceRepository {
  private readonly stmtGet: BetterSqlite3.Statement;
  private readonly stmtUpsert: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.stmtGet = db.prepare('SELECT locale FROM user_preferences WHERE user_id = ?');

    this.stmtUpsert = db.prepare(`
      INSERT INTO user_preferences (user_id, locale)
      VALUES (?, ?)
      ON CONFLICT(user_id) DO UPDATE SET
        locale = excluded.locale,
        updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
    `);

    debug('db', 'PreferenceRepository initialized');
  }

  /** Stored locale, or the default when the user never chose one. */
  getLocale(userId: string): Locale {
    const row = this.stmtGet.get(userId) as { locale: string } | undefined;
    if (row && isLocale(row.locale)) {
      return row.locale;
    }
    return DEFAULT_LOCALE;
  }

  setLocale(userId: string, locale: Locale): void {
    this.stmtUpsert.run(userId, locale);
    debug('db', 'Locale saved', { userId, locale });
  }
}
