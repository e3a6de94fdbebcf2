import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { openDatabase } from '../database.js';
import type { StonetrailDatabase } from '../database.js';
import { PreferenceRepository } from '../preferences.js';
import { createTempDb } from './test-utils.js';

describe('PreferenceRepository', () => {
  let ldb: StonetrailDatabase;
  let cleanup: () => void;

  beforeEach(() => {
    const tmp = createTempDb();
    cleanup = tmp.cleanup;
    ldb = openDatabase(tmp.config);
  });

  afterEach(() => {
    ldb.close();
    cleanup();
  });

  it('defaults to English', () => {
    const prefs = new PreferenceRepository(ldb.db);
    expect(prefs.getLocale('alice')).toBe('en');
  });

  it('stores one locale per user and overwrites it', () => {
    const prefs = new PreferenceRepository(ldb.db);
    prefs.setLocale('alice', 'pl');
    prefs.setLocale('bob', 'ru');
    prefs.setLocale('alice', 'ru');

    expect(prefs.getLocale('alice')).toBe('ru');
    expect(prefs.getLocale('bob')).toBe('ru');
    expect(prefs.getLocale('carol')).toBe('en');
  });

  it('is visible to a second repository on the same database', () => {
    new PreferenceRepository(ldb.db).setLocale('alice', 'pl');
    expect(new PreferenceRepository(ldb.db).getLocale('alice')).toBe('pl');
  });

  it('ignores a stored locale that is no longer supported', () => {
    ldb.db.prepare("INSERT INTO user_preferences (user_id, locale) VALUES ('dave', 'xx')").run();
    expect(new PreferenceRepository(ldb.db).getLocale('dave')).toBe('en');
  });
});
