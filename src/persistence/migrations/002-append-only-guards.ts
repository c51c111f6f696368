/**
 * Migration 002: append-only guards.
 *
 * Changelog entries and external sync records are history; rows may be
 * inserted but never updated or deleted.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const appendOnlyGuardsMigration: Migration = {
  version: 2,
  name: '002-append-only-guards',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS trg_sync_records_no_update
      BEFORE UPDATE ON external_sync_records
      BEGIN
        SELECT RAISE(ABORT, 'external_sync_records is append-only');
      END;

      CREATE TRIGGER IF NOT EXISTS trg_sync_records_no_delete
      BEFORE DELETE ON external_sync_records
      BEGIN
        SELECT RAISE(ABORT, 'external_sync_records is append-only');
      END;

      CREATE TRIGGER IF NOT EXISTS trg_changelog_no_update
      BEFORE UPDATE ON changelog_entries
      BEGIN
        SELECT RAISE(ABORT, 'changelog_entries is append-only');
      END;

      CREATE TRIGGER IF NOT EXISTS trg_changelog_no_delete
      BEFORE DELETE ON changelog_entries
      BEGIN
        SELECT RAISE(ABORT, 'changelog_entries is append-only');
      END;
    `)
  },
}
