/**
 * Changelog query functions. The table is append-only (see migration 002).
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface ChangelogRow {
  id: number
  task_id: string
  timestamp: string
  component: string
  summary: string
  effect: string
  actor: string
}

export function insertChangelogEntry(
  db: BetterSqlite3Database,
  entry: Omit<ChangelogRow, 'id'>,
): number {
  const result = db.prepare(`
    INSERT INTO changelog_entries (task_id, timestamp, component, summary, effect, actor)
    VALUES (@task_id, @timestamp, @component, @summary, @effect, @actor)
  `).run(entry)
  return Number(result.lastInsertRowid)
}

export function listChangelog(db: BetterSqlite3Database, taskId: string): ChangelogRow[] {
  return db
    .prepare('SELECT * FROM changelog_entries WHERE task_id = ? ORDER BY id ASC')
    .all(taskId) as ChangelogRow[]
}
