/**
 * Task query functions for the SQLite persistence layer.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements: no string interpolation of values, no ORM.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row type
// ---------------------------------------------------------------------------

export interface TaskRow {
  id: string
  title: string
  parent_id: string | null
  status: string
  /** JSON array of gate ids */
  gates_passed: string
  branch_ref: string | null
  issue_ref: string | null
  change_request_ref: string | null
  requirements: string
  test_plan: string
  /** JSON-serialized handover note */
  handover: string | null
  /** JSON object gate id -> count */
  revision_counts: string
  revision_gate: string | null
  stuck_gate: string | null
  blocked_from: string | null
  open_invocation_id: string | null
  version: number
  created_at: string
  updated_at: string
}

export type InsertTaskRow = Pick<
  TaskRow,
  'id' | 'title' | 'parent_id' | 'status' | 'requirements' | 'test_plan' | 'created_at' | 'updated_at'
>

/** Columns overwritten by a whole-aggregate save */
export type TaskStateColumns = Pick<
  TaskRow,
  | 'title'
  | 'status'
  | 'gates_passed'
  | 'branch_ref'
  | 'issue_ref'
  | 'change_request_ref'
  | 'requirements'
  | 'test_plan'
  | 'handover'
  | 'revision_counts'
  | 'revision_gate'
  | 'stuck_gate'
  | 'blocked_from'
  | 'open_invocation_id'
  | 'updated_at'
>

export type RefColumn = 'branch_ref' | 'issue_ref' | 'change_request_ref'

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

export function insertTask(db: BetterSqlite3Database, row: InsertTaskRow): void {
  db.prepare(`
    INSERT INTO tasks (id, title, parent_id, status, requirements, test_plan, created_at, updated_at)
    VALUES (@id, @title, @parent_id, @status, @requirements, @test_plan, @created_at, @updated_at)
  `).run(row)
}

export function getTaskRow(db: BetterSqlite3Database, taskId: string): TaskRow | undefined {
  return db.prepare('SELECT * FROM tasks WHERE id = ?').get(taskId) as TaskRow | undefined
}

export function listTaskRows(
  db: BetterSqlite3Database,
  filter: { status?: string; parentId?: string; includeArchived?: boolean } = {},
): TaskRow[] {
  const clauses: string[] = []
  const values: string[] = []

  if (filter.status !== undefined) {
    clauses.push('status = ?')
    values.push(filter.status)
  } else if (filter.includeArchived !== true) {
    clauses.push("status != 'Archived'")
  }
  if (filter.parentId !== undefined) {
    clauses.push('parent_id = ?')
    values.push(filter.parentId)
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''
  return db
    .prepare(`SELECT * FROM tasks ${where} ORDER BY created_at ASC, rowid ASC`)
    .all(...values) as TaskRow[]
}

/**
 * Overwrite the task's state columns if and only if the stored version still
 * equals `expectedVersion`. Write-once reference columns keep any value
 * already stored. Returns true when the row was updated.
 */
export function updateTaskIfVersion(
  db: BetterSqlite3Database,
  taskId: string,
  expectedVersion: number,
  columns: TaskStateColumns,
): boolean {
  const result = db.prepare(`
    UPDATE tasks SET
      title              = @title,
      status             = @status,
      gates_passed       = @gates_passed,
      branch_ref         = COALESCE(branch_ref, @branch_ref),
      issue_ref          = COALESCE(issue_ref, @issue_ref),
      change_request_ref = COALESCE(change_request_ref, @change_request_ref),
      requirements       = @requirements,
      test_plan          = @test_plan,
      handover           = @handover,
      revision_counts    = @revision_counts,
      revision_gate      = @revision_gate,
      stuck_gate         = @stuck_gate,
      blocked_from       = @blocked_from,
      open_invocation_id = @open_invocation_id,
      updated_at         = @updated_at,
      version            = version + 1
    WHERE id = @id AND version = @expected_version
  `).run({ ...columns, id: taskId, expected_version: expectedVersion })
  return result.changes === 1
}

/**
 * Increment the version of a task. Used by versioned partial writes
 * (step updates, handover, split rewrite) inside their transaction.
 */
export function bumpTaskVersion(db: BetterSqlite3Database, taskId: string, updatedAt: string): void {
  db.prepare('UPDATE tasks SET version = version + 1, updated_at = ? WHERE id = ?').run(updatedAt, taskId)
}

export function setTaskHandover(db: BetterSqlite3Database, taskId: string, handoverJson: string): void {
  db.prepare('UPDATE tasks SET handover = ? WHERE id = ?').run(handoverJson, taskId)
}

/**
 * Set a write-once reference column. Only writes when the column is NULL;
 * returns the value stored afterwards.
 */
export function setTaskRefOnce(
  db: BetterSqlite3Database,
  taskId: string,
  column: RefColumn,
  value: string,
): string | null {
  // Column names come from the RefColumn union, never from input.
  db.prepare(`UPDATE tasks SET ${column} = ? WHERE id = ? AND ${column} IS NULL`).run(value, taskId)
  const row = db.prepare(`SELECT ${column} AS ref FROM tasks WHERE id = ?`).get(taskId) as
    | { ref: string | null }
    | undefined
  return row?.ref ?? null
}
