/**
 * Step query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface StepRow {
  task_id: string
  step_index: number
  description: string
  /** JSON array of strings */
  acceptance_criteria: string
  completion_state: string
  evidence: string | null
  split_task_id: string | null
}

export function listSteps(db: BetterSqlite3Database, taskId: string): StepRow[] {
  return db
    .prepare('SELECT * FROM task_steps WHERE task_id = ? ORDER BY step_index ASC')
    .all(taskId) as StepRow[]
}

/**
 * Replace every step of a task. Must run inside the caller's transaction.
 */
export function replaceSteps(db: BetterSqlite3Database, taskId: string, rows: StepRow[]): void {
  db.prepare('DELETE FROM task_steps WHERE task_id = ?').run(taskId)
  const insert = db.prepare(`
    INSERT INTO task_steps (task_id, step_index, description, acceptance_criteria, completion_state, evidence, split_task_id)
    VALUES (@task_id, @step_index, @description, @acceptance_criteria, @completion_state, @evidence, @split_task_id)
  `)
  for (const row of rows) {
    insert.run(row)
  }
}

/**
 * Update one step's completion state and evidence. Returns false when the
 * step does not exist.
 */
export function updateStepState(
  db: BetterSqlite3Database,
  taskId: string,
  stepIndex: number,
  completionState: string,
  evidence: string | null,
): boolean {
  const result = db.prepare(`
    UPDATE task_steps
    SET completion_state = ?, evidence = COALESCE(?, evidence)
    WHERE task_id = ? AND step_index = ?
  `).run(completionState, evidence, taskId, stepIndex)
  return result.changes === 1
}
