/**
 * Gate invocation query functions.
 *
 * An invocation row is written once when the gate is entered and updated
 * exactly once more, when it is decided or abandoned. The `state = 'open'`
 * guard on the update keeps decided rows immutable.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface GateInvocationRow {
  id: string
  task_id: string
  gate_id: string
  invoked_agent: string | null
  confirmed_by: string | null
  /** JSON-serialized task snapshot */
  input_snapshot: string
  verdict: string | null
  notes: string | null
  /** JSON-serialized artifacts bag */
  artifacts: string | null
  state: string
  created_at: string
  decided_at: string | null
}

export function insertGateInvocation(
  db: BetterSqlite3Database,
  row: Pick<GateInvocationRow, 'id' | 'task_id' | 'gate_id' | 'invoked_agent' | 'input_snapshot' | 'created_at'>,
): void {
  db.prepare(`
    INSERT INTO gate_invocations (id, task_id, gate_id, invoked_agent, input_snapshot, state, created_at)
    VALUES (@id, @task_id, @gate_id, @invoked_agent, @input_snapshot, 'open', @created_at)
  `).run(row)
}

export function getGateInvocation(db: BetterSqlite3Database, id: string): GateInvocationRow | undefined {
  return db.prepare('SELECT * FROM gate_invocations WHERE id = ?').get(id) as GateInvocationRow | undefined
}

export function listGateInvocations(
  db: BetterSqlite3Database,
  taskId: string,
  gateId?: string,
): GateInvocationRow[] {
  if (gateId !== undefined) {
    return db
      .prepare('SELECT * FROM gate_invocations WHERE task_id = ? AND gate_id = ? ORDER BY created_at ASC, rowid ASC')
      .all(taskId, gateId) as GateInvocationRow[]
  }
  return db
    .prepare('SELECT * FROM gate_invocations WHERE task_id = ? ORDER BY created_at ASC, rowid ASC')
    .all(taskId) as GateInvocationRow[]
}

/**
 * Record a verdict on an open invocation. Returns false if the invocation is
 * missing or no longer open.
 */
export function decideGateInvocation(
  db: BetterSqlite3Database,
  id: string,
  decision: Pick<GateInvocationRow, 'verdict' | 'notes' | 'artifacts' | 'confirmed_by' | 'decided_at'>,
): boolean {
  const result = db.prepare(`
    UPDATE gate_invocations
    SET verdict = @verdict, notes = @notes, artifacts = @artifacts,
        confirmed_by = @confirmed_by, decided_at = @decided_at, state = 'decided'
    WHERE id = @id AND state = 'open'
  `).run({ ...decision, id })
  return result.changes === 1
}

export function abandonGateInvocation(
  db: BetterSqlite3Database,
  id: string,
  notes: string,
  abandonedAt: string,
): boolean {
  const result = db.prepare(`
    UPDATE gate_invocations
    SET state = 'abandoned', notes = ?, decided_at = ?
    WHERE id = ? AND state = 'open'
  `).run(notes, abandonedAt, id)
  return result.changes === 1
}
