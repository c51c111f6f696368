/**
 * Tests for the task, step and gate invocation query functions.
 *
 * Uses an in-memory SQLite database with migrations applied.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../src/persistence/migrations/index.js'
import {
  getTaskRow,
  insertTask,
  listTaskRows,
  setTaskRefOnce,
  updateTaskIfVersion,
  type InsertTaskRow,
  type TaskRow,
  type TaskStateColumns,
} from '../../../src/persistence/queries/tasks.js'
import { listSteps, replaceSteps, updateStepState } from '../../../src/persistence/queries/steps.js'
import {
  abandonGateInvocation,
  decideGateInvocation,
  getGateInvocation,
  insertGateInvocation,
  listGateInvocations,
} from '../../../src/persistence/queries/gate-invocations.js'
import {
  getLatestSyncRecord,
  getLatestSyncRecordForOperation,
  insertSyncRecord,
} from '../../../src/persistence/queries/sync-records.js'

function openMemoryDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  db.pragma('foreign_keys = ON')
  runMigrations(db)
  return db
}

const T0 = '2026-03-01T12:00:00.000Z'
const T1 = '2026-03-01T12:05:00.000Z'

function taskInput(id: string, overrides: Partial<InsertTaskRow> = {}): InsertTaskRow {
  return {
    id,
    title: `Task ${id}`,
    parent_id: null,
    status: 'RequirementsReview',
    requirements: '',
    test_plan: '',
    created_at: T0,
    updated_at: T0,
    ...overrides,
  }
}

function stateOf(row: TaskRow, overrides: Partial<TaskStateColumns> = {}): TaskStateColumns {
  return {
    title: row.title,
    status: row.status,
    gates_passed: row.gates_passed,
    branch_ref: row.branch_ref,
    issue_ref: row.issue_ref,
    change_request_ref: row.change_request_ref,
    requirements: row.requirements,
    test_plan: row.test_plan,
    handover: row.handover,
    revision_counts: row.revision_counts,
    revision_gate: row.revision_gate,
    stuck_gate: row.stuck_gate,
    blocked_from: row.blocked_from,
    open_invocation_id: row.open_invocation_id,
    updated_at: T1,
    ...overrides,
  }
}

function requireRow(db: BetterSqlite3Database, id: string): TaskRow {
  const row = getTaskRow(db, id)
  if (row === undefined) throw new Error(`missing ${id}`)
  return row
}

describe('task queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('inserts with column defaults', () => {
    insertTask(db, taskInput('task-1'))

    const row = requireRow(db, 'task-1')
    expect(row.gates_passed).toBe('[]')
    expect(row.revision_counts).toBe('{}')
    expect(row.version).toBe(1)
    expect(row.branch_ref).toBeNull()
  })

  it('rejects a parent that does not exist', () => {
    expect(() => insertTask(db, taskInput('task-2', { parent_id: 'task-404' }))).toThrow()
  })

  describe('updateTaskIfVersion', () => {
    beforeEach(() => {
      insertTask(db, taskInput('task-1'))
    })

    it('writes and bumps the version when it matches', () => {
      const row = requireRow(db, 'task-1')

      const written = updateTaskIfVersion(db, 'task-1', 1, stateOf(row, { status: 'TestPlanReview' }))

      expect(written).toBe(true)
      const after = requireRow(db, 'task-1')
      expect(after.status).toBe('TestPlanReview')
      expect(after.version).toBe(2)
      expect(after.updated_at).toBe(T1)
    })

    it('refuses a stale version', () => {
      const row = requireRow(db, 'task-1')
      updateTaskIfVersion(db, 'task-1', 1, stateOf(row, { status: 'TestPlanReview' }))

      const written = updateTaskIfVersion(db, 'task-1', 1, stateOf(row, { status: 'Blocked' }))

      expect(written).toBe(false)
      expect(requireRow(db, 'task-1').status).toBe('TestPlanReview')
    })

    it('keeps a reference column once it is set', () => {
      setTaskRefOnce(db, 'task-1', 'issue_ref', 'https://issues.example.test/1')
      const row = requireRow(db, 'task-1')

      updateTaskIfVersion(db, 'task-1', row.version, stateOf(row, { issue_ref: 'https://issues.example.test/9' }))

      expect(requireRow(db, 'task-1').issue_ref).toBe('https://issues.example.test/1')
    })
  })

  it('setTaskRefOnce returns the stored value', () => {
    insertTask(db, taskInput('task-1'))

    expect(setTaskRefOnce(db, 'task-1', 'branch_ref', 'task/task-1')).toBe('task/task-1')
    expect(setTaskRefOnce(db, 'task-1', 'branch_ref', 'task/other')).toBe('task/task-1')
  })

  it('listTaskRows hides archived tasks unless asked', () => {
    insertTask(db, taskInput('task-1'))
    insertTask(db, taskInput('task-2', { status: 'Archived' }))
    insertTask(db, taskInput('task-3', { parent_id: 'task-1', status: 'Draft' }))

    expect(listTaskRows(db).map((r) => r.id)).toEqual(['task-1', 'task-3'])
    expect(listTaskRows(db, { includeArchived: true }).map((r) => r.id)).toEqual(['task-1', 'task-2', 'task-3'])
    expect(listTaskRows(db, { status: 'Archived' }).map((r) => r.id)).toEqual(['task-2'])
    expect(listTaskRows(db, { parentId: 'task-1' }).map((r) => r.id)).toEqual(['task-3'])
  })
})

describe('step queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
    insertTask(db, taskInput('task-1'))
    replaceSteps(db, 'task-1', [
      {
        task_id: 'task-1',
        step_index: 0,
        description: 'Dump',
        acceptance_criteria: '["file exists"]',
        completion_state: 'pending',
        evidence: null,
        split_task_id: null,
      },
      {
        task_id: 'task-1',
        step_index: 1,
        description: 'Upload',
        acceptance_criteria: '[]',
        completion_state: 'pending',
        evidence: null,
        split_task_id: null,
      },
    ])
  })

  afterEach(() => {
    db.close()
  })

  it('lists steps in order', () => {
    expect(listSteps(db, 'task-1').map((s) => s.description)).toEqual(['Dump', 'Upload'])
  })

  it('keeps earlier evidence when an update passes none', () => {
    updateStepState(db, 'task-1', 0, 'in_progress', 'dump.sql')
    updateStepState(db, 'task-1', 0, 'done', null)

    const [first] = listSteps(db, 'task-1')
    expect(first?.completion_state).toBe('done')
    expect(first?.evidence).toBe('dump.sql')
  })

  it('reports a missing step', () => {
    expect(updateStepState(db, 'task-1', 7, 'done', null)).toBe(false)
  })
})

describe('gate invocation queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
    insertTask(db, taskInput('task-1', { status: 'TechnicalReview' }))
    insertGateInvocation(db, {
      id: 'inv-1',
      task_id: 'task-1',
      gate_id: 'technical_review',
      invoked_agent: 'planner-reviewer',
      input_snapshot: '{}',
      created_at: T0,
    })
  })

  afterEach(() => {
    db.close()
  })

  it('decides an open invocation exactly once', () => {
    const decision = {
      verdict: 'Approved',
      notes: null,
      artifacts: '{}',
      confirmed_by: null,
      decided_at: T1,
    }

    expect(decideGateInvocation(db, 'inv-1', decision)).toBe(true)
    expect(decideGateInvocation(db, 'inv-1', { ...decision, verdict: 'Rejected' })).toBe(false)
    expect(getGateInvocation(db, 'inv-1')?.verdict).toBe('Approved')
    expect(getGateInvocation(db, 'inv-1')?.state).toBe('decided')
  })

  it('does not abandon a decided invocation', () => {
    abandonGateInvocation(db, 'inv-1', 'blocked', T1)

    expect(getGateInvocation(db, 'inv-1')?.state).toBe('abandoned')
    expect(
      decideGateInvocation(db, 'inv-1', {
        verdict: 'Approved',
        notes: null,
        artifacts: null,
        confirmed_by: null,
        decided_at: T1,
      }),
    ).toBe(false)
  })

  it('filters by gate', () => {
    insertGateInvocation(db, {
      id: 'inv-2',
      task_id: 'task-1',
      gate_id: 'split_evaluation',
      invoked_agent: 'splitter',
      input_snapshot: '{}',
      created_at: T1,
    })

    expect(listGateInvocations(db, 'task-1').map((r) => r.id)).toEqual(['inv-1', 'inv-2'])
    expect(listGateInvocations(db, 'task-1', 'split_evaluation').map((r) => r.id)).toEqual(['inv-2'])
  })
})

describe('sync record queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
    insertTask(db, taskInput('task-1'))
  })

  afterEach(() => {
    db.close()
  })

  function record(hash: string, result: string): void {
    insertSyncRecord(db, {
      task_id: 'task-1',
      target_system: 'issue_tracker',
      operation: 'sync_status',
      request_payload_hash: hash,
      detail: 'In Progress',
      result,
      error: null,
      triggered_by: 'controller',
      timestamp: T0,
    })
  }

  it('returns the latest record per payload and per operation', () => {
    record('aaa', 'failed')
    record('aaa', 'success')
    record('bbb', 'unknown')

    expect(getLatestSyncRecord(db, 'task-1', 'sync_status', 'aaa')?.result).toBe('success')
    expect(getLatestSyncRecordForOperation(db, 'task-1', 'sync_status')?.result).toBe('unknown')
    expect(getLatestSyncRecordForOperation(db, 'task-1', 'ensure_issue')).toBeUndefined()
  })
})
