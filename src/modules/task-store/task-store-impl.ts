/**
 * SqliteTaskStore: TaskStore backed by better-sqlite3.
 *
 * Multi-row writes run inside `db.transaction()`; the version guard lives in
 * the UPDATE statement itself (`WHERE id = ? AND version = ?`).
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  ConcurrentModificationError,
  NoOpenInvocationError,
  TaskInvariantError,
  TaskNotFoundError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { GATE_ORDER } from '../../core/types.js'
import type { AgentName, GateId, InvocationId, StepState, TaskId } from '../../core/types.js'
import { insertChangelogEntry, listChangelog } from '../../persistence/queries/changelog.js'
import {
  abandonGateInvocation,
  decideGateInvocation,
  getGateInvocation,
  insertGateInvocation,
  listGateInvocations,
} from '../../persistence/queries/gate-invocations.js'
import { listSteps, replaceSteps, updateStepState } from '../../persistence/queries/steps.js'
import {
  bumpTaskVersion,
  getTaskRow,
  insertTask,
  listTaskRows,
  setTaskHandover,
  setTaskRefOnce,
  updateTaskIfVersion,
} from '../../persistence/queries/tasks.js'
import type { RefColumn } from '../../persistence/queries/tasks.js'
import { generateId, nowIso } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import {
  changelogFromRow,
  invocationFromRow,
  serializeHandover,
  snapshotOf,
  stepToRow,
  taskFromRows,
  taskStateColumns,
} from './codec.js'
import type { TaskStore, TaskStoreOptions } from './task-store.js'
import type {
  ChangelogEntry,
  ExternalRefField,
  GateInvocation,
  HandoverNote,
  InvocationDecision,
  NewChangelogEntry,
  Step,
  Task,
  TaskListFilter,
  TaskSpec,
} from './types.js'

const logger = createLogger('task-store')

const REF_COLUMNS: Record<ExternalRefField, RefColumn> = {
  branchRef: 'branch_ref',
  issueRef: 'issue_ref',
  changeRequestRef: 'change_request_ref',
}

const REF_FIELDS: readonly ExternalRefField[] = ['branchRef', 'issueRef', 'changeRequestRef']

/** gates_passed must always be a prefix of the canonical gate order */
function assertGatePrefix(task: Task): void {
  task.gatesPassed.forEach((gate, index) => {
    if (GATE_ORDER[index] !== gate) {
      throw new TaskInvariantError(
        `gates_passed for task ${task.id} is not a prefix of the gate order`,
        { taskId: task.id, gatesPassed: task.gatesPassed },
      )
    }
  })
}

export class SqliteTaskStore implements TaskStore {
  private readonly _db: BetterSqlite3Database
  private readonly _eventBus: TypedEventBus | undefined

  constructor(db: BetterSqlite3Database, options: TaskStoreOptions = {}) {
    this._db = db
    this._eventBus = options.eventBus
  }

  // -------------------------------------------------------------------------
  // Tasks
  // -------------------------------------------------------------------------

  create(spec: TaskSpec): Task {
    const title = spec.title.trim()
    if (title === '') {
      throw new TaskInvariantError('Task title must not be empty')
    }

    const id = generateId('task')
    const now = nowIso()
    const parentId = spec.parentId ?? null

    this._db.transaction(() => {
      if (parentId !== null && getTaskRow(this._db, parentId) === undefined) {
        throw new TaskNotFoundError(parentId)
      }
      insertTask(this._db, {
        id,
        title,
        parent_id: parentId,
        status: 'Draft',
        requirements: spec.requirements ?? '',
        test_plan: spec.testPlan ?? '',
        created_at: now,
        updated_at: now,
      })
      const steps: Step[] = (spec.steps ?? []).map((s) => ({
        description: s.description,
        acceptanceCriteria: s.acceptanceCriteria ?? [],
        completionState: 'pending',
        evidence: null,
        splitRef: null,
      }))
      replaceSteps(this._db, id, steps.map((s, i) => stepToRow(id, i, s)))
      insertChangelogEntry(this._db, {
        task_id: id,
        timestamp: now,
        component: 'task-store',
        summary: parentId !== null ? `Created from split of ${parentId}` : 'Task created',
        effect: `Task "${title}" recorded in Draft`,
        actor: spec.createdBy ?? 'operator',
      })
    })()

    logger.info({ taskId: id, parentId }, 'Task created')
    this._eventBus?.emit('task:created', { taskId: id, title, parentId })
    return this.load(id)
  }

  load(taskId: TaskId): Task {
    const task = this.find(taskId)
    if (task === undefined) {
      throw new TaskNotFoundError(taskId)
    }
    return task
  }

  find(taskId: TaskId): Task | undefined {
    const row = getTaskRow(this._db, taskId)
    if (row === undefined) return undefined
    return taskFromRows(row, listSteps(this._db, taskId), listChangelog(this._db, taskId))
  }

  list(filter: TaskListFilter = {}): Task[] {
    return listTaskRows(this._db, filter).map((row) =>
      taskFromRows(row, listSteps(this._db, row.id), listChangelog(this._db, row.id)),
    )
  }

  save(task: Task): Task {
    assertGatePrefix(task)

    this._db.transaction(() => {
      const stored = getTaskRow(this._db, task.id)
      if (stored === undefined) {
        throw new TaskNotFoundError(task.id)
      }
      for (const field of REF_FIELDS) {
        const current = stored[REF_COLUMNS[field]]
        const next = task[field]
        if (current !== null && next !== null && current !== next) {
          throw new TaskInvariantError(`${field} of task ${task.id} is write-once`, {
            taskId: task.id,
            field,
            current,
            attempted: next,
          })
        }
      }

      const updated = updateTaskIfVersion(this._db, task.id, task.version, taskStateColumns(task, nowIso()))
      if (!updated) {
        throw new ConcurrentModificationError(task.id, task.version)
      }
      replaceSteps(this._db, task.id, task.steps.map((s, i) => stepToRow(task.id, i, s)))
    })()

    logger.debug({ taskId: task.id, status: task.status, version: task.version + 1 }, 'Task saved')
    return this.load(task.id)
  }

  appendChangelog(taskId: TaskId, entry: NewChangelogEntry): ChangelogEntry {
    if (getTaskRow(this._db, taskId) === undefined) {
      throw new TaskNotFoundError(taskId)
    }
    const row = {
      task_id: taskId,
      timestamp: entry.timestamp ?? nowIso(),
      component: entry.component,
      summary: entry.summary,
      effect: entry.effect,
      actor: entry.actor,
    }
    const id = insertChangelogEntry(this._db, row)
    return changelogFromRow({ ...row, id })
  }

  updateStep(taskId: TaskId, stepIndex: number, state: StepState, evidence: string | null = null): Task {
    this._db.transaction(() => {
      if (getTaskRow(this._db, taskId) === undefined) {
        throw new TaskNotFoundError(taskId)
      }
      if (!updateStepState(this._db, taskId, stepIndex, state, evidence)) {
        throw new TaskInvariantError(`Task ${taskId} has no step ${String(stepIndex)}`, {
          taskId,
          stepIndex,
        })
      }
      bumpTaskVersion(this._db, taskId, nowIso())
    })()
    return this.load(taskId)
  }

  replaceSteps(taskId: TaskId, steps: Step[], expectedVersion?: number): Task {
    this._db.transaction(() => {
      const stored = getTaskRow(this._db, taskId)
      if (stored === undefined) {
        throw new TaskNotFoundError(taskId)
      }
      if (expectedVersion !== undefined && stored.version !== expectedVersion) {
        throw new ConcurrentModificationError(taskId, expectedVersion)
      }
      replaceSteps(this._db, taskId, steps.map((s, i) => stepToRow(taskId, i, s)))
      bumpTaskVersion(this._db, taskId, nowIso())
    })()
    return this.load(taskId)
  }

  setRef(taskId: TaskId, field: ExternalRefField, value: string): Task {
    const column = REF_COLUMNS[field]
    const stored = this._db.transaction(() => {
      if (getTaskRow(this._db, taskId) === undefined) {
        throw new TaskNotFoundError(taskId)
      }
      return setTaskRefOnce(this._db, taskId, column, value)
    })()
    if (stored !== value) {
      throw new TaskInvariantError(`${field} of task ${taskId} is write-once`, {
        taskId,
        field,
        current: stored,
        attempted: value,
      })
    }
    return this.load(taskId)
  }

  setHandover(taskId: TaskId, note: HandoverNote): Task {
    this._db.transaction(() => {
      if (getTaskRow(this._db, taskId) === undefined) {
        throw new TaskNotFoundError(taskId)
      }
      setTaskHandover(this._db, taskId, serializeHandover(note))
      bumpTaskVersion(this._db, taskId, nowIso())
    })()
    return this.load(taskId)
  }

  transaction<T>(fn: () => T): T {
    return this._db.transaction(fn)()
  }

  // -------------------------------------------------------------------------
  // Gate invocations
  // -------------------------------------------------------------------------

  createInvocation(task: Task, gateId: GateId, agent: AgentName | null): GateInvocation {
    const id = generateId('inv')
    insertGateInvocation(this._db, {
      id,
      task_id: task.id,
      gate_id: gateId,
      invoked_agent: agent,
      input_snapshot: JSON.stringify(snapshotOf(task)),
      created_at: nowIso(),
    })
    const row = getGateInvocation(this._db, id)
    if (row === undefined) {
      throw new TaskInvariantError(`Invocation ${id} vanished after insert`, { taskId: task.id })
    }
    return invocationFromRow(row)
  }

  getInvocation(invocationId: InvocationId): GateInvocation | undefined {
    const row = getGateInvocation(this._db, invocationId)
    return row !== undefined ? invocationFromRow(row) : undefined
  }

  decideInvocation(invocationId: InvocationId, decision: InvocationDecision): GateInvocation {
    const existing = getGateInvocation(this._db, invocationId)
    if (existing === undefined) {
      throw new TaskInvariantError(`Unknown invocation ${invocationId}`, { invocationId })
    }
    const decided = decideGateInvocation(this._db, invocationId, {
      verdict: decision.verdict,
      notes: decision.notes ?? null,
      artifacts: decision.artifacts !== undefined ? JSON.stringify(decision.artifacts) : null,
      confirmed_by: decision.confirmedBy ?? null,
      decided_at: nowIso(),
    })
    const invocation = invocationFromRow(existing)
    if (!decided) {
      throw new NoOpenInvocationError(invocation.taskId, invocation.gateId)
    }
    return this.getInvocation(invocationId) ?? invocation
  }

  abandonInvocation(invocationId: InvocationId, reason: string): boolean {
    return abandonGateInvocation(this._db, invocationId, reason, nowIso())
  }

  listInvocations(taskId: TaskId, gateId?: GateId): GateInvocation[] {
    return listGateInvocations(this._db, taskId, gateId).map(invocationFromRow)
  }
}
