/**
 * Reconciler: finds external operations a task's status implies that never
 * completed, and re-issues them.
 *
 * Drift is read from the audit log only: an operation drifts when its latest
 * record is missing or not `success`. `sync_status` also drifts when the
 * last pushed status differs from the one the task's current status maps to.
 */

import type { TaskId, TaskStatus } from '../core/types.js'
import { getGate } from '../modules/gate-controller/gates.js'
import { cumulativeOperations } from '../modules/gate-controller/state-graph.js'
import { runPlannedOperation } from '../modules/external-sync/operations.js'
import type { PlannedSyncOperation } from '../modules/external-sync/operations.js'
import { issueStatusFor } from '../modules/external-sync/status-mapping.js'
import { OPERATION_SYSTEMS } from '../modules/external-sync/types.js'
import type { ExternalSync, SyncResult } from '../modules/external-sync/types.js'
import type { TaskStore } from '../modules/task-store/task-store.js'
import type { SyncResultKind, TargetSystem, Task } from '../modules/task-store/types.js'
import { createLogger } from '../utils/logger.js'
import type { AuditLog } from './audit-log.js'

const logger = createLogger('reconciler')

export interface DriftItem {
  taskId: TaskId
  system: TargetSystem
  operation: PlannedSyncOperation
  /** Latest recorded result, or `missing` when the operation was never attempted */
  lastResult: SyncResultKind | 'missing'
  lastError: string | null
  /** What the operation should produce, e.g. the tracker status for `sync_status` */
  expected: string | null
}

export interface RepairOutcome {
  drift: DriftItem
  result: SyncResult
}

export interface ReconcileReport {
  repaired: RepairOutcome[]
  failing: RepairOutcome[]
}

export interface ReconcilerOptions {
  store: TaskStore
  auditLog: AuditLog
  sync: ExternalSync
}

/** The status whose one-off operations a task must have completed */
function progressStatus(task: Task): TaskStatus | null {
  if (task.status === 'Blocked') return task.blockedFrom
  if (task.status === 'NeedsRevision') {
    return task.revisionGate !== null ? getGate(task.revisionGate).entryStatus : null
  }
  return task.status
}

export class Reconciler {
  private readonly _store: TaskStore
  private readonly _auditLog: AuditLog
  private readonly _sync: ExternalSync

  constructor(options: ReconcilerOptions) {
    this._store = options.store
    this._auditLog = options.auditLog
    this._sync = options.sync
  }

  findDrift(taskId?: TaskId): DriftItem[] {
    return this._tasks(taskId).flatMap((task) => this._driftFor(task))
  }

  async reconcile(taskId?: TaskId): Promise<ReconcileReport> {
    const report: ReconcileReport = { repaired: [], failing: [] }

    for (const task of this._tasks(taskId)) {
      const drift = this._driftFor(task)
      if (drift.length === 0) continue

      const outcomes: RepairOutcome[] = []
      for (const item of drift) {
        // Reload so a ref set by an earlier repair (issue, branch) is visible
        const current = this._store.load(task.id)
        const result = await runPlannedOperation(this._sync, item.operation, task.id, {
          status: current.status,
          triggeredBy: 'reconciler',
        })
        const outcome = { drift: item, result }
        outcomes.push(outcome)
        if (result.result === 'success') report.repaired.push(outcome)
        else report.failing.push(outcome)
      }

      const repaired = outcomes.filter((o) => o.result.result === 'success').length
      this._store.appendChangelog(task.id, {
        component: 'reconciler',
        summary: `Reconciled ${String(repaired)} of ${String(outcomes.length)} external operation(s)`,
        effect: outcomes.map((o) => `${o.drift.operation} ${o.result.result}`).join('; '),
        actor: 'reconciler',
      })
      logger.info({ taskId: task.id, repaired, attempted: outcomes.length }, 'Reconciled task')
    }

    return report
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _tasks(taskId?: TaskId): Task[] {
    if (taskId !== undefined) {
      const task = this._store.load(taskId)
      return task.status === 'Archived' ? [] : [task]
    }
    return this._store.list()
  }

  /** Operations the task should have completed, in the order they are repaired */
  private _expectedOperations(task: Task): PlannedSyncOperation[] {
    const status = progressStatus(task)
    const ops = status !== null ? cumulativeOperations(status) : []

    // Children get their issue at split time, created with the mapped status
    const pushesStatus = ops.length > 0 || (task.status === 'Blocked' && task.issueRef !== null)
    if (task.parentId !== null && !ops.includes('ensure_issue')) {
      ops.unshift('ensure_issue')
    }
    if (pushesStatus && issueStatusFor(task.status) !== undefined) {
      ops.push('sync_status')
    }

    return ops.filter((op) => this._sync.isEnabled(OPERATION_SYSTEMS[op]))
  }

  private _driftFor(task: Task): DriftItem[] {
    const drift: DriftItem[] = []

    for (const operation of this._expectedOperations(task)) {
      const latest = this._auditLog.latest(task.id, operation)
      const expected = operation === 'sync_status' ? (issueStatusFor(task.status) ?? null) : null
      const inSync =
        latest !== undefined &&
        latest.result === 'success' &&
        (expected === null || latest.detail === expected)
      if (inSync) continue

      drift.push({
        taskId: task.id,
        system: OPERATION_SYSTEMS[operation],
        operation,
        lastResult: latest?.result ?? 'missing',
        lastError: latest?.error ?? null,
        expected,
      })
    }

    return drift
  }
}

export function createReconciler(options: ReconcilerOptions): Reconciler {
  return new Reconciler(options)
}
