/**
 * Task state graph and per-status external sync plans.
 *
 * The graph is data: the controller asks `assertTransition()` before every
 * status write, and reconciliation reads `SYNC_PLANS` to know which external
 * effects a status implies.
 */

import { IllegalTransitionError } from '../../core/errors.js'
import { GATE_ORDER, ORDERED_STATUSES } from '../../core/types.js'
import type { TaskId, TaskStatus } from '../../core/types.js'
import type { PlannedSyncOperation } from '../external-sync/operations.js'
import { GATE_DEFINITIONS } from './gates.js'

// ---------------------------------------------------------------------------
// Status classes
// ---------------------------------------------------------------------------

/** Statuses from which automatic progress is possible and an operator may block */
export const ACTIVE_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>([
  ...ORDERED_STATUSES.filter((s) => s !== 'Done'),
  'NeedsRevision',
])

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['Done', 'Archived'])

/** Statuses a task may be archived from */
export const ARCHIVABLE_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>([
  'Done',
  'Blocked',
  'Draft',
])

// ---------------------------------------------------------------------------
// Edges
// ---------------------------------------------------------------------------

function buildEdges(): Map<TaskStatus, Set<TaskStatus>> {
  const edges = new Map<TaskStatus, Set<TaskStatus>>()
  const add = (from: TaskStatus, to: TaskStatus): void => {
    const targets = edges.get(from) ?? new Set<TaskStatus>()
    targets.add(to)
    edges.set(from, targets)
  }

  // Confirmed ungated edges
  add('Draft', 'RequirementsReview')
  add('ReadyForImplementation', 'InProgress')

  for (const gateId of GATE_ORDER) {
    const gate = GATE_DEFINITIONS[gateId]
    add(gate.entryStatus, gate.approvedStatus)
    add(gate.entryStatus, 'NeedsRevision')
    add('NeedsRevision', gate.entryStatus)
  }

  for (const status of ACTIVE_STATUSES) {
    add(status, 'Blocked')
    add('Blocked', status)
  }

  for (const status of ARCHIVABLE_STATUSES) {
    add(status, 'Archived')
  }

  return edges
}

const EDGES = buildEdges()

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return EDGES.get(from)?.has(to) ?? false
}

export function assertTransition(taskId: TaskId, from: TaskStatus, to: TaskStatus): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(taskId, from, to)
  }
}

/** Position on the forward path, or -1 for side states */
export function statusIndex(status: TaskStatus): number {
  return ORDERED_STATUSES.findIndex((s) => s === status)
}

// ---------------------------------------------------------------------------
// Sync plans
// ---------------------------------------------------------------------------

/**
 * External operations run after a task enters each status. `sync_status`
 * always targets the status just entered.
 */
export const SYNC_PLANS: Partial<Record<TaskStatus, readonly PlannedSyncOperation[]>> = {
  ReadyForImplementation: ['ensure_issue', 'sync_status'],
  InProgress: ['ensure_branch', 'sync_status'],
  InReview: ['push_branch', 'sync_status'],
  DocumentationUpdate: ['open_change_request', 'sync_status'],
  ReadyToMerge: ['sync_status'],
  Done: ['merge_change_request', 'sync_status'],
  Blocked: ['sync_status'],
}

export function syncPlanFor(status: TaskStatus): readonly PlannedSyncOperation[] {
  return SYNC_PLANS[status] ?? []
}

/**
 * Every one-off operation a task at `status` should have completed so far,
 * in the order they were first required. `sync_status` is excluded; callers
 * compare the tracker status separately.
 */
export function cumulativeOperations(status: TaskStatus): PlannedSyncOperation[] {
  const reached = statusIndex(status)
  const ops: PlannedSyncOperation[] = []
  ORDERED_STATUSES.forEach((s, index) => {
    if (index > reached) return
    for (const op of syncPlanFor(s)) {
      if (op !== 'sync_status' && !ops.includes(op)) ops.push(op)
    }
  })
  return ops
}
