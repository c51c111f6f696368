/**
 * Human-readable renderings for task commands.
 */

import { GATE_ORDER } from '../../core/types.js'
import type { SyncResult } from '../../modules/external-sync/types.js'
import type { LifecycleReport, StageResult } from '../../modules/lifecycle/task-lifecycle.js'
import type { GateInvocation, Task } from '../../modules/task-store/types.js'
import type { DriftItem, ReconcileReport, RepairOutcome } from '../../recovery/reconciler.js'
import { formatTable, truncate } from '../utils/formatting.js'

const STAGE_LABELS: Record<StageResult, string> = {
  passed: 'passed',
  already_passed: 'already passed',
  declined: 'declined',
  needs_revision: 'needs revision',
  rejected: 'rejected',
  abandoned: 'abandoned',
}

/** Width of the longest gate id */
const STAGE_WIDTH = 16

export function renderSyncResult(result: SyncResult): string {
  const ref = result.ref !== null ? ` (${result.ref})` : ''
  const error = result.error !== null ? ` - ${result.error.message}` : ''
  return `${result.system}/${result.operation}: ${result.result}${ref}${error}`
}

/**
 * Render the outcome of a lifecycle command:
 *
 *   task-1  Add export job
 *     requirements     already passed
 *     technical_review needs revision: split the migration
 *   External sync:
 *     issue_tracker/sync_status: success (#4)
 *   Status: NeedsRevision
 */
export function renderLifecycleReport(report: LifecycleReport): string {
  const { task } = report
  const lines = [`${task.id}  ${task.title}`]

  for (const stage of report.stages) {
    const notes = stage.notes !== null && stage.notes !== '' ? `: ${stage.notes}` : ''
    lines.push(`  ${stage.stage.padEnd(STAGE_WIDTH)} ${STAGE_LABELS[stage.result]}${notes}`)
  }

  if (report.syncResults.length > 0) {
    lines.push('External sync:')
    for (const result of report.syncResults) lines.push(`  ${renderSyncResult(result)}`)
  }

  lines.push(`Status: ${task.status}`)
  if (task.stuckGate !== null) {
    lines.push(`Gate ${task.stuckGate} is stuck; resolve it and run \`taskgate override ${task.id} ${task.stuckGate}\``)
  }
  return lines.join('\n')
}

export function renderTaskTable(tasks: Task[]): string {
  if (tasks.length === 0) return 'No tasks.'
  const rows = tasks.map((task) => ({
    id: task.id,
    status: task.stuckGate !== null ? `${task.status} (stuck)` : task.status,
    gates: `${String(task.gatesPassed.length)}/${String(GATE_ORDER.length)}`,
    title: truncate(task.title, 60),
  }))
  return formatTable(['Id', 'Status', 'Gates', 'Title'], rows, ['id', 'status', 'gates', 'title'])
}

function field(label: string, value: string): string {
  return `${`${label}:`.padEnd(16)}${value}`
}

/** Detailed lifecycle state of one task, with its latest gate invocations */
export function renderTaskStatus(task: Task, invocations: GateInvocation[] = []): string {
  const revisions = Object.entries(task.revisionCounts)
    .map(([gate, count]) => `${gate} ${String(count)}`)
    .join(', ')

  const lines = [
    `${task.id}  ${task.title}`,
    field('Status', task.status),
    field('Gates passed', task.gatesPassed.length > 0 ? task.gatesPassed.join(', ') : 'none'),
    field('Revisions', revisions !== '' ? revisions : 'none'),
  ]
  if (task.revisionGate !== null) lines.push(field('Revising', task.revisionGate))
  if (task.stuckGate !== null) lines.push(field('Stuck gate', task.stuckGate))
  if (task.blockedFrom !== null) lines.push(field('Blocked from', task.blockedFrom))
  lines.push(
    field('Branch', task.branchRef ?? '-'),
    field('Issue', task.issueRef ?? '-'),
    field('Change request', task.changeRequestRef ?? '-'),
  )

  const steps = task.steps.filter((s) => s.splitRef === null)
  if (steps.length > 0) {
    const done = steps.filter((s) => s.completionState === 'done' || s.completionState === 'skipped').length
    lines.push(field('Steps', `${String(done)}/${String(steps.length)} complete`))
  }

  if (invocations.length > 0) {
    lines.push('', 'Gate invocations:')
    for (const inv of invocations) {
      const by = inv.confirmedBy ?? inv.invokedAgent ?? '-'
      const outcome = inv.verdict ?? inv.state
      lines.push(`  ${inv.createdAt}  ${inv.gateId.padEnd(STAGE_WIDTH)} ${outcome.padEnd(13)} ${by}`)
    }
  }
  return lines.join('\n')
}

export function renderDrift(items: DriftItem[]): string {
  if (items.length === 0) return 'No drift: every external operation has succeeded.'
  const rows = items.map((item) => ({
    task: item.taskId,
    operation: `${item.system}/${item.operation}`,
    last: item.lastResult,
    expected: item.expected ?? '-',
    error: truncate(item.lastError ?? '-', 50),
  }))
  return formatTable(
    ['Task', 'Operation', 'Last', 'Expected', 'Error'],
    rows,
    ['task', 'operation', 'last', 'expected', 'error'],
  )
}

function renderOutcome(outcome: RepairOutcome): string {
  return `  ${outcome.drift.taskId}  ${renderSyncResult(outcome.result)}`
}

export function renderReconcileReport(report: ReconcileReport): string {
  if (report.repaired.length === 0 && report.failing.length === 0) {
    return 'No drift: every external operation has succeeded.'
  }
  const lines: string[] = []
  if (report.repaired.length > 0) {
    lines.push(`Repaired ${String(report.repaired.length)} operation(s):`)
    lines.push(...report.repaired.map(renderOutcome))
  }
  if (report.failing.length > 0) {
    lines.push(`Still failing ${String(report.failing.length)} operation(s):`)
    lines.push(...report.failing.map(renderOutcome))
  }
  return lines.join('\n')
}
