/**
 * Row <-> domain conversion for the task store.
 *
 * JSON columns are validated with zod on the way out of the database so a
 * corrupt row surfaces as a TaskInvariantError instead of a malformed Task.
 */

import { z } from 'zod'
import { TaskInvariantError } from '../../core/errors.js'
import {
  AGENT_NAMES,
  GATE_ORDER,
  isGateId,
  isTaskStatus,
} from '../../core/types.js'
import type { GateId, TaskStatus } from '../../core/types.js'
import type { ChangelogRow } from '../../persistence/queries/changelog.js'
import type { GateInvocationRow } from '../../persistence/queries/gate-invocations.js'
import type { StepRow } from '../../persistence/queries/steps.js'
import type { TaskRow, TaskStateColumns } from '../../persistence/queries/tasks.js'
import type {
  ChangelogEntry,
  GateInvocation,
  HandoverNote,
  InvocationState,
  Step,
  Task,
  TaskSnapshot,
} from './types.js'

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const TaskStatusSchema = z.custom<TaskStatus>(
  (value) => typeof value === 'string' && isTaskStatus(value),
  { message: 'unknown task status' },
)

export const GateIdSchema = z.enum(GATE_ORDER)

export const StepStateSchema = z.enum(['pending', 'in_progress', 'done', 'skipped'])

export const StepSchema = z.object({
  description: z.string(),
  acceptanceCriteria: z.array(z.string()),
  completionState: StepStateSchema,
  evidence: z.string().nullable(),
  splitRef: z.object({ childTaskId: z.string() }).nullable(),
})

export const HandoverNoteSchema = z.object({
  author: z.string(),
  summary: z.string(),
  nextSteps: z.array(z.string()),
  openQuestions: z.array(z.string()),
  createdAt: z.string(),
})

export const TaskSnapshotSchema = z.object({
  id: z.string(),
  title: z.string(),
  status: TaskStatusSchema,
  version: z.number().int(),
  requirements: z.string(),
  testPlan: z.string(),
  steps: z.array(StepSchema),
  gatesPassed: z.array(GateIdSchema),
})

const VerdictSchema = z.enum(['Approved', 'NeedsRevision', 'Rejected'])
const AgentNameSchema = z.enum(AGENT_NAMES)
const InvocationStateSchema = z.enum(['open', 'decided', 'abandoned'])
const RevisionCountsSchema = z.record(z.string(), z.number().int().nonnegative())
const StringArraySchema = z.array(z.string())

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseJsonColumn<T>(
  schema: z.ZodType<T>,
  text: string,
  context: Record<string, unknown>,
): T {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new TaskInvariantError('Stored column is not valid JSON', {
      ...context,
      cause: err instanceof Error ? err.message : String(err),
    })
  }
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new TaskInvariantError('Stored column failed validation', {
      ...context,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    })
  }
  return result.data
}

function parseStatus(value: string, context: Record<string, unknown>): TaskStatus {
  if (!isTaskStatus(value)) {
    throw new TaskInvariantError(`Unknown status "${value}"`, context)
  }
  return value
}

function parseGate(value: string | null, context: Record<string, unknown>): GateId | null {
  if (value === null) return null
  if (!isGateId(value)) {
    throw new TaskInvariantError(`Unknown gate "${value}"`, context)
  }
  return value
}

// ---------------------------------------------------------------------------
// Row -> domain
// ---------------------------------------------------------------------------

export function stepFromRow(row: StepRow): Step {
  const context = { taskId: row.task_id, stepIndex: row.step_index }
  return {
    description: row.description,
    acceptanceCriteria: parseJsonColumn(StringArraySchema, row.acceptance_criteria, context),
    completionState: StepStateSchema.parse(row.completion_state),
    evidence: row.evidence,
    splitRef: row.split_task_id !== null ? { childTaskId: row.split_task_id } : null,
  }
}

export function changelogFromRow(row: ChangelogRow): ChangelogEntry {
  return {
    timestamp: row.timestamp,
    component: row.component,
    summary: row.summary,
    effect: row.effect,
    actor: row.actor,
  }
}

export function taskFromRows(row: TaskRow, steps: StepRow[], changelog: ChangelogRow[]): Task {
  const context = { taskId: row.id }

  const revisionCounts: Partial<Record<GateId, number>> = {}
  const rawCounts = parseJsonColumn(RevisionCountsSchema, row.revision_counts, context)
  for (const [gate, count] of Object.entries(rawCounts)) {
    const gateId = parseGate(gate, context)
    if (gateId !== null) revisionCounts[gateId] = count
  }

  return {
    id: row.id,
    title: row.title,
    parentId: row.parent_id,
    status: parseStatus(row.status, context),
    gatesPassed: parseJsonColumn(z.array(GateIdSchema), row.gates_passed, context),
    branchRef: row.branch_ref,
    issueRef: row.issue_ref,
    changeRequestRef: row.change_request_ref,
    requirements: row.requirements,
    testPlan: row.test_plan,
    steps: steps.map(stepFromRow),
    changelog: changelog.map(changelogFromRow),
    handover:
      row.handover !== null ? parseJsonColumn(HandoverNoteSchema, row.handover, context) : null,
    revisionCounts,
    revisionGate: parseGate(row.revision_gate, context),
    stuckGate: parseGate(row.stuck_gate, context),
    blockedFrom: row.blocked_from !== null ? parseStatus(row.blocked_from, context) : null,
    openInvocationId: row.open_invocation_id,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export function invocationFromRow(row: GateInvocationRow): GateInvocation {
  const context = { invocationId: row.id, taskId: row.task_id }
  const gateId = parseGate(row.gate_id, context)
  if (gateId === null) {
    throw new TaskInvariantError('Invocation has no gate', context)
  }
  const state: InvocationState = InvocationStateSchema.parse(row.state)
  return {
    id: row.id,
    taskId: row.task_id,
    gateId,
    invokedAgent: row.invoked_agent !== null ? AgentNameSchema.parse(row.invoked_agent) : null,
    confirmedBy: row.confirmed_by,
    inputSnapshot: parseJsonColumn(TaskSnapshotSchema, row.input_snapshot, context),
    verdict: row.verdict !== null ? VerdictSchema.parse(row.verdict) : null,
    notes: row.notes,
    artifacts: row.artifacts !== null ? parseJsonColumn(z.unknown(), row.artifacts, context) : null,
    state,
    createdAt: row.created_at,
    decidedAt: row.decided_at,
  }
}

// ---------------------------------------------------------------------------
// Domain -> row
// ---------------------------------------------------------------------------

export function stepToRow(taskId: string, index: number, step: Step): StepRow {
  return {
    task_id: taskId,
    step_index: index,
    description: step.description,
    acceptance_criteria: JSON.stringify(step.acceptanceCriteria),
    completion_state: step.completionState,
    evidence: step.evidence,
    split_task_id: step.splitRef?.childTaskId ?? null,
  }
}

export function taskStateColumns(task: Task, updatedAt: string): TaskStateColumns {
  return {
    title: task.title,
    status: task.status,
    gates_passed: JSON.stringify(task.gatesPassed),
    branch_ref: task.branchRef,
    issue_ref: task.issueRef,
    change_request_ref: task.changeRequestRef,
    requirements: task.requirements,
    test_plan: task.testPlan,
    handover: task.handover !== null ? JSON.stringify(task.handover) : null,
    revision_counts: JSON.stringify(task.revisionCounts),
    revision_gate: task.revisionGate,
    stuck_gate: task.stuckGate,
    blocked_from: task.blockedFrom,
    open_invocation_id: task.openInvocationId,
    updated_at: updatedAt,
  }
}

export function serializeHandover(note: HandoverNote): string {
  return JSON.stringify(HandoverNoteSchema.parse(note))
}

/** Copy of the fields a gate decision is based on */
export function snapshotOf(task: Task): TaskSnapshot {
  return {
    id: task.id,
    title: task.title,
    status: task.status,
    version: task.version,
    requirements: task.requirements,
    testPlan: task.testPlan,
    steps: task.steps.map((s) => ({
      ...s,
      acceptanceCriteria: [...s.acceptanceCriteria],
      splitRef: s.splitRef !== null ? { ...s.splitRef } : null,
    })),
    gatesPassed: [...task.gatesPassed],
  }
}
