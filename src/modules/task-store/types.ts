/**
 * Domain types for the Task aggregate and its nested collections.
 */

import type {
  Actor,
  AgentName,
  GateId,
  InvocationId,
  StepState,
  TaskId,
  TaskStatus,
  Verdict,
} from '../../core/types.js'

// ---------------------------------------------------------------------------
// Step
// ---------------------------------------------------------------------------

/** Points a parent step at the child task that now owns the work */
export interface SplitReference {
  childTaskId: TaskId
}

export interface Step {
  description: string
  acceptanceCriteria: string[]
  completionState: StepState
  evidence: string | null
  splitRef: SplitReference | null
}

// ---------------------------------------------------------------------------
// Changelog
// ---------------------------------------------------------------------------

/** Component value reserved for explicit human confirmation events */
export const CONFIRMATION_COMPONENT = 'confirmation'

export interface ChangelogEntry {
  timestamp: string
  /** Area of the task the entry concerns (a module, `gate:<id>`, `sync`, `confirmation`) */
  component: string
  summary: string
  effect: string
  /** Operator identity or system actor */
  actor: string
}

export type NewChangelogEntry = Omit<ChangelogEntry, 'timestamp'> & { timestamp?: string }

// ---------------------------------------------------------------------------
// Handover
// ---------------------------------------------------------------------------

/** Continuation block written when control passes to another driver */
export interface HandoverNote {
  author: string
  summary: string
  nextSteps: string[]
  openQuestions: string[]
  createdAt: string
}

// ---------------------------------------------------------------------------
// Task
// ---------------------------------------------------------------------------

export type ExternalRefField = 'branchRef' | 'issueRef' | 'changeRequestRef'

export interface Task {
  id: TaskId
  title: string
  parentId: TaskId | null
  status: TaskStatus
  gatesPassed: GateId[]
  branchRef: string | null
  issueRef: string | null
  changeRequestRef: string | null
  requirements: string
  testPlan: string
  steps: Step[]
  changelog: ChangelogEntry[]
  handover: HandoverNote | null
  revisionCounts: Partial<Record<GateId, number>>
  revisionGate: GateId | null
  stuckGate: GateId | null
  blockedFrom: TaskStatus | null
  openInvocationId: InvocationId | null
  /** Optimistic concurrency token; bumped on every versioned write */
  version: number
  createdAt: string
  updatedAt: string
}

export interface StepSpec {
  description: string
  acceptanceCriteria?: string[]
}

/** Input to TaskStore.create() */
export interface TaskSpec {
  title: string
  requirements?: string
  testPlan?: string
  steps?: StepSpec[]
  parentId?: TaskId
  /** Identity recorded on the creation changelog entry */
  createdBy?: string
}

// ---------------------------------------------------------------------------
// Gate invocations
// ---------------------------------------------------------------------------

export type InvocationState = 'open' | 'decided' | 'abandoned'

export interface GateInvocation {
  id: InvocationId
  taskId: TaskId
  gateId: GateId
  invokedAgent: AgentName | null
  confirmedBy: string | null
  /** Task content at the moment the gate was entered */
  inputSnapshot: TaskSnapshot
  verdict: Verdict | null
  notes: string | null
  artifacts: unknown
  state: InvocationState
  createdAt: string
  decidedAt: string | null
}

/** Serializable copy of the task fields a gate decision is based on */
export interface TaskSnapshot {
  id: TaskId
  title: string
  status: TaskStatus
  version: number
  requirements: string
  testPlan: string
  steps: Step[]
  gatesPassed: GateId[]
}

export interface InvocationDecision {
  verdict: Verdict
  notes?: string | null
  artifacts?: unknown
  confirmedBy?: string | null
}

// ---------------------------------------------------------------------------
// External sync records
// ---------------------------------------------------------------------------

export type TargetSystem = 'version_control' | 'issue_tracker'

export type SyncOperation =
  | 'ensure_branch'
  | 'push_branch'
  | 'open_change_request'
  | 'merge_change_request'
  | 'ensure_issue'
  | 'sync_status'
  | 'post_comment'

export type SyncResultKind = 'success' | 'failed' | 'unknown'

export interface ExternalSyncRecord {
  id: number
  taskId: TaskId
  targetSystem: TargetSystem
  operation: SyncOperation
  requestPayloadHash: string
  /** Human-readable key of the payload (branch name, target status, ...) */
  detail: string
  result: SyncResultKind
  error: string | null
  triggeredBy: Actor
  timestamp: string
}

export type NewSyncRecord = Omit<ExternalSyncRecord, 'id' | 'timestamp'> & { timestamp?: string }

export interface TaskListFilter {
  status?: TaskStatus
  parentId?: TaskId
  includeArchived?: boolean
}
