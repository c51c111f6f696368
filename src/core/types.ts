/**
 * Core types for taskgate
 * Shared type definitions used across all modules
 */

/** Unique identifier for a task */
export type TaskId = string

/** Unique identifier for a gate invocation */
export type InvocationId = string

/**
 * Lifecycle status of a task.
 *
 * The first eleven values form the ordered forward path; `Blocked`,
 * `NeedsRevision` and `Archived` are side states.
 */
export type TaskStatus =
  | 'Draft'
  | 'RequirementsReview'
  | 'TestPlanReview'
  | 'TechnicalReview'
  | 'SplitEvaluation'
  | 'ReadyForImplementation'
  | 'InProgress'
  | 'InReview'
  | 'DocumentationUpdate'
  | 'ReadyToMerge'
  | 'Done'
  | 'Blocked'
  | 'NeedsRevision'
  | 'Archived'

/** Forward path, in order */
export const ORDERED_STATUSES = [
  'Draft',
  'RequirementsReview',
  'TestPlanReview',
  'TechnicalReview',
  'SplitEvaluation',
  'ReadyForImplementation',
  'InProgress',
  'InReview',
  'DocumentationUpdate',
  'ReadyToMerge',
  'Done',
] as const satisfies readonly TaskStatus[]

export const ALL_STATUSES: readonly TaskStatus[] = [
  ...ORDERED_STATUSES,
  'Blocked',
  'NeedsRevision',
  'Archived',
]

/** Gate identifiers in canonical order */
export const GATE_ORDER = [
  'requirements',
  'test_plan',
  'technical_review',
  'split_evaluation',
  'implementation',
  'code_review',
  'documentation',
  'merge',
] as const

export type GateId = (typeof GATE_ORDER)[number]

/** Verdict produced by a sub-agent or a human confirmation */
export type Verdict = 'Approved' | 'NeedsRevision' | 'Rejected'

/** Names of the specialised sub-agents */
export const AGENT_NAMES = [
  'planner-reviewer',
  'splitter',
  'validator',
  'pr-creator',
  'doc-updater',
  'changelog-writer',
] as const

export type AgentName = (typeof AGENT_NAMES)[number]

/** Completion state of a single implementation step */
export type StepState = 'pending' | 'in_progress' | 'done' | 'skipped'

/** Who initiated an action that lands in the audit trail */
export type Actor = 'controller' | 'dispatcher' | 'reconciler' | 'operator'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export function isGateId(value: string): value is GateId {
  return (GATE_ORDER as readonly string[]).includes(value)
}

export function isTaskStatus(value: string): value is TaskStatus {
  return (ALL_STATUSES as readonly string[]).includes(value)
}
