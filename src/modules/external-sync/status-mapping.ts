/**
 * Internal status -> issue tracker status vocabulary.
 */

import type { TaskId, TaskStatus } from '../../core/types.js'

export const ISSUE_STATUSES = [
  'Business Review',
  'Ready for Implementation',
  'In Progress',
  'In Review',
  'Ready to Merge',
  'Done',
  'Blocked',
] as const

export type IssueStatus = (typeof ISSUE_STATUSES)[number]

/** NeedsRevision and Archived have no tracker counterpart and are never pushed */
export const ISSUE_STATUS_MAP: Partial<Record<TaskStatus, IssueStatus>> = {
  Draft: 'Business Review',
  RequirementsReview: 'Business Review',
  TestPlanReview: 'Business Review',
  TechnicalReview: 'Business Review',
  SplitEvaluation: 'Business Review',
  ReadyForImplementation: 'Ready for Implementation',
  InProgress: 'In Progress',
  InReview: 'In Review',
  DocumentationUpdate: 'In Review',
  ReadyToMerge: 'Ready to Merge',
  Done: 'Done',
  Blocked: 'Blocked',
}

export function issueStatusFor(status: TaskStatus): IssueStatus | undefined {
  return ISSUE_STATUS_MAP[status]
}

export function isIssueStatus(value: string): value is IssueStatus {
  return (ISSUE_STATUSES as readonly string[]).includes(value)
}

/** Lookup key embedded in a task's issue body */
export function issueMarker(taskId: TaskId): string {
  return `taskgate:${taskId}`
}

export function branchNameFor(prefix: string, taskId: TaskId): string {
  return `${prefix}${taskId}`
}
