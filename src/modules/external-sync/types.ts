/**
 * Types for the external sync layer.
 *
 * Adapters are transport-level: each method performs exactly one remote
 * query or mutation and throws on failure. Idempotency, timeouts and audit
 * records live one level up, in ExternalSync.
 */

import type { ExternalSyncFailure } from '../../core/errors.js'
import type { Actor, TaskId, TaskStatus } from '../../core/types.js'
import type { SyncOperation, SyncResultKind, TargetSystem } from '../task-store/types.js'

// ---------------------------------------------------------------------------
// Version control
// ---------------------------------------------------------------------------

export type ChangeRequestState = 'open' | 'merged' | 'closed'

export interface ChangeRequestInfo {
  ref: string
  state: ChangeRequestState
}

export interface OpenChangeRequestInput {
  branch: string
  base: string
  title: string
  body: string
}

export interface VersionControlAdapter {
  /** Whether the branch exists on the remote */
  findBranch(branch: string, signal: AbortSignal): Promise<boolean>
  /** Create the branch from `base` and publish it to the remote */
  createBranch(branch: string, base: string, signal: AbortSignal): Promise<void>
  pushBranch(branch: string, signal: AbortSignal): Promise<void>
  /** The most recent change request whose head is `branch`, if any */
  findChangeRequest(branch: string, signal: AbortSignal): Promise<ChangeRequestInfo | null>
  /** Returns the new change request's reference */
  openChangeRequest(input: OpenChangeRequestInput, signal: AbortSignal): Promise<string>
  getChangeRequestState(ref: string, signal: AbortSignal): Promise<ChangeRequestState>
  mergeChangeRequest(ref: string, signal: AbortSignal): Promise<void>
}

// ---------------------------------------------------------------------------
// Issue tracker
// ---------------------------------------------------------------------------

export interface CreateIssueInput {
  title: string
  body: string
  /** Stable lookup key embedded in the issue so it can be found again */
  marker: string
  status: string
}

export interface IssueTrackerAdapter {
  /** Reference of the issue carrying `marker`, or null */
  findIssue(marker: string, signal: AbortSignal): Promise<string | null>
  /** Returns the new issue's reference */
  createIssue(input: CreateIssueInput, signal: AbortSignal): Promise<string>
  /** Current tracker status, or null when the issue has none */
  getStatus(ref: string, signal: AbortSignal): Promise<string | null>
  setStatus(ref: string, status: string, signal: AbortSignal): Promise<void>
  comment(ref: string, body: string, signal: AbortSignal): Promise<void>
}

// ---------------------------------------------------------------------------
// ExternalSync service
// ---------------------------------------------------------------------------

export interface SyncCallOptions {
  /** Who asked for the call; lands on the sync record (default: controller) */
  triggeredBy?: Actor
}

export interface ChangeRequestDraft {
  title: string
  body: string
}

/**
 * Outcome of one ExternalSync call. `skipped` means the call did not apply
 * (system disabled, or a status with no tracker mapping) and nothing was
 * recorded.
 */
export interface SyncResult {
  system: TargetSystem
  operation: SyncOperation
  result: SyncResultKind | 'skipped'
  /** Reference produced or confirmed by the call, if it has one */
  ref: string | null
  detail: string
  error: ExternalSyncFailure | null
}

export interface ExternalSync {
  isEnabled(system: TargetSystem): boolean

  /** Branch `<prefix><taskId>`; created only when missing on the remote */
  ensureBranch(taskId: TaskId, options?: SyncCallOptions): Promise<SyncResult>

  /** Issue carrying the task's marker; created only when none is found */
  ensureIssue(taskId: TaskId, options?: SyncCallOptions): Promise<SyncResult>

  /** Push the mapped status of `status` to the task's issue if it differs */
  syncStatus(taskId: TaskId, status: TaskStatus, options?: SyncCallOptions): Promise<SyncResult>

  pushBranch(taskId: TaskId, options?: SyncCallOptions): Promise<SyncResult>

  openChangeRequest(
    taskId: TaskId,
    draft?: ChangeRequestDraft,
    options?: SyncCallOptions,
  ): Promise<SyncResult>

  /**
   * Record a change request opened outside taskgate (e.g. by the pr-creator
   * agent) as the task's change request. Audited as `open_change_request`.
   */
  adoptChangeRequest(taskId: TaskId, ref: string, options?: SyncCallOptions): Promise<SyncResult>

  mergeChangeRequest(taskId: TaskId, options?: SyncCallOptions): Promise<SyncResult>

  postComment(taskId: TaskId, body: string, options?: SyncCallOptions): Promise<SyncResult>
}

/** Target system of each operation */
export const OPERATION_SYSTEMS: Record<SyncOperation, TargetSystem> = {
  ensure_branch: 'version_control',
  push_branch: 'version_control',
  open_change_request: 'version_control',
  merge_change_request: 'version_control',
  ensure_issue: 'issue_tracker',
  sync_status: 'issue_tracker',
  post_comment: 'issue_tracker',
}
