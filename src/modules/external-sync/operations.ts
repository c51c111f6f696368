/**
 * Run a status-implied sync operation by name. Used by the gate controller
 * after a transition and by the reconciler when it repairs drift.
 */

import type { TaskId, TaskStatus } from '../../core/types.js'
import type { SyncOperation } from '../task-store/types.js'
import type { ChangeRequestDraft, ExternalSync, SyncCallOptions, SyncResult } from './types.js'

/** Operations a status can imply; comments are operator-initiated only */
export type PlannedSyncOperation = Exclude<SyncOperation, 'post_comment'>

export interface PlannedOperationOptions extends SyncCallOptions {
  /** Status pushed by `sync_status` */
  status: TaskStatus
  draft?: ChangeRequestDraft
}

export function runPlannedOperation(
  sync: ExternalSync,
  operation: PlannedSyncOperation,
  taskId: TaskId,
  options: PlannedOperationOptions,
): Promise<SyncResult> {
  const callOptions: SyncCallOptions = options.triggeredBy !== undefined ? { triggeredBy: options.triggeredBy } : {}
  switch (operation) {
    case 'ensure_branch':
      return sync.ensureBranch(taskId, callOptions)
    case 'push_branch':
      return sync.pushBranch(taskId, callOptions)
    case 'open_change_request':
      return sync.openChangeRequest(taskId, options.draft, callOptions)
    case 'merge_change_request':
      return sync.mergeChangeRequest(taskId, callOptions)
    case 'ensure_issue':
      return sync.ensureIssue(taskId, callOptions)
    case 'sync_status':
      return sync.syncStatus(taskId, options.status, callOptions)
  }
}
