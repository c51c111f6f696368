export { createExternalSync, ExternalSyncImpl } from './external-sync-impl.js'
export type { ExternalSyncOptions } from './external-sync-impl.js'
export { GitVersionControlAdapter } from './git-adapter.js'
export type { GitAdapterOptions } from './git-adapter.js'
export { GitHubIssueTrackerAdapter, STATUS_LABEL_PREFIX, statusLabel } from './github-issue-adapter.js'
export type { GhOptions } from './gh-utils.js'
export {
  ISSUE_STATUSES,
  ISSUE_STATUS_MAP,
  branchNameFor,
  isIssueStatus,
  issueMarker,
  issueStatusFor,
} from './status-mapping.js'
export type { IssueStatus } from './status-mapping.js'
export { CommandFailedError, getGitVersion, isGitVersionSupported, runChecked, spawnProcess } from './spawn-utils.js'
export type { SpawnOptions, SpawnResult } from './spawn-utils.js'
export { OPERATION_SYSTEMS } from './types.js'
export type {
  ChangeRequestDraft,
  ChangeRequestInfo,
  ChangeRequestState,
  CreateIssueInput,
  ExternalSync,
  IssueTrackerAdapter,
  OpenChangeRequestInput,
  SyncCallOptions,
  SyncResult,
  VersionControlAdapter,
} from './types.js'
export { runPlannedOperation } from './operations.js'
export type { PlannedOperationOptions, PlannedSyncOperation } from './operations.js'
