/**
 * ExternalSyncImpl: idempotent, bounded, audited calls to the version
 * control system and the issue tracker.
 *
 * Every call:
 *  1. runs under `sync.timeout_ms` (a timeout is recorded as `unknown`)
 *  2. appends one ExternalSyncRecord, success or not
 *  3. returns a SyncResult; adapter failures never propagate as exceptions
 *
 * Internal task status is never touched here; only `*Ref` fields are set.
 */

import { ExternalSyncFailure } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Actor, TaskId, TaskStatus } from '../../core/types.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import type { AuditLog } from '../../recovery/audit-log.js'
import { TimeoutError, hashPayload, withTimeout } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { TaskStore } from '../task-store/task-store.js'
import type { ExternalRefField, SyncOperation, Task, TargetSystem } from '../task-store/types.js'
import { branchNameFor, issueMarker, issueStatusFor } from './status-mapping.js'
import {
  OPERATION_SYSTEMS,
  type ChangeRequestDraft,
  type ExternalSync,
  type IssueTrackerAdapter,
  type SyncCallOptions,
  type SyncResult,
  type VersionControlAdapter,
} from './types.js'

const logger = createLogger('external-sync')

export interface ExternalSyncOptions {
  store: TaskStore
  auditLog: AuditLog
  /** null when version control sync is disabled */
  versionControl: VersionControlAdapter | null
  /** null when issue tracker sync is disabled */
  issueTracker: IssueTrackerAdapter | null
  eventBus?: TypedEventBus
  timeoutMs: number
  baseBranch: string
  branchPrefix: string
}

interface CallSpec {
  operation: SyncOperation
  payload: Record<string, unknown>
  detail: string
  triggeredBy: Actor
  /** Performs the call; returns the ref it produced or confirmed */
  run: (signal: AbortSignal) => Promise<string | null>
}

export class ExternalSyncImpl implements ExternalSync {
  private readonly _store: TaskStore
  private readonly _auditLog: AuditLog
  private readonly _vcs: VersionControlAdapter | null
  private readonly _tracker: IssueTrackerAdapter | null
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _timeoutMs: number
  private readonly _baseBranch: string
  private readonly _branchPrefix: string

  constructor(options: ExternalSyncOptions) {
    this._store = options.store
    this._auditLog = options.auditLog
    this._vcs = options.versionControl
    this._tracker = options.issueTracker
    this._eventBus = options.eventBus
    this._timeoutMs = options.timeoutMs
    this._baseBranch = options.baseBranch
    this._branchPrefix = options.branchPrefix
  }

  isEnabled(system: TargetSystem): boolean {
    return system === 'version_control' ? this._vcs !== null : this._tracker !== null
  }

  // -------------------------------------------------------------------------
  // Version control
  // -------------------------------------------------------------------------

  async ensureBranch(taskId: TaskId, options: SyncCallOptions = {}): Promise<SyncResult> {
    const vcs = this._vcs
    const task = this._store.load(taskId)
    const branch = task.branchRef ?? branchNameFor(this._branchPrefix, task.id)
    if (vcs === null) return this._skipped('ensure_branch', branch)

    return this._call(task, {
      operation: 'ensure_branch',
      payload: { branch, base: this._baseBranch },
      detail: branch,
      triggeredBy: options.triggeredBy ?? 'controller',
      run: async (signal) => {
        const exists = await vcs.findBranch(branch, signal)
        if (!exists) {
          await vcs.createBranch(branch, this._baseBranch, signal)
        }
        this._setRef(task.id, 'branchRef', branch)
        return branch
      },
    })
  }

  async pushBranch(taskId: TaskId, options: SyncCallOptions = {}): Promise<SyncResult> {
    const vcs = this._vcs
    const task = this._store.load(taskId)
    const branch = task.branchRef
    if (vcs === null) return this._skipped('push_branch', branch ?? '')

    return this._call(task, {
      operation: 'push_branch',
      payload: { branch },
      detail: branch ?? '(no branch)',
      triggeredBy: options.triggeredBy ?? 'controller',
      run: async (signal) => {
        if (branch === null) throw new Error('task has no branch reference')
        await vcs.pushBranch(branch, signal)
        return branch
      },
    })
  }

  async openChangeRequest(
    taskId: TaskId,
    draft?: ChangeRequestDraft,
    options: SyncCallOptions = {},
  ): Promise<SyncResult> {
    const vcs = this._vcs
    const task = this._store.load(taskId)
    const branch = task.branchRef
    if (vcs === null) return this._skipped('open_change_request', branch ?? '')

    return this._call(task, {
      operation: 'open_change_request',
      payload: { branch, base: this._baseBranch },
      detail: branch ?? '(no branch)',
      triggeredBy: options.triggeredBy ?? 'controller',
      run: async (signal) => {
        if (task.changeRequestRef !== null) return task.changeRequestRef
        if (branch === null) throw new Error('task has no branch reference')

        const existing = await vcs.findChangeRequest(branch, signal)
        const ref =
          existing !== null && existing.state !== 'closed'
            ? existing.ref
            : await vcs.openChangeRequest(
                {
                  branch,
                  base: this._baseBranch,
                  title: draft?.title ?? task.title,
                  body: draft?.body ?? defaultChangeRequestBody(task),
                },
                signal,
              )
        this._setRef(task.id, 'changeRequestRef', ref)
        return ref
      },
    })
  }

  async adoptChangeRequest(taskId: TaskId, ref: string, options: SyncCallOptions = {}): Promise<SyncResult> {
    const task = this._store.load(taskId)
    if (this._vcs === null) return this._skipped('open_change_request', ref)

    return this._call(task, {
      operation: 'open_change_request',
      payload: { branch: task.branchRef, base: this._baseBranch, adopted: ref },
      detail: ref,
      triggeredBy: options.triggeredBy ?? 'controller',
      run: () => {
        this._setRef(task.id, 'changeRequestRef', ref)
        return Promise.resolve(ref)
      },
    })
  }

  async mergeChangeRequest(taskId: TaskId, options: SyncCallOptions = {}): Promise<SyncResult> {
    const vcs = this._vcs
    const task = this._store.load(taskId)
    const ref = task.changeRequestRef
    if (vcs === null) return this._skipped('merge_change_request', ref ?? '')

    return this._call(task, {
      operation: 'merge_change_request',
      payload: { changeRequest: ref },
      detail: ref ?? '(no change request)',
      triggeredBy: options.triggeredBy ?? 'controller',
      run: async (signal) => {
        if (ref === null) throw new Error('task has no change request reference')
        const state = await vcs.getChangeRequestState(ref, signal)
        if (state === 'closed') {
          throw new Error(`change request ${ref} is closed`)
        }
        if (state === 'open') {
          await vcs.mergeChangeRequest(ref, signal)
        }
        return ref
      },
    })
  }

  // -------------------------------------------------------------------------
  // Issue tracker
  // -------------------------------------------------------------------------

  async ensureIssue(taskId: TaskId, options: SyncCallOptions = {}): Promise<SyncResult> {
    const tracker = this._tracker
    const task = this._store.load(taskId)
    const marker = issueMarker(task.id)
    if (tracker === null) return this._skipped('ensure_issue', marker)

    return this._call(task, {
      operation: 'ensure_issue',
      payload: { marker },
      detail: marker,
      triggeredBy: options.triggeredBy ?? 'controller',
      run: async (signal) => {
        if (task.issueRef !== null) return task.issueRef
        const found = await tracker.findIssue(marker, signal)
        const ref =
          found ??
          (await tracker.createIssue(
            {
              title: task.title,
              body: defaultIssueBody(task, marker),
              marker,
              status: issueStatusFor(task.status) ?? 'Business Review',
            },
            signal,
          ))
        this._setRef(task.id, 'issueRef', ref)
        return ref
      },
    })
  }

  async syncStatus(taskId: TaskId, status: TaskStatus, options: SyncCallOptions = {}): Promise<SyncResult> {
    const tracker = this._tracker
    const target = issueStatusFor(status)
    if (tracker === null || target === undefined) {
      return this._skipped('sync_status', target ?? status)
    }
    const task = this._store.load(taskId)
    const issue = task.issueRef

    return this._call(task, {
      operation: 'sync_status',
      payload: { issue, status: target },
      detail: target,
      triggeredBy: options.triggeredBy ?? 'controller',
      run: async (signal) => {
        if (issue === null) throw new Error('task has no issue reference')
        const current = await tracker.getStatus(issue, signal)
        if (current !== target) {
          await tracker.setStatus(issue, target, signal)
        }
        return issue
      },
    })
  }

  async postComment(taskId: TaskId, body: string, options: SyncCallOptions = {}): Promise<SyncResult> {
    const tracker = this._tracker
    if (tracker === null) return this._skipped('post_comment', '')
    const task = this._store.load(taskId)
    const issue = task.issueRef

    return this._call(task, {
      operation: 'post_comment',
      payload: { issue, body },
      detail: issue ?? '(no issue)',
      triggeredBy: options.triggeredBy ?? 'operator',
      run: async (signal) => {
        if (issue === null) throw new Error('task has no issue reference')
        await tracker.comment(issue, body, signal)
        return issue
      },
    })
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _setRef(taskId: TaskId, field: ExternalRefField, value: string): void {
    this._store.setRef(taskId, field, value)
  }

  private _skipped(operation: SyncOperation, detail: string): SyncResult {
    return {
      system: OPERATION_SYSTEMS[operation],
      operation,
      result: 'skipped',
      ref: null,
      detail,
      error: null,
    }
  }

  private async _call(task: Task, spec: CallSpec): Promise<SyncResult> {
    const system = OPERATION_SYSTEMS[spec.operation]
    const requestPayloadHash = hashPayload({ operation: spec.operation, taskId: task.id, ...spec.payload })

    try {
      const ref = await withTimeout(`${spec.operation} for ${task.id}`, this._timeoutMs, spec.run)
      this._auditLog.record({
        taskId: task.id,
        targetSystem: system,
        operation: spec.operation,
        requestPayloadHash,
        detail: spec.detail,
        result: 'success',
        error: null,
        triggeredBy: spec.triggeredBy,
      })
      logger.debug({ taskId: task.id, operation: spec.operation, detail: spec.detail }, 'External sync succeeded')
      this._eventBus?.emit('sync:succeeded', {
        taskId: task.id,
        system,
        operation: spec.operation,
        detail: spec.detail,
      })
      return { system, operation: spec.operation, result: 'success', ref, detail: spec.detail, error: null }
    } catch (err) {
      const result = err instanceof TimeoutError ? 'unknown' : 'failed'
      const message = maskSecrets(err instanceof Error ? err.message : String(err))
      const failure = new ExternalSyncFailure(`${spec.operation} failed for task ${task.id}: ${message}`, {
        taskId: task.id,
        system,
        operation: spec.operation,
        result,
      })

      this._auditLog.record({
        taskId: task.id,
        targetSystem: system,
        operation: spec.operation,
        requestPayloadHash,
        detail: spec.detail,
        result,
        error: message,
        triggeredBy: spec.triggeredBy,
      })
      logger.warn(
        { taskId: task.id, operation: spec.operation, result, error: message },
        'External sync failed; recorded for reconciliation',
      )
      this._eventBus?.emit('sync:failed', {
        taskId: task.id,
        system,
        operation: spec.operation,
        detail: spec.detail,
        error: message,
      })
      return { system, operation: spec.operation, result, ref: null, detail: spec.detail, error: failure }
    }
  }
}

function defaultIssueBody(task: Task, marker: string): string {
  const lines = [task.requirements !== '' ? task.requirements : task.title, '']
  if (task.parentId !== null) {
    lines.push(`Split from task ${task.parentId}.`, '')
  }
  lines.push(`<!-- ${marker} -->`)
  return lines.join('\n')
}

function defaultChangeRequestBody(task: Task): string {
  const lines = [task.title, '']
  for (const step of task.steps) {
    lines.push(`- [${step.completionState === 'done' ? 'x' : ' '}] ${step.description}`)
  }
  if (task.issueRef !== null) {
    lines.push('', `Closes ${task.issueRef}`)
  }
  return lines.join('\n')
}

export function createExternalSync(options: ExternalSyncOptions): ExternalSync {
  return new ExternalSyncImpl(options)
}
