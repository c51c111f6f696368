/**
 * GateControllerImpl: gate sequencing, verdict recording and the
 * status-implied sync plans.
 */

import {
  IllegalTransitionError,
  NoOpenInvocationError,
  OutOfOrderGateError,
  StuckGateError,
  TaskInvariantError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { GateId, TaskId, TaskStatus, Verdict } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { PrCreatorArtifactsSchema } from '../agent-dispatch/artifact-schemas.js'
import { buildTaskContext } from '../agent-dispatch/task-context.js'
import type { Dispatcher } from '../agent-dispatch/types.js'
import { runPlannedOperation } from '../external-sync/operations.js'
import { issueStatusFor } from '../external-sync/status-mapping.js'
import type { ChangeRequestDraft, ExternalSync, SyncResult } from '../external-sync/types.js'
import type { TaskStore } from '../task-store/task-store.js'
import { CONFIRMATION_COMPONENT } from '../task-store/types.js'
import type { GateInvocation, Task } from '../task-store/types.js'
import type {
  EnterGateOptions,
  GateController,
  GateControllerOptions,
  GateResult,
  RecordVerdictOptions,
  TransitionResult,
} from './gate-controller.js'
import { getGate, isHumanGate, predecessorOf } from './gates.js'
import { ACTIVE_STATUSES, assertTransition, syncPlanFor } from './state-graph.js'

const logger = createLogger('gate-controller')

const COMPONENT = 'gate-controller'

function gateComponent(gateId: GateId): string {
  return `gate:${gateId}`
}

export class GateControllerImpl implements GateController {
  private readonly _store: TaskStore
  private readonly _dispatcher: Dispatcher
  private readonly _sync: ExternalSync
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _maxRevisions: number
  private readonly _staleInvocationMs: number

  constructor(options: GateControllerOptions) {
    this._store = options.store
    this._dispatcher = options.dispatcher
    this._sync = options.sync
    this._eventBus = options.eventBus
    this._maxRevisions = options.maxRevisions
    this._staleInvocationMs = options.staleInvocationMs
  }

  // -------------------------------------------------------------------------
  // Ungated edges
  // -------------------------------------------------------------------------

  submit(taskId: TaskId, actor: string): Promise<TransitionResult> {
    return this._confirmedEdge(taskId, 'Draft', 'RequirementsReview', actor, 'Submitted for requirements review')
  }

  start(taskId: TaskId, actor: string): Promise<TransitionResult> {
    return this._confirmedEdge(taskId, 'ReadyForImplementation', 'InProgress', actor, 'Implementation started')
  }

  private async _confirmedEdge(
    taskId: TaskId,
    from: TaskStatus,
    to: TaskStatus,
    actor: string,
    summary: string,
  ): Promise<TransitionResult> {
    const task = this._store.load(taskId)
    if (task.status !== from) {
      throw new IllegalTransitionError(taskId, task.status, to)
    }

    task.status = to
    this._store.transaction(() => {
      this._store.save(task)
      this._store.appendChangelog(taskId, {
        component: CONFIRMATION_COMPONENT,
        summary,
        effect: `Status ${from} -> ${to}`,
        actor,
      })
    })
    this._emitStatus(taskId, from, to, summary)

    const syncResults = await this._runSyncPlan(taskId, to)
    return { task: this._store.load(taskId), syncResults }
  }

  // -------------------------------------------------------------------------
  // Gates
  // -------------------------------------------------------------------------

  async enterGate(taskId: TaskId, gateId: GateId, options: EnterGateOptions = {}): Promise<GateResult> {
    const gate = getGate(gateId)
    const task = this._store.load(taskId)

    if (task.stuckGate !== null) {
      throw new StuckGateError(taskId, task.stuckGate, task.revisionCounts[task.stuckGate] ?? 0, this._maxRevisions)
    }
    if (task.gatesPassed.includes(gateId)) {
      throw new OutOfOrderGateError(taskId, gateId, task.status, 'gate already passed')
    }

    if (task.openInvocationId !== null) {
      const open = this._store.getInvocation(task.openInvocationId)
      if (open !== undefined && open.state === 'open') {
        if (open.gateId === gateId && isHumanGate(gateId)) {
          return { task, invocation: open, outcome: null, syncResults: [] }
        }
        if (open.gateId !== gateId || !this._isStale(open)) {
          throw new OutOfOrderGateError(
            taskId,
            gateId,
            task.status,
            `invocation ${open.id} for gate "${open.gateId}" is still open`,
          )
        }
        this._abandon(open, 'stale invocation replaced on re-entry')
        logger.warn({ taskId, gateId, invocationId: open.id }, 'Abandoned stale gate invocation')
      }
      task.openInvocationId = null
    }

    const predecessor = predecessorOf(gateId)
    if (predecessor !== null && !task.gatesPassed.includes(predecessor)) {
      throw new OutOfOrderGateError(taskId, gateId, task.status, `gate "${predecessor}" has not been passed`)
    }

    const resuming = task.status === 'NeedsRevision' && task.revisionGate === gateId
    if (task.status !== gate.entryStatus && !resuming) {
      throw new OutOfOrderGateError(taskId, gateId, task.status, `task must be in ${gate.entryStatus}`)
    }

    const from = task.status
    if (resuming) {
      assertTransition(taskId, from, gate.entryStatus)
      task.status = gate.entryStatus
    }

    const agent = gate.worker === 'human' ? null : gate.worker
    const invocation = this._store.transaction(() => {
      const created = this._store.createInvocation(task, gateId, agent)
      task.openInvocationId = created.id
      this._store.save(task)
      return created
    })

    if (resuming) this._emitStatus(taskId, from, gate.entryStatus, `re-entering gate ${gateId}`)
    this._eventBus?.emit('gate:entered', { taskId, gateId, invocationId: invocation.id, agent })
    logger.info({ taskId, gateId, invocationId: invocation.id, agent }, 'Gate entered')

    if (agent === null) {
      return { task: this._store.load(taskId), invocation, outcome: null, syncResults: [] }
    }

    const context = buildTaskContext(this._store.load(taskId), {
      gateId,
      instructions: options.instructions ?? null,
    })
    const outcome = await this._dispatcher.dispatch(agent, context, { invocationId: invocation.id })

    // The invocation may have been abandoned (block) while the worker ran
    const current = this._store.load(taskId)
    if (current.openInvocationId !== invocation.id) {
      logger.warn({ taskId, gateId, invocationId: invocation.id }, 'Verdict discarded: invocation no longer open')
      const latest = this._store.getInvocation(invocation.id) ?? invocation
      return { task: current, invocation: latest, outcome, syncResults: [] }
    }

    const actor = options.actor ?? agent
    const result =
      outcome.error !== null || outcome.verdict === null
        ? await this.recordVerdict(taskId, gateId, 'NeedsRevision', {
            notes: outcome.error?.message ?? `Dispatch to "${agent}" returned no verdict`,
            actor: 'controller',
          })
        : await this.recordVerdict(taskId, gateId, outcome.verdict, {
            notes: outcome.notes,
            artifacts: outcome.artifacts,
            actor,
          })
    return { ...result, outcome }
  }

  async recordVerdict(
    taskId: TaskId,
    gateId: GateId,
    verdict: Verdict,
    options: RecordVerdictOptions = {},
  ): Promise<GateResult> {
    const gate = getGate(gateId)
    const task = this._store.load(taskId)

    const open = task.openInvocationId !== null ? this._store.getInvocation(task.openInvocationId) : undefined
    if (open === undefined || open.gateId !== gateId || open.state !== 'open') {
      throw new NoOpenInvocationError(taskId, gateId)
    }

    const from = task.status
    let stuckAt: number | null = null
    task.openInvocationId = null

    switch (verdict) {
      case 'Approved':
        assertTransition(taskId, from, gate.approvedStatus)
        task.gatesPassed = [...task.gatesPassed, gateId]
        task.status = gate.approvedStatus
        task.revisionGate = null
        break
      case 'NeedsRevision': {
        const count = (task.revisionCounts[gateId] ?? 0) + 1
        task.revisionCounts = { ...task.revisionCounts, [gateId]: count }
        if (count > this._maxRevisions) {
          // Stays at the entry status until an operator overrides
          task.stuckGate = gateId
          stuckAt = count
        } else {
          assertTransition(taskId, from, 'NeedsRevision')
          task.status = 'NeedsRevision'
          task.revisionGate = gateId
        }
        break
      }
      case 'Rejected':
        assertTransition(taskId, from, 'Blocked')
        task.status = 'Blocked'
        task.blockedFrom = from
        task.revisionGate = null
        break
    }

    const notes = options.notes ?? null
    const confirmedBy = options.confirmedBy ?? null
    const decided = this._store.transaction(() => {
      const invocation = this._store.decideInvocation(open.id, {
        verdict,
        notes,
        artifacts: options.artifacts,
        confirmedBy,
      })
      this._store.save(task)
      this._store.appendChangelog(taskId, {
        component: confirmedBy !== null ? CONFIRMATION_COMPONENT : gateComponent(gateId),
        summary: `Gate ${gateId}: ${verdict}`,
        effect:
          stuckAt !== null
            ? `Gate stuck after ${String(stuckAt)} revisions; awaiting override`
            : `Status ${from} -> ${task.status}${notes !== null && notes !== '' ? ` (${notes})` : ''}`,
        actor: confirmedBy ?? options.actor ?? open.invokedAgent ?? 'controller',
      })
      return invocation
    })

    this._eventBus?.emit('gate:decided', { taskId, gateId, invocationId: open.id, verdict, notes })
    if (task.status !== from) {
      this._emitStatus(taskId, from, task.status, `gate ${gateId}: ${verdict}`)
    }
    logger.info({ taskId, gateId, verdict, from, to: task.status }, 'Gate decided')

    if (stuckAt !== null) {
      this._eventBus?.emit('gate:stuck', { taskId, gateId, revisions: stuckAt })
      logger.warn({ taskId, gateId, revisions: stuckAt, limit: this._maxRevisions }, 'Gate stuck; manual override required')
      throw new StuckGateError(taskId, gateId, stuckAt, this._maxRevisions)
    }

    const syncResults: SyncResult[] = []
    if (verdict === 'Approved') {
      const prArtifacts = gateId === 'code_review' ? PrCreatorArtifactsSchema.safeParse(options.artifacts) : undefined
      let draft: ChangeRequestDraft | undefined
      if (prArtifacts?.success === true) {
        if ('change_request_ref' in prArtifacts.data) {
          // The agent already opened one; the plan's open_change_request then finds it set
          syncResults.push(
            await this._sync.adoptChangeRequest(taskId, prArtifacts.data.change_request_ref, {
              triggeredBy: 'controller',
            }),
          )
        } else {
          draft = { title: prArtifacts.data.title, body: prArtifacts.data.body }
        }
      }
      syncResults.push(...(await this._runSyncPlan(taskId, gate.approvedStatus, draft)))
    } else if (verdict === 'Rejected') {
      syncResults.push(...(await this._runSyncPlan(taskId, 'Blocked')))
    }

    return { task: this._store.load(taskId), invocation: decided, outcome: null, syncResults }
  }

  async confirmHumanGate(taskId: TaskId, gateId: GateId, identity: string): Promise<GateResult> {
    if (!isHumanGate(gateId)) {
      throw new TaskInvariantError(`Gate "${gateId}" is decided by an agent and cannot be confirmed`, {
        taskId,
        gateId,
      })
    }
    await this.enterGate(taskId, gateId, { actor: identity })
    return this.recordVerdict(taskId, gateId, 'Approved', { confirmedBy: identity, actor: identity })
  }

  // -------------------------------------------------------------------------
  // Operator controls
  // -------------------------------------------------------------------------

  async block(taskId: TaskId, reason: string, actor: string): Promise<TransitionResult> {
    const task = this._store.load(taskId)
    const from = task.status
    if (!ACTIVE_STATUSES.has(from)) {
      throw new IllegalTransitionError(taskId, from, 'Blocked')
    }

    const openId = task.openInvocationId
    task.status = 'Blocked'
    task.blockedFrom = from
    task.openInvocationId = null

    const abandoned = this._store.transaction(() => {
      const open = openId !== null ? this._store.getInvocation(openId) : undefined
      const closed = open !== undefined && this._store.abandonInvocation(open.id, `blocked: ${reason}`) ? open : null
      this._store.save(task)
      this._store.appendChangelog(taskId, {
        component: COMPONENT,
        summary: `Blocked: ${reason}`,
        effect: `Status ${from} -> Blocked${closed !== null ? `; abandoned ${closed.gateId} invocation` : ''}`,
        actor,
      })
      return closed
    })

    if (abandoned !== null) {
      this._eventBus?.emit('gate:abandoned', {
        taskId,
        gateId: abandoned.gateId,
        invocationId: abandoned.id,
        reason,
      })
    }
    this._emitStatus(taskId, from, 'Blocked', reason)
    logger.info({ taskId, from, reason }, 'Task blocked')

    const syncResults = await this._runSyncPlan(taskId, 'Blocked')
    return { task: this._store.load(taskId), syncResults }
  }

  async unblock(taskId: TaskId, actor: string): Promise<TransitionResult> {
    const task = this._store.load(taskId)
    const to = task.blockedFrom
    if (task.status !== 'Blocked' || to === null) {
      throw new TaskInvariantError(`Task ${taskId} is not blocked`, { taskId, status: task.status })
    }
    assertTransition(taskId, 'Blocked', to)

    task.status = to
    task.blockedFrom = null
    this._store.transaction(() => {
      this._store.save(task)
      this._store.appendChangelog(taskId, {
        component: COMPONENT,
        summary: 'Unblocked',
        effect: `Status Blocked -> ${to}`,
        actor,
      })
    })
    this._emitStatus(taskId, 'Blocked', to, 'unblocked')

    const syncResults: SyncResult[] = []
    if (task.issueRef !== null && issueStatusFor(to) !== undefined) {
      syncResults.push(await this._sync.syncStatus(taskId, to))
    }
    return { task: this._store.load(taskId), syncResults }
  }

  overrideStuckGate(taskId: TaskId, gateId: GateId, actor: string): Task {
    const task = this._store.load(taskId)
    if (task.stuckGate !== gateId) {
      throw new TaskInvariantError(`Gate "${gateId}" is not stuck for task ${taskId}`, {
        taskId,
        gateId,
        stuckGate: task.stuckGate,
      })
    }

    const revisions = task.revisionCounts[gateId] ?? 0
    const counts = { ...task.revisionCounts }
    delete counts[gateId]
    task.revisionCounts = counts
    task.stuckGate = null

    this._store.transaction(() => {
      this._store.save(task)
      this._store.appendChangelog(taskId, {
        component: gateComponent(gateId),
        summary: 'Stuck gate overridden',
        effect: `Revision counter reset from ${String(revisions)}`,
        actor,
      })
    })
    logger.warn({ taskId, gateId, revisions, actor }, 'Stuck gate manually overridden')
    return this._store.load(taskId)
  }

  archive(taskId: TaskId, actor: string): Task {
    const task = this._store.load(taskId)
    const from = task.status
    assertTransition(taskId, from, 'Archived')

    task.status = 'Archived'
    this._store.transaction(() => {
      this._store.save(task)
      this._store.appendChangelog(taskId, {
        component: COMPONENT,
        summary: 'Archived',
        effect: `Status ${from} -> Archived`,
        actor,
      })
    })
    this._emitStatus(taskId, from, 'Archived', 'archived')
    return this._store.load(taskId)
  }

  getInvocations(taskId: TaskId, gateId?: GateId): GateInvocation[] {
    this._store.load(taskId)
    return this._store.listInvocations(taskId, gateId)
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _isStale(invocation: GateInvocation): boolean {
    return Date.now() - Date.parse(invocation.createdAt) > this._staleInvocationMs
  }

  private _abandon(invocation: GateInvocation, reason: string): void {
    if (this._store.abandonInvocation(invocation.id, reason)) {
      this._eventBus?.emit('gate:abandoned', {
        taskId: invocation.taskId,
        gateId: invocation.gateId,
        invocationId: invocation.id,
        reason,
      })
    }
  }

  private _emitStatus(taskId: TaskId, from: TaskStatus, to: TaskStatus, reason: string): void {
    this._eventBus?.emit('task:status-changed', { taskId, from, to, reason })
  }

  /**
   * Run the external operations implied by entering `status`. Blocked only
   * syncs when the task already has an issue.
   */
  private async _runSyncPlan(taskId: TaskId, status: TaskStatus, draft?: ChangeRequestDraft): Promise<SyncResult[]> {
    const results: SyncResult[] = []
    for (const operation of syncPlanFor(status)) {
      if (status === 'Blocked' && this._store.load(taskId).issueRef === null) continue
      results.push(
        await runPlannedOperation(this._sync, operation, taskId, {
          status,
          triggeredBy: 'controller',
          ...(draft !== undefined ? { draft } : {}),
        }),
      )
    }
    return results
  }
}
