/**
 * DispatcherImpl: runs one sub-agent with one bounded timeout and turns
 * every failure into a DispatchOutcome.
 *
 * Besides producing verdicts, the dispatcher owns the side effects of two
 * agents' artifacts:
 *  - splitter: creates child tasks, ensures their issues and rewrites the
 *    parent's incomplete steps into split references
 *  - changelog-writer: appends its entries to the task changelog
 *
 * No automatic retry: a failed dispatch is reported, and the gate
 * controller decides what it means.
 */

import { DispatchError } from '../../core/errors.js'
import type { DispatchErrorKind } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { AgentName, TaskId } from '../../core/types.js'
import { TimeoutError, withTimeout } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { ExternalSync } from '../external-sync/types.js'
import type { TaskStore } from '../task-store/task-store.js'
import type { Step } from '../task-store/types.js'
import {
  ARTIFACT_SCHEMAS,
  ChangelogWriterArtifactsSchema,
  SplitterArtifactsSchema,
  VerdictSchema,
  type ChildTaskSpec,
} from './artifact-schemas.js'
import { WorkerOutputError, WorkerProcessError } from './command-worker.js'
import type { WorkerRegistry } from './worker-registry.js'
import type { DispatchOptions, DispatchOutcome, Dispatcher, TaskContext, WorkerOutput } from './types.js'

const logger = createLogger('agent-dispatch')

export interface CreateDispatcherOptions {
  registry: WorkerRegistry
  store: TaskStore
  sync: ExternalSync
  eventBus?: TypedEventBus
  /** Default per-call timeout */
  timeoutMs: number
  /** Per-agent timeout overrides */
  agentTimeouts?: Partial<Record<AgentName, number>>
}

function classifyError(err: unknown): { kind: DispatchErrorKind; message: string } {
  if (err instanceof TimeoutError) return { kind: 'timeout', message: err.message }
  if (err instanceof WorkerOutputError) return { kind: 'invalid_output', message: err.message }
  if (err instanceof WorkerProcessError) return { kind: 'agent', message: err.message }
  if (err instanceof Error) {
    // spawn failures (ENOENT, EACCES) surface as transport problems
    const code = 'code' in err ? err.code : undefined
    if (typeof code === 'string' && code.startsWith('E')) return { kind: 'transport', message: err.message }
    return { kind: 'agent', message: err.message }
  }
  return { kind: 'agent', message: String(err) }
}

export class DispatcherImpl implements Dispatcher {
  private readonly _registry: WorkerRegistry
  private readonly _store: TaskStore
  private readonly _sync: ExternalSync
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _timeoutMs: number
  private readonly _agentTimeouts: Partial<Record<AgentName, number>>

  constructor(options: CreateDispatcherOptions) {
    this._registry = options.registry
    this._store = options.store
    this._sync = options.sync
    this._eventBus = options.eventBus
    this._timeoutMs = options.timeoutMs
    this._agentTimeouts = options.agentTimeouts ?? {}
  }

  async dispatch(agent: AgentName, context: TaskContext, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const startedAt = Date.now()
    const timeoutMs = options.timeoutMs ?? this._agentTimeouts[agent] ?? this._timeoutMs

    const worker = this._registry.resolve(agent)
    if (worker === undefined) {
      return this._failure(agent, context.taskId, 'unknown_agent', 'no worker registered for this agent', startedAt)
    }

    this._eventBus?.emit('dispatch:started', { taskId: context.taskId, agent })
    logger.debug({ agent, taskId: context.taskId, timeoutMs }, 'Agent dispatched')

    let output: WorkerOutput
    try {
      output = await withTimeout(`${agent} dispatch`, timeoutMs, (signal) => worker.run(context, signal))
    } catch (err) {
      const { kind, message } = classifyError(err)
      return this._failure(agent, context.taskId, kind, message, startedAt)
    }

    const verdict = VerdictSchema.safeParse(output.verdict)
    if (!verdict.success) {
      return this._failure(agent, context.taskId, 'invalid_output', `unknown verdict "${String(output.verdict)}"`, startedAt)
    }

    const artifacts = ARTIFACT_SCHEMAS[agent].safeParse(output.artifacts ?? {})
    if (!artifacts.success) {
      const detail = artifacts.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
      return this._failure(agent, context.taskId, 'invalid_output', `artifacts rejected: ${detail}`, startedAt)
    }

    let childTaskIds: TaskId[] = []
    if (verdict.data === 'Approved' && !this._invocationOpen(options)) {
      logger.warn(
        { agent, taskId: context.taskId, invocationId: options.invocationId },
        'Invocation closed while the agent ran; artifacts not applied',
      )
    } else if (verdict.data === 'Approved') {
      try {
        childTaskIds = await this._applyArtifacts(agent, context, output.artifacts ?? {})
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        return this._failure(agent, context.taskId, 'agent', `applying artifacts failed: ${message}`, startedAt)
      }
    }

    const durationMs = Date.now() - startedAt
    logger.debug({ agent, taskId: context.taskId, verdict: verdict.data, durationMs }, 'Agent completed')
    return {
      agent,
      verdict: verdict.data,
      artifacts: artifacts.data,
      notes: output.notes ?? null,
      error: null,
      durationMs,
      childTaskIds,
    }
  }

  private _invocationOpen(options: DispatchOptions): boolean {
    if (options.invocationId === undefined) return true
    return this._store.getInvocation(options.invocationId)?.state === 'open'
  }

  // ---------------------------------------------------------------------------
  // Artifact side effects
  // ---------------------------------------------------------------------------

  private async _applyArtifacts(agent: AgentName, context: TaskContext, raw: unknown): Promise<TaskId[]> {
    if (agent === 'splitter') {
      const { children } = SplitterArtifactsSchema.parse(raw)
      return children.length >= 2 ? this._applySplit(context.taskId, children) : []
    }
    if (agent === 'changelog-writer') {
      const { entries } = ChangelogWriterArtifactsSchema.parse(raw)
      for (const entry of entries) {
        this._store.appendChangelog(context.taskId, { ...entry, actor: 'changelog-writer' })
      }
    }
    return []
  }

  /**
   * Create one child task per spec, ensure an issue for each and replace the
   * parent's incomplete steps with references to the children. A parent
   * that already carries split references is left alone.
   */
  private async _applySplit(parentId: TaskId, children: ChildTaskSpec[]): Promise<TaskId[]> {
    const parent = this._store.load(parentId)
    const existing = parent.steps.filter((s) => s.splitRef !== null).map((s) => s.splitRef?.childTaskId ?? '')
    if (existing.length > 0) {
      logger.info({ taskId: parentId, children: existing }, 'Task already split; not splitting again')
      return existing
    }

    const childIds = this._store.transaction(() => {
      const ids = children.map(
        (child) =>
          this._store.create({
            title: child.title,
            requirements: child.requirements,
            testPlan: child.test_plan,
            parentId,
            createdBy: 'dispatcher',
            steps: child.steps.map((s) => ({ description: s.description, acceptanceCriteria: s.acceptance_criteria })),
          }).id,
      )

      const kept = parent.steps.filter((s) => s.completionState === 'done' || s.completionState === 'skipped')
      const replaced = parent.steps.filter((s) => s.completionState !== 'done' && s.completionState !== 'skipped')
      const splitSteps: Step[] = ids.map((childTaskId, index) => ({
        description: children[index]?.title ?? childTaskId,
        acceptanceCriteria: [],
        completionState: 'pending',
        evidence: null,
        splitRef: { childTaskId },
      }))

      this._store.replaceSteps(parentId, [...kept, ...splitSteps], parent.version)
      this._store.appendChangelog(parentId, {
        component: 'splitter',
        summary: `Split into ${String(ids.length)} sub-tasks`,
        effect:
          replaced.length > 0
            ? `Replaced steps: ${replaced.map((s) => s.description).join('; ')}`
            : 'No incomplete steps replaced',
        actor: 'dispatcher',
      })
      return ids
    })

    this._eventBus?.emit('task:split', { taskId: parentId, childTaskIds: childIds })
    logger.info({ taskId: parentId, childTaskIds: childIds }, 'Task split')

    // Issue creation failures are recorded by the sync layer and repaired by reconciliation
    for (const childId of childIds) {
      await this._sync.ensureIssue(childId, { triggeredBy: 'dispatcher' })
    }
    return childIds
  }

  private _failure(
    agent: AgentName,
    taskId: TaskId,
    kind: DispatchErrorKind,
    message: string,
    startedAt: number,
  ): DispatchOutcome {
    const error = new DispatchError(agent, kind, message)
    logger.warn({ agent, taskId, kind, error: message }, 'Agent dispatch failed')
    this._eventBus?.emit('dispatch:failed', { taskId, agent, kind, message })
    return {
      agent,
      verdict: null,
      artifacts: null,
      notes: null,
      error,
      durationMs: Date.now() - startedAt,
      childTaskIds: [],
    }
  }
}

export function createDispatcher(options: CreateDispatcherOptions): Dispatcher {
  return new DispatcherImpl(options)
}
