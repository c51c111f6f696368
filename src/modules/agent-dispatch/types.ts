/**
 * Types and interfaces for sub-agent dispatch.
 *
 * A sub-agent (Worker) receives a read-only projection of a task and
 * answers with a verdict, optional notes and agent-specific artifacts.
 */

import type { DispatchError } from '../../core/errors.js'
import type { AgentName, GateId, InvocationId, TaskId, TaskStatus, Verdict } from '../../core/types.js'
import type { ChangelogEntry, HandoverNote, Step } from '../task-store/types.js'

// ---------------------------------------------------------------------------
// TaskContext
// ---------------------------------------------------------------------------

/**
 * Projection of a task handed to a worker. Deep-frozen; workers cannot
 * mutate the aggregate through it.
 */
export interface TaskContext {
  readonly taskId: TaskId
  readonly title: string
  readonly status: TaskStatus
  readonly parentId: TaskId | null
  readonly requirements: string
  readonly testPlan: string
  readonly steps: readonly Readonly<Step>[]
  readonly gatesPassed: readonly GateId[]
  /** Most recent changelog entries, oldest first */
  readonly recentChangelog: readonly Readonly<ChangelogEntry>[]
  readonly branchRef: string | null
  readonly issueRef: string | null
  readonly changeRequestRef: string | null
  readonly handover: Readonly<HandoverNote> | null
  /** Gate being decided, when the dispatch is part of one */
  readonly gateId: GateId | null
  /** Free-form instructions for the run (e.g. step progress for the changelog writer) */
  readonly instructions: string | null
}

// ---------------------------------------------------------------------------
// Worker
// ---------------------------------------------------------------------------

export interface WorkerOutput {
  verdict: Verdict
  notes?: string | null
  artifacts?: unknown
}

/**
 * A sub-agent implementation. `run` should stop promptly when `signal`
 * aborts; the dispatcher stops waiting at the deadline either way.
 */
export interface Worker {
  readonly name: AgentName
  run(context: TaskContext, signal: AbortSignal): Promise<WorkerOutput>
}

// ---------------------------------------------------------------------------
// DispatchOutcome
// ---------------------------------------------------------------------------

/**
 * Result of one dispatch. Failures are values: `error` is set and
 * `verdict` is null; nothing is thrown to the caller.
 */
export interface DispatchOutcome {
  agent: AgentName
  verdict: Verdict | null
  /** Validated artifacts for the agent, or null */
  artifacts: unknown
  notes: string | null
  error: DispatchError | null
  durationMs: number
  /** Child tasks created when a split was applied */
  childTaskIds: TaskId[]
}

export interface DispatchOptions {
  /** Overrides the configured timeout for this call */
  timeoutMs?: number
  /**
   * Gate invocation the dispatch decides. Artifact side effects (splits,
   * changelog entries) are applied only while it is still open.
   */
  invocationId?: InvocationId
}

export interface Dispatcher {
  dispatch(agent: AgentName, context: TaskContext, options?: DispatchOptions): Promise<DispatchOutcome>
}
