/**
 * GateController: the only writer of a task's status, gates passed and
 * revision state.
 *
 * Every mutating call loads the task, validates, mutates in memory and
 * saves under the optimistic version check. Status is saved before any
 * external sync is attempted; sync failures are recorded, never thrown.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { GateId, TaskId, Verdict } from '../../core/types.js'
import type { DispatchOutcome, Dispatcher } from '../agent-dispatch/types.js'
import type { ExternalSync, SyncResult } from '../external-sync/types.js'
import type { TaskStore } from '../task-store/task-store.js'
import type { GateInvocation, Task } from '../task-store/types.js'
import { GateControllerImpl } from './gate-controller-impl.js'

export interface EnterGateOptions {
  /** Identity recorded on changelog entries written by this call */
  actor?: string
  /** Passed to the worker in its TaskContext */
  instructions?: string | null
}

export interface RecordVerdictOptions {
  notes?: string | null
  artifacts?: unknown
  /** Set for human confirmations; recorded instead of an agent */
  confirmedBy?: string | null
  actor?: string
}

export interface GateResult {
  task: Task
  invocation: GateInvocation
  /** The dispatch behind an agent gate's verdict; null for human gates */
  outcome: DispatchOutcome | null
  syncResults: SyncResult[]
}

export interface TransitionResult {
  task: Task
  syncResults: SyncResult[]
}

export interface GateController {
  /** Draft -> RequirementsReview, a confirmed ungated edge */
  submit(taskId: TaskId, actor: string): Promise<TransitionResult>

  /** ReadyForImplementation -> InProgress, a confirmed ungated edge */
  start(taskId: TaskId, actor: string): Promise<TransitionResult>

  /**
   * Open an invocation of `gateId`. Agent gates dispatch their worker and
   * record its verdict before returning; human gates return the open
   * invocation for `confirmHumanGate`.
   */
  enterGate(taskId: TaskId, gateId: GateId, options?: EnterGateOptions): Promise<GateResult>

  recordVerdict(taskId: TaskId, gateId: GateId, verdict: Verdict, options?: RecordVerdictOptions): Promise<GateResult>

  confirmHumanGate(taskId: TaskId, gateId: GateId, identity: string): Promise<GateResult>

  block(taskId: TaskId, reason: string, actor: string): Promise<TransitionResult>

  unblock(taskId: TaskId, actor: string): Promise<TransitionResult>

  overrideStuckGate(taskId: TaskId, gateId: GateId, actor: string): Task

  archive(taskId: TaskId, actor: string): Task

  getInvocations(taskId: TaskId, gateId?: GateId): GateInvocation[]
}

export interface GateControllerOptions {
  store: TaskStore
  dispatcher: Dispatcher
  sync: ExternalSync
  eventBus?: TypedEventBus
  /** NeedsRevision verdicts a gate may collect before it is stuck */
  maxRevisions: number
  /** Age after which an open agent invocation is treated as abandoned */
  staleInvocationMs: number
}

export function createGateController(options: GateControllerOptions): GateController {
  return new GateControllerImpl(options)
}
