/**
 * TaskLifecycle: one method per operator command.
 *
 * Commands are idempotent: stages already passed are reported as such and
 * cause no side effects. A command stops at the first stage that does not
 * pass (declined confirmation, NeedsRevision, Rejected).
 */

import type { GateId, StepState, TaskId } from '../../core/types.js'
import type { DispatchOutcome, Dispatcher } from '../agent-dispatch/types.js'
import type { ExternalSync, SyncResult } from '../external-sync/types.js'
import type { GateController } from '../gate-controller/gate-controller.js'
import type { TaskStore } from '../task-store/task-store.js'
import type { HandoverNote, Task, TaskSpec } from '../task-store/types.js'
import type { Confirmer } from './confirmer.js'
import { TaskLifecycleImpl } from './task-lifecycle-impl.js'

export type Stage = GateId | 'submit' | 'start'

export type StageResult =
  | 'passed'
  | 'already_passed'
  | 'declined'
  | 'needs_revision'
  | 'rejected'
  /** The invocation was closed (e.g. by a block) before its verdict arrived */
  | 'abandoned'

export interface StageReport {
  stage: Stage
  result: StageResult
  notes: string | null
}

export interface LifecycleReport {
  task: Task
  stages: StageReport[]
  syncResults: SyncResult[]
}

export interface StepProgress {
  stepIndex: number
  state: StepState
  evidence?: string | null
}

export interface ProgressReport {
  task: Task
  /** The changelog-writer run; its failure does not undo the recorded progress */
  changelog: DispatchOutcome
}

export type NewHandoverNote = Omit<HandoverNote, 'createdAt'>

export interface HandoverReport {
  task: Task
  /** null when the task has no issue to comment on */
  comment: SyncResult | null
}

export interface TaskLifecycle {
  /** Create a Draft task and submit it for requirements review */
  createTask(spec: TaskSpec, actor: string): Promise<LifecycleReport>

  /** requirements, test_plan, technical_review and split_evaluation */
  reviewPlan(taskId: TaskId, actor: string): Promise<LifecycleReport>

  /** The confirmed start edge; creates the branch */
  startImplementation(taskId: TaskId, actor: string): Promise<LifecycleReport>

  continueImplementation(taskId: TaskId, progress: StepProgress[], actor: string): Promise<ProgressReport>

  prepareHandover(taskId: TaskId, note: NewHandoverNote): Promise<HandoverReport>

  /** implementation and code_review */
  startReview(taskId: TaskId, actor: string): Promise<LifecycleReport>

  updateDocumentation(taskId: TaskId, actor: string): Promise<LifecycleReport>

  merge(taskId: TaskId, actor: string): Promise<LifecycleReport>
}

export interface TaskLifecycleOptions {
  store: TaskStore
  controller: GateController
  dispatcher: Dispatcher
  sync: ExternalSync
  confirmer: Confirmer
}

export function createTaskLifecycle(options: TaskLifecycleOptions): TaskLifecycle {
  return new TaskLifecycleImpl(options)
}
