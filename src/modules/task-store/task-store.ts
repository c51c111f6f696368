/**
 * TaskStore: durable storage for Task aggregates and their gate invocations.
 *
 * Whole-aggregate writes go through `save()`, guarded by the task's
 * `version`. Changelog appends and reference writes are append-only or
 * write-once and therefore do not take part in the version check.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { AgentName, GateId, InvocationId, StepState, TaskId } from '../../core/types.js'
import { SqliteTaskStore } from './task-store-impl.js'
import type {
  ChangelogEntry,
  ExternalRefField,
  GateInvocation,
  HandoverNote,
  InvocationDecision,
  NewChangelogEntry,
  Step,
  Task,
  TaskListFilter,
  TaskSpec,
} from './types.js'

export interface TaskStore {
  /** Create a Draft task (and its steps) and record the creation in the changelog */
  create(spec: TaskSpec): Task

  /** Load a task or throw TaskNotFoundError */
  load(taskId: TaskId): Task

  find(taskId: TaskId): Task | undefined

  list(filter?: TaskListFilter): Task[]

  /**
   * Overwrite the task's state and steps. Throws ConcurrentModificationError
   * when the stored version differs from `task.version`. Returns the stored
   * task with its new version.
   */
  save(task: Task): Task

  appendChangelog(taskId: TaskId, entry: NewChangelogEntry): ChangelogEntry

  updateStep(taskId: TaskId, stepIndex: number, state: StepState, evidence?: string | null): Task

  /** Rewrite the task's steps, e.g. after a split. Bumps the version. */
  replaceSteps(taskId: TaskId, steps: Step[], expectedVersion?: number): Task

  /** Set a write-once external reference; a different existing value is an invariant error */
  setRef(taskId: TaskId, field: ExternalRefField, value: string): Task

  setHandover(taskId: TaskId, note: HandoverNote): Task

  /**
   * Run several store writes atomically. Nested calls join the outer
   * transaction.
   */
  transaction<T>(fn: () => T): T

  // -- gate invocations ------------------------------------------------------

  createInvocation(task: Task, gateId: GateId, agent: AgentName | null): GateInvocation

  getInvocation(invocationId: InvocationId): GateInvocation | undefined

  /** Record a verdict; throws NoOpenInvocationError if the invocation is not open */
  decideInvocation(invocationId: InvocationId, decision: InvocationDecision): GateInvocation

  /** Close an open invocation without a verdict. Returns false when it was not open. */
  abandonInvocation(invocationId: InvocationId, reason: string): boolean

  listInvocations(taskId: TaskId, gateId?: GateId): GateInvocation[]
}

export interface TaskStoreOptions {
  eventBus?: TypedEventBus
}

export function createTaskStore(db: BetterSqlite3Database, options: TaskStoreOptions = {}): TaskStore {
  return new SqliteTaskStore(db, options)
}
