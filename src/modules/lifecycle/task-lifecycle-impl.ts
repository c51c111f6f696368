/**
 * TaskLifecycleImpl: sequences gate controller calls per command.
 */

import { TaskInvariantError } from '../../core/errors.js'
import type { GateId, TaskId } from '../../core/types.js'
import { nowIso } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { buildTaskContext } from '../agent-dispatch/task-context.js'
import type { Dispatcher } from '../agent-dispatch/types.js'
import type { ExternalSync, SyncResult } from '../external-sync/types.js'
import type { GateController } from '../gate-controller/gate-controller.js'
import { getGate, isHumanGate } from '../gate-controller/gates.js'
import { renderHandoverNote } from '../task-store/task-document.js'
import type { TaskStore } from '../task-store/task-store.js'
import type { Task, TaskSpec } from '../task-store/types.js'
import type { Confirmer } from './confirmer.js'
import type {
  HandoverReport,
  LifecycleReport,
  NewHandoverNote,
  ProgressReport,
  StageReport,
  StepProgress,
  TaskLifecycle,
  TaskLifecycleOptions,
} from './task-lifecycle.js'

const logger = createLogger('lifecycle')

const PLAN_GATES: readonly GateId[] = ['requirements', 'test_plan', 'technical_review', 'split_evaluation']
const REVIEW_GATES: readonly GateId[] = ['implementation', 'code_review']

/** Whether the start edge has been taken (a blocked task counts where it was blocked) */
function hasStarted(task: Task): boolean {
  const at = task.status === 'Blocked' ? task.blockedFrom : task.status
  return at !== 'ReadyForImplementation' && task.gatesPassed.includes('split_evaluation')
}

function describeProgress(task: Task, progress: StepProgress[]): string {
  return progress
    .map((p) => {
      const step = task.steps[p.stepIndex]
      const evidence = p.evidence !== undefined && p.evidence !== null ? ` (evidence: ${p.evidence})` : ''
      return `Step ${String(p.stepIndex + 1)} "${step?.description ?? '?'}": ${p.state}${evidence}`
    })
    .join('\n')
}

export class TaskLifecycleImpl implements TaskLifecycle {
  private readonly _store: TaskStore
  private readonly _controller: GateController
  private readonly _dispatcher: Dispatcher
  private readonly _sync: ExternalSync
  private readonly _confirmer: Confirmer

  constructor(options: TaskLifecycleOptions) {
    this._store = options.store
    this._controller = options.controller
    this._dispatcher = options.dispatcher
    this._sync = options.sync
    this._confirmer = options.confirmer
  }

  async createTask(spec: TaskSpec, actor: string): Promise<LifecycleReport> {
    const created = this._store.create({ ...spec, createdBy: spec.createdBy ?? actor })
    const { task, syncResults } = await this._controller.submit(created.id, actor)
    return { task, stages: [{ stage: 'submit', result: 'passed', notes: null }], syncResults }
  }

  async reviewPlan(taskId: TaskId, actor: string): Promise<LifecycleReport> {
    const task = this._store.load(taskId)
    if (task.status !== 'Draft') {
      return this._runGates(taskId, PLAN_GATES, actor)
    }

    // Child tasks from a split start in Draft
    if (!(await this._confirmer.confirm(`Submit "${task.title}" (${task.id}) for requirements review?`))) {
      return { task, stages: [{ stage: 'submit', result: 'declined', notes: null }], syncResults: [] }
    }
    const submitted = await this._controller.submit(taskId, actor)
    const rest = await this._runGates(taskId, PLAN_GATES, actor)
    return {
      task: rest.task,
      stages: [{ stage: 'submit', result: 'passed', notes: null }, ...rest.stages],
      syncResults: [...submitted.syncResults, ...rest.syncResults],
    }
  }

  async startImplementation(taskId: TaskId, actor: string): Promise<LifecycleReport> {
    const task = this._store.load(taskId)
    if (hasStarted(task)) {
      return { task, stages: [{ stage: 'start', result: 'already_passed', notes: null }], syncResults: [] }
    }
    if (!(await this._confirmer.confirm(`Start implementation of "${task.title}" (${task.id})?`))) {
      return { task, stages: [{ stage: 'start', result: 'declined', notes: null }], syncResults: [] }
    }
    const started = await this._controller.start(taskId, actor)
    return {
      task: started.task,
      stages: [{ stage: 'start', result: 'passed', notes: null }],
      syncResults: started.syncResults,
    }
  }

  async continueImplementation(taskId: TaskId, progress: StepProgress[], actor: string): Promise<ProgressReport> {
    const task = this._store.load(taskId)
    const implementing =
      task.status === 'InProgress' || (task.status === 'NeedsRevision' && task.revisionGate === 'implementation')
    if (!implementing) {
      throw new TaskInvariantError(`Task ${taskId} is not being implemented (status ${task.status})`, {
        taskId,
        status: task.status,
      })
    }

    const unknown = progress.find(
      (p) => !Number.isInteger(p.stepIndex) || p.stepIndex < 0 || p.stepIndex >= task.steps.length,
    )
    if (unknown !== undefined) {
      throw new TaskInvariantError(`Task ${taskId} has no step ${String(unknown.stepIndex)}`, {
        taskId,
        stepIndex: unknown.stepIndex,
      })
    }

    this._store.transaction(() => {
      for (const p of progress) {
        this._store.updateStep(taskId, p.stepIndex, p.state, p.evidence ?? null)
      }
      this._store.appendChangelog(taskId, {
        component: 'progress',
        summary: `Recorded progress on ${String(progress.length)} step(s)`,
        effect: progress.map((p) => `step ${String(p.stepIndex + 1)} ${p.state}`).join(', '),
        actor,
      })
    })
    const updated = this._store.load(taskId)

    const changelog = await this._dispatcher.dispatch(
      'changelog-writer',
      buildTaskContext(updated, { instructions: describeProgress(updated, progress) }),
    )
    if (changelog.error !== null) {
      logger.warn({ taskId, error: changelog.error.message }, 'Changelog writer failed; step progress is recorded')
    }
    return { task: this._store.load(taskId), changelog }
  }

  async prepareHandover(taskId: TaskId, note: NewHandoverNote): Promise<HandoverReport> {
    const stored = { ...note, createdAt: nowIso() }
    const task = this._store.setHandover(taskId, stored)
    this._store.appendChangelog(taskId, {
      component: 'handover',
      summary: 'Handover note written',
      effect: note.summary,
      actor: note.author,
    })

    const comment =
      task.issueRef !== null
        ? await this._sync.postComment(taskId, `Handover\n\n${renderHandoverNote(stored)}`, { triggeredBy: 'operator' })
        : null
    return { task: this._store.load(taskId), comment }
  }

  startReview(taskId: TaskId, actor: string): Promise<LifecycleReport> {
    return this._runGates(taskId, REVIEW_GATES, actor)
  }

  updateDocumentation(taskId: TaskId, actor: string): Promise<LifecycleReport> {
    return this._runGates(taskId, ['documentation'], actor)
  }

  merge(taskId: TaskId, actor: string): Promise<LifecycleReport> {
    return this._runGates(taskId, ['merge'], actor)
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async _runGates(taskId: TaskId, gates: readonly GateId[], actor: string): Promise<LifecycleReport> {
    const stages: StageReport[] = []
    const syncResults: SyncResult[] = []

    for (const gateId of gates) {
      const task = this._store.load(taskId)
      if (task.gatesPassed.includes(gateId)) {
        stages.push({ stage: gateId, result: 'already_passed', notes: null })
        continue
      }

      if (isHumanGate(gateId)) {
        const question = `${getGate(gateId).description} for "${task.title}" (${task.id})?`
        if (!(await this._confirmer.confirm(question))) {
          stages.push({ stage: gateId, result: 'declined', notes: null })
          break
        }
        const confirmed = await this._controller.confirmHumanGate(taskId, gateId, actor)
        syncResults.push(...confirmed.syncResults)
        stages.push({ stage: gateId, result: 'passed', notes: null })
        continue
      }

      const { invocation, syncResults: gateSync } = await this._controller.enterGate(taskId, gateId, { actor })
      syncResults.push(...gateSync)
      const notes = invocation.notes
      if (invocation.verdict === 'Approved') {
        stages.push({ stage: gateId, result: 'passed', notes })
        continue
      }
      stages.push({
        stage: gateId,
        result:
          invocation.verdict === 'NeedsRevision'
            ? 'needs_revision'
            : invocation.verdict === 'Rejected'
              ? 'rejected'
              : 'abandoned',
        notes,
      })
      break
    }

    return { task: this._store.load(taskId), stages, syncResults }
  }
}
