/**
 * Build the read-only TaskContext handed to workers.
 */

import type { GateId } from '../../core/types.js'
import { deepFreeze } from '../../utils/helpers.js'
import type { Task } from '../task-store/types.js'
import type { TaskContext } from './types.js'

/** Changelog entries included in a context */
export const CONTEXT_CHANGELOG_LIMIT = 20

export interface TaskContextOptions {
  gateId?: GateId | null
  instructions?: string | null
}

export function buildTaskContext(task: Task, options: TaskContextOptions = {}): TaskContext {
  // structuredClone so freezing never reaches the caller's aggregate
  const copy = structuredClone(task)
  const context: TaskContext = {
    taskId: copy.id,
    title: copy.title,
    status: copy.status,
    parentId: copy.parentId,
    requirements: copy.requirements,
    testPlan: copy.testPlan,
    steps: copy.steps,
    gatesPassed: copy.gatesPassed,
    recentChangelog: copy.changelog.slice(-CONTEXT_CHANGELOG_LIMIT),
    branchRef: copy.branchRef,
    issueRef: copy.issueRef,
    changeRequestRef: copy.changeRequestRef,
    handover: copy.handover,
    gateId: options.gateId ?? null,
    instructions: options.instructions ?? null,
  }
  return deepFreeze(context)
}
