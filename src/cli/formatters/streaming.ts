/**
 * NDJSON event emitter for `--output-format json`.
 *
 * Each line follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { LifecycleEvents } from '../../core/event-bus.types.js'
import type { SyncResult } from '../../modules/external-sync/types.js'
import type { LifecycleReport } from '../../modules/lifecycle/task-lifecycle.js'
import type { Task } from '../../modules/task-store/types.js'

export function emitEvent(event: string, data: object): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

/** A sync result with its error reduced to the message */
export function syncResultToJson(result: SyncResult): Record<string, unknown> {
  return {
    system: result.system,
    operation: result.operation,
    result: result.result,
    ref: result.ref,
    detail: result.detail,
    error: result.error?.message ?? null,
  }
}

/** The fields of a task that describe where it is in the lifecycle */
export function taskStateToJson(task: Task): Record<string, unknown> {
  return {
    id: task.id,
    title: task.title,
    parentId: task.parentId,
    status: task.status,
    gatesPassed: task.gatesPassed,
    revisionCounts: task.revisionCounts,
    revisionGate: task.revisionGate,
    stuckGate: task.stuckGate,
    blockedFrom: task.blockedFrom,
    branchRef: task.branchRef,
    issueRef: task.issueRef,
    changeRequestRef: task.changeRequestRef,
    version: task.version,
    updatedAt: task.updatedAt,
  }
}

export function emitLifecycleReport(command: string, report: LifecycleReport): void {
  emitEvent(`${command}:completed`, {
    task: taskStateToJson(report.task),
    stages: report.stages,
    syncResults: report.syncResults.map(syncResultToJson),
  })
}

/** Bus events forwarded by `--events` */
export const STREAMED_EVENTS = [
  'task:created',
  'task:status-changed',
  'task:split',
  'gate:entered',
  'gate:decided',
  'gate:stuck',
  'gate:abandoned',
  'dispatch:started',
  'dispatch:failed',
  'sync:succeeded',
  'sync:failed',
] as const satisfies readonly (keyof LifecycleEvents)[]

function describePayload(payload: object): string {
  return Object.entries(payload)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ')
}

/**
 * Forward lifecycle events to stdout while a command runs: one NDJSON line
 * per event for json output, one progress line for human output.
 * Returns a function that unsubscribes.
 */
export function streamLifecycleEvents(bus: TypedEventBus, format: 'human' | 'json'): () => void {
  const unsubscribers = STREAMED_EVENTS.map((event) => {
    const handler = (payload: object): void => {
      if (format === 'json') emitEvent(event, payload)
      else process.stdout.write(`  [${event}] ${describePayload(payload)}\n`)
    }
    bus.on(event, handler)
    return () => bus.off(event, handler)
  })
  return () => {
    for (const off of unsubscribers) off()
  }
}
