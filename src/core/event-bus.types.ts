/**
 * LifecycleEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "gate:decided", "sync:failed")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { AgentName, GateId, InvocationId, TaskId, TaskStatus, Verdict } from './types.js'

/**
 * Complete typed map of all events emitted on the lifecycle event bus.
 * Use `keyof LifecycleEvents` to constrain event keys.
 */
export interface LifecycleEvents {
  // -------------------------------------------------------------------------
  // Task events
  // -------------------------------------------------------------------------

  /** A task record was created in the store */
  'task:created': { taskId: TaskId; title: string; parentId: TaskId | null }

  /** The gate controller moved a task to a new status */
  'task:status-changed': { taskId: TaskId; from: TaskStatus; to: TaskStatus; reason: string }

  /** The split-evaluation agent broke a task into children */
  'task:split': { taskId: TaskId; childTaskIds: TaskId[] }

  // -------------------------------------------------------------------------
  // Gate events
  // -------------------------------------------------------------------------

  /** A gate invocation was opened */
  'gate:entered': {
    taskId: TaskId
    gateId: GateId
    invocationId: InvocationId
    agent: AgentName | null
  }

  /** A gate invocation received its verdict */
  'gate:decided': {
    taskId: TaskId
    gateId: GateId
    invocationId: InvocationId
    verdict: Verdict
    notes: string | null
  }

  /** A gate exceeded its revision limit */
  'gate:stuck': { taskId: TaskId; gateId: GateId; revisions: number }

  /** An open invocation was abandoned (block or stale recovery) */
  'gate:abandoned': { taskId: TaskId; gateId: GateId; invocationId: InvocationId; reason: string }

  // -------------------------------------------------------------------------
  // Dispatch events
  // -------------------------------------------------------------------------

  /** A sub-agent dispatch started */
  'dispatch:started': { taskId: TaskId; agent: AgentName }

  /** A sub-agent dispatch failed (timeout, transport, agent or output error) */
  'dispatch:failed': { taskId: TaskId; agent: AgentName; kind: string; message: string }

  // -------------------------------------------------------------------------
  // External sync events
  // -------------------------------------------------------------------------

  /** An external system call succeeded (or was already satisfied) */
  'sync:succeeded': { taskId: TaskId; system: string; operation: string; detail: string }

  /** An external system call failed or timed out */
  'sync:failed': {
    taskId: TaskId
    system: string
    operation: string
    detail: string
    error: string
  }
}
