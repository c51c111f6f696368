/**
 * Error definitions for taskgate
 * Provides structured error hierarchy for all lifecycle operations
 */

import type { GateId, TaskId, TaskStatus } from './types.js'

/** Base error class for all taskgate errors */
export class TaskgateError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'TaskgateError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TaskgateError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** A gate was entered or decided before its predecessor was satisfied */
export class OutOfOrderGateError extends TaskgateError {
  constructor(taskId: TaskId, gateId: GateId, status: TaskStatus, reason: string) {
    super(
      `Gate "${gateId}" cannot be entered for task ${taskId} in status ${status}: ${reason}`,
      'OUT_OF_ORDER_GATE',
      { taskId, gateId, status, reason }
    )
    this.name = 'OutOfOrderGateError'
  }
}

/** A gate exceeded its revision limit and needs a manual override */
export class StuckGateError extends TaskgateError {
  constructor(taskId: TaskId, gateId: GateId, revisions: number, limit: number) {
    super(
      `Gate "${gateId}" for task ${taskId} is stuck after ${String(revisions)} revisions (limit ${String(limit)})`,
      'STUCK_GATE',
      { taskId, gateId, revisions, limit }
    )
    this.name = 'StuckGateError'
  }
}

/** The stored task version no longer matches the version the caller loaded */
export class ConcurrentModificationError extends TaskgateError {
  constructor(taskId: TaskId, expectedVersion: number) {
    super(
      `Task ${taskId} was modified concurrently (expected version ${String(expectedVersion)}); reload and retry`,
      'CONCURRENT_MODIFICATION',
      { taskId, expectedVersion }
    )
    this.name = 'ConcurrentModificationError'
  }
}

/** Kinds of sub-agent dispatch failure */
export type DispatchErrorKind = 'timeout' | 'transport' | 'agent' | 'invalid_output' | 'unknown_agent'

/** A sub-agent dispatch failed; carried in the dispatch outcome, never thrown to the controller */
export class DispatchError extends TaskgateError {
  public readonly kind: DispatchErrorKind

  constructor(agent: string, kind: DispatchErrorKind, message: string) {
    super(`Dispatch to "${agent}" failed (${kind}): ${message}`, 'DISPATCH_ERROR', {
      agent,
      kind,
    })
    this.name = 'DispatchError'
    this.kind = kind
  }
}

/** An external system call failed; recorded for reconciliation, never blocks internal progress */
export class ExternalSyncFailure extends TaskgateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'EXTERNAL_SYNC_FAILURE', context)
    this.name = 'ExternalSyncFailure'
  }
}

/** Error thrown when a task id does not exist in the store */
export class TaskNotFoundError extends TaskgateError {
  constructor(taskId: TaskId) {
    super(`Task not found: ${taskId}`, 'TASK_NOT_FOUND', { taskId })
    this.name = 'TaskNotFoundError'
  }
}

/** Error thrown when a write would break an aggregate invariant */
export class TaskInvariantError extends TaskgateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TASK_INVARIANT', context)
    this.name = 'TaskInvariantError'
  }
}

/** Error thrown when a status edge is not in the state graph */
export class IllegalTransitionError extends TaskgateError {
  constructor(taskId: TaskId, from: TaskStatus, to: TaskStatus) {
    super(`Illegal transition for task ${taskId}: ${from} -> ${to}`, 'ILLEGAL_TRANSITION', {
      taskId,
      from,
      to,
    })
    this.name = 'IllegalTransitionError'
  }
}

/** Error thrown when a verdict is recorded for a gate without an open invocation */
export class NoOpenInvocationError extends TaskgateError {
  constructor(taskId: TaskId, gateId: GateId) {
    super(`No open invocation for gate "${gateId}" on task ${taskId}`, 'NO_OPEN_INVOCATION', {
      taskId,
      gateId,
    })
    this.name = 'NoOpenInvocationError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends TaskgateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends TaskgateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}

/** Error thrown when a task document cannot be parsed */
export class TaskDocumentError extends TaskgateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TASK_DOCUMENT_ERROR', context)
    this.name = 'TaskDocumentError'
  }
}
