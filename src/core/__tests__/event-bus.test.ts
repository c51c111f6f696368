/**
 * Unit tests for TypedEventBus.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { LifecycleEvents } from '../event-bus.types.js'

function makeHandler<K extends keyof LifecycleEvents>(_event: K): (payload: LifecycleEvents[K]) => void {
  return vi.fn()
}

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes the handler with the exact payload emitted', () => {
    const handler = makeHandler('task:status-changed')
    bus.on('task:status-changed', handler)

    const payload: LifecycleEvents['task:status-changed'] = {
      taskId: 'task-1',
      from: 'TechnicalReview',
      to: 'SplitEvaluation',
      reason: 'Gate technical_review: Approved',
    }
    bus.emit('task:status-changed', payload)

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith(payload)
  })

  it('does not invoke a handler for a different event', () => {
    const handler = makeHandler('gate:stuck')
    bus.on('gate:stuck', handler)

    bus.emit('gate:decided', {
      taskId: 'task-1',
      gateId: 'technical_review',
      invocationId: 'inv-1',
      verdict: 'NeedsRevision',
      notes: null,
    })

    expect(handler).not.toHaveBeenCalled()
  })

  it('off() removes only the given handler', () => {
    const handlerA = makeHandler('task:split')
    const handlerB = makeHandler('task:split')
    bus.on('task:split', handlerA)
    bus.on('task:split', handlerB)

    bus.off('task:split', handlerA)
    bus.emit('task:split', { taskId: 'task-1', childTaskIds: ['task-2', 'task-3'] })

    expect(handlerA).not.toHaveBeenCalled()
    expect(handlerB).toHaveBeenCalledOnce()
  })

  it('off() is a no-op for a handler that was never registered', () => {
    expect(() => bus.off('dispatch:started', makeHandler('dispatch:started'))).not.toThrow()
  })

  it('invokes handlers in registration order before emit() returns', () => {
    const order: number[] = []
    bus.on('dispatch:started', () => order.push(1))
    bus.on('dispatch:started', () => order.push(2))

    bus.emit('dispatch:started', { taskId: 'task-1', agent: 'validator' })

    expect(order).toEqual([1, 2])
  })
})

describe('createEventBus', () => {
  it('returns a working bus', () => {
    const bus = createEventBus()
    const handler = vi.fn()
    bus.on('sync:succeeded', handler)

    bus.emit('sync:succeeded', { taskId: 'task-x', system: 'issue_tracker', operation: 'sync_status', detail: 'Done' })

    expect(handler).toHaveBeenCalledWith({
      taskId: 'task-x',
      system: 'issue_tracker',
      operation: 'sync_status',
      detail: 'Done',
    })
  })
})
