/**
 * Unit tests for ServiceRegistry.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ServiceRegistry } from '../di.js'
import type { BaseService } from '../di.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class TrackedService implements BaseService {
  constructor(
    private readonly _name: string,
    private readonly _calls: string[],
    private readonly _failures: { init?: unknown; stop?: unknown } = {},
  ) {}

  async initialize(): Promise<void> {
    this._calls.push(`init:${this._name}`)
    if (this._failures.init !== undefined) throw this._failures.init
  }

  async shutdown(): Promise<void> {
    this._calls.push(`stop:${this._name}`)
    if (this._failures.stop !== undefined) throw this._failures.stop
  }
}

// ---------------------------------------------------------------------------
// ServiceRegistry tests
// ---------------------------------------------------------------------------

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry
  let calls: string[]

  beforeEach(() => {
    registry = new ServiceRegistry()
    calls = []
  })

  it('lists registered names in order', () => {
    registry.register('database', new TrackedService('database', calls))
    registry.register('cache', new TrackedService('cache', calls))

    expect(registry.serviceNames).toEqual(['database', 'cache'])
    expect(registry.has('cache')).toBe(true)
    expect(registry.has('missing')).toBe(false)
  })

  it('throws on a duplicate name', () => {
    registry.register('database', new TrackedService('database', calls))

    expect(() => registry.register('database', new TrackedService('other', calls))).toThrow(
      'Service "database" is already registered',
    )
  })

  it('initializes in registration order and shuts down in reverse', async () => {
    registry.register('a', new TrackedService('a', calls))
    registry.register('b', new TrackedService('b', calls))
    registry.register('c', new TrackedService('c', calls))

    await registry.initializeAll()
    await registry.shutdownAll()

    expect(calls).toEqual(['init:a', 'init:b', 'init:c', 'stop:c', 'stop:b', 'stop:a'])
  })

  it('shuts down only the services that initialized', async () => {
    registry.register('a', new TrackedService('a', calls))
    registry.register('b', new TrackedService('b', calls, { init: new Error('disk full') }))
    registry.register('c', new TrackedService('c', calls))

    await expect(registry.initializeAll()).rejects.toThrow('disk full')
    await registry.shutdownAll()

    expect(calls).toEqual(['init:a', 'init:b', 'stop:a'])
  })

  it('does not shut a service down twice', async () => {
    registry.register('a', new TrackedService('a', calls))
    await registry.initializeAll()

    await registry.shutdownAll()
    await registry.shutdownAll()

    expect(calls).toEqual(['init:a', 'stop:a'])
  })

  it('stops every service and collects the failures', async () => {
    const errA = new Error('error in A')
    registry.register('a', new TrackedService('a', calls, { stop: errA }))
    registry.register('b', new TrackedService('b', calls))
    registry.register('c', new TrackedService('c', calls, { stop: 'string error' }))
    await registry.initializeAll()

    let thrown: unknown
    try {
      await registry.shutdownAll()
    } catch (err) {
      thrown = err
    }

    expect(calls.slice(3)).toEqual(['stop:c', 'stop:b', 'stop:a'])
    expect(thrown).toBeInstanceOf(AggregateError)
    const errors = thrown instanceof AggregateError ? thrown.errors : []
    expect(errors).toHaveLength(2)
    expect(errors[0]).toEqual(new Error('string error'))
    expect(errors[1]).toBe(errA)
  })
})
