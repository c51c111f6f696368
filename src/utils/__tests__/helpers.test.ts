import { describe, it, expect } from 'vitest'
import {
  generateId,
  formatDuration,
  isPlainObject,
  canonicalJson,
  hashPayload,
  deepFreeze,
  withTimeout,
  TimeoutError,
} from '../helpers.js'

describe('generateId', () => {
  it('returns distinct ids', () => {
    expect(generateId()).not.toBe(generateId())
  })

  it('applies a prefix', () => {
    expect(generateId('task')).toMatch(/^task-[0-9a-f-]{36}$/)
  })
})

describe('formatDuration', () => {
  it('formats milliseconds, seconds and minutes', () => {
    expect(formatDuration(500)).toBe('500ms')
    expect(formatDuration(1500)).toBe('1.5s')
    expect(formatDuration(125000)).toBe('2m 5s')
  })
})

describe('isPlainObject', () => {
  it('accepts object literals only', () => {
    expect(isPlainObject({ a: 1 })).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(null)).toBe(false)
    expect(isPlainObject(new Date())).toBe(false)
  })
})

describe('canonicalJson / hashPayload', () => {
  it('sorts keys recursively', () => {
    expect(canonicalJson({ b: 1, a: { d: [{ y: 1, x: 2 }], c: 0 } })).toBe('{"a":{"c":0,"d":[{"x":2,"y":1}]},"b":1}')
  })

  it('hashes equal payloads identically regardless of key order', () => {
    expect(hashPayload({ a: 1, b: 2 })).toBe(hashPayload({ b: 2, a: 1 }))
    expect(hashPayload({ a: 1 })).not.toBe(hashPayload({ a: 2 }))
    expect(hashPayload({ a: 1 })).toMatch(/^[0-9a-f]{64}$/)
  })
})

describe('deepFreeze', () => {
  it('freezes nested objects', () => {
    const value = deepFreeze({ outer: { inner: [1, 2] } })
    expect(Object.isFrozen(value)).toBe(true)
    expect(Object.isFrozen(value.outer)).toBe(true)
    expect(Object.isFrozen(value.outer.inner)).toBe(true)
  })
})

describe('withTimeout', () => {
  it('resolves when the operation finishes first', async () => {
    await expect(withTimeout('fast', 100, () => Promise.resolve(7))).resolves.toBe(7)
  })

  it('rejects with TimeoutError and aborts the signal', async () => {
    let seen: AbortSignal | undefined
    const pending = withTimeout('slow', 20, (signal) => {
      seen = signal
      return new Promise<never>(() => undefined)
    })
    await expect(pending).rejects.toThrow(TimeoutError)
    await expect(withTimeout('slow', 20, () => new Promise<never>(() => undefined))).rejects.toThrow(
      'slow timed out after 20ms'
    )
    expect(seen?.aborted).toBe(true)
  })
})
