/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import {
  AgentCommandSchema,
  PartialTaskgateConfigSchema,
  TaskgateConfigSchema,
} from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

describe('TaskgateConfigSchema', () => {
  it('accepts the built-in defaults', () => {
    expect(TaskgateConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('rejects max_revisions below 1', () => {
    const result = TaskgateConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      gates: { max_revisions: 0 },
    })
    expect(result.success).toBe(false)
  })

  it('rejects unknown top-level sections', () => {
    const result = TaskgateConfigSchema.safeParse({ ...DEFAULT_CONFIG, providers: {} })
    expect(result.success).toBe(false)
  })
})

describe('AgentCommandSchema', () => {
  it('defaults args to an empty list', () => {
    expect(AgentCommandSchema.parse({ command: 'review' })).toEqual({ command: 'review', args: [] })
  })

  it('rejects a non-positive timeout', () => {
    expect(AgentCommandSchema.safeParse({ command: 'review', timeout_ms: 0 }).success).toBe(false)
  })
})

describe('PartialTaskgateConfigSchema', () => {
  it('accepts a sparse document', () => {
    const result = PartialTaskgateConfigSchema.safeParse({
      sync: { issue_tracker: { kind: 'disabled' } },
    })
    expect(result.success).toBe(true)
  })

  it('rejects an unknown sync system kind', () => {
    const result = PartialTaskgateConfigSchema.safeParse({
      sync: { version_control: { kind: 'svn' } },
    })
    expect(result.success).toBe(false)
  })
})
