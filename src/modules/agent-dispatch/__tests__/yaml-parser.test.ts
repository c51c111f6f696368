/**
 * Tests for yaml-parser.ts: result block extraction and parsing for worker output
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { WorkerOutputSchema } from '../artifact-schemas.js'
import { extractYamlBlock, parseYamlResult } from '../yaml-parser.js'

// ---------------------------------------------------------------------------
// extractYamlBlock tests
// ---------------------------------------------------------------------------

describe('extractYamlBlock', () => {
  it('returns null for empty output', () => {
    expect(extractYamlBlock('')).toBeNull()
    expect(extractYamlBlock('   ')).toBeNull()
  })

  it('extracts from a fenced yaml block', () => {
    const output = [
      'Reviewed the plan against the requirements.',
      '',
      '```yaml',
      'verdict: Approved',
      'notes: looks complete',
      '```',
      '',
    ].join('\n')
    expect(extractYamlBlock(output)).toBe('verdict: Approved\nnotes: looks complete')
  })

  it('extracts from a fenced block without a language tag', () => {
    const output = ['Done.', '```', 'verdict: Rejected', '```'].join('\n')
    expect(extractYamlBlock(output)).toBe('verdict: Rejected')
  })

  it('takes the LAST fenced block carrying the anchor', () => {
    const output = [
      '```yaml',
      'verdict: NeedsRevision',
      '```',
      'Second thoughts.',
      '```yaml',
      'verdict: Approved',
      '```',
    ].join('\n')
    expect(extractYamlBlock(output)).toBe('verdict: Approved')
  })

  it('ignores fenced blocks without the anchor and falls back to unfenced lines', () => {
    const output = [
      'Here is some code:',
      '```typescript',
      'const x = 42',
      '```',
      '',
      'verdict: Approved',
      'artifacts:',
      '  unmet_criteria: []',
    ].join('\n')
    expect(extractYamlBlock(output)).toBe('verdict: Approved\nartifacts:\n  unmet_criteria: []')
  })

  it('starts an unfenced block at the last anchor line', () => {
    const output = ['verdict: NeedsRevision', 'thinking more...', 'verdict: Approved', 'notes: ok'].join('\n')
    expect(extractYamlBlock(output)).toBe('verdict: Approved\nnotes: ok')
  })

  it('returns null when the output has no anchor', () => {
    expect(extractYamlBlock('plain narrative\nwith no result block\n')).toBeNull()
  })
})

// ---------------------------------------------------------------------------
// parseYamlResult tests
// ---------------------------------------------------------------------------

describe('parseYamlResult', () => {
  it('validates a worker result against the output schema', () => {
    const result = parseYamlResult('verdict: NeedsRevision\nnotes: missing edge cases', WorkerOutputSchema)
    expect(result).toEqual({ parsed: { verdict: 'NeedsRevision', notes: 'missing edge cases' }, error: null })
  })

  it('returns a parse error for malformed YAML', () => {
    const result = parseYamlResult('verdict: [unclosed', WorkerOutputSchema)
    expect(result.parsed).toBeNull()
    expect(result.error).toMatch(/^YAML parse error: /)
  })

  it('returns an error for YAML that parses to null', () => {
    expect(parseYamlResult('~', WorkerOutputSchema)).toEqual({
      parsed: null,
      error: 'YAML parsed to null or undefined',
    })
  })

  it('reports schema failures with their paths', () => {
    const schema = z.object({ verdict: z.enum(['Approved']), count: z.number() })
    const result = parseYamlResult('verdict: Approved\ncount: many', schema)
    expect(result.parsed).toBeNull()
    expect(result.error).toBe('Schema validation error: count: Expected number, received string')
  })

  it('rejects verdicts outside the three known values', () => {
    const result = parseYamlResult('verdict: approved', WorkerOutputSchema)
    expect(result.parsed).toBeNull()
    expect(result.error).toContain('verdict:')
  })
})
