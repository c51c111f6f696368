import { describe, it, expect } from 'vitest'
import { IllegalTransitionError } from '../../../core/errors.js'
import { gateForEntryStatus, predecessorOf } from '../gates.js'
import { assertTransition, canTransition, cumulativeOperations, syncPlanFor } from '../state-graph.js'

describe('state graph', () => {
  it('allows the confirmed ungated edges', () => {
    expect(canTransition('Draft', 'RequirementsReview')).toBe(true)
    expect(canTransition('ReadyForImplementation', 'InProgress')).toBe(true)
  })

  it('allows each gate to approve, ask for revision and resume', () => {
    expect(canTransition('TechnicalReview', 'SplitEvaluation')).toBe(true)
    expect(canTransition('TechnicalReview', 'NeedsRevision')).toBe(true)
    expect(canTransition('NeedsRevision', 'TechnicalReview')).toBe(true)
  })

  it('does not skip forward states', () => {
    expect(canTransition('Draft', 'TechnicalReview')).toBe(false)
    expect(canTransition('InProgress', 'Done')).toBe(false)
  })

  it('blocks from active states only', () => {
    expect(canTransition('InReview', 'Blocked')).toBe(true)
    expect(canTransition('NeedsRevision', 'Blocked')).toBe(true)
    expect(canTransition('Done', 'Blocked')).toBe(false)
    expect(canTransition('Archived', 'Blocked')).toBe(false)
  })

  it('archives from Done, Blocked and Draft', () => {
    expect(canTransition('Done', 'Archived')).toBe(true)
    expect(canTransition('Blocked', 'Archived')).toBe(true)
    expect(canTransition('Draft', 'Archived')).toBe(true)
    expect(canTransition('InProgress', 'Archived')).toBe(false)
  })

  it('throws IllegalTransitionError for a missing edge', () => {
    expect(() => assertTransition('task-1', 'Draft', 'Done')).toThrow(IllegalTransitionError)
    expect(() => assertTransition('task-1', 'Draft', 'Done')).toThrow('Illegal transition for task task-1: Draft -> Done')
  })
})

describe('gates', () => {
  it('maps entry statuses to gates', () => {
    expect(gateForEntryStatus('InReview')?.id).toBe('code_review')
    expect(gateForEntryStatus('Draft')).toBeUndefined()
  })

  it('knows each gate predecessor', () => {
    expect(predecessorOf('requirements')).toBeNull()
    expect(predecessorOf('implementation')).toBe('split_evaluation')
  })
})

describe('sync plans', () => {
  it('lists the operations implied by entering a status', () => {
    expect(syncPlanFor('ReadyForImplementation')).toEqual(['ensure_issue', 'sync_status'])
    expect(syncPlanFor('Done')).toEqual(['merge_change_request', 'sync_status'])
    expect(syncPlanFor('TechnicalReview')).toEqual([])
  })

  it('accumulates one-off operations along the forward path', () => {
    expect(cumulativeOperations('SplitEvaluation')).toEqual([])
    expect(cumulativeOperations('InReview')).toEqual(['ensure_issue', 'ensure_branch', 'push_branch'])
    expect(cumulativeOperations('Done')).toEqual([
      'ensure_issue',
      'ensure_branch',
      'push_branch',
      'open_change_request',
      'merge_change_request',
    ])
  })

  it('has no cumulative operations for side states', () => {
    expect(cumulativeOperations('Blocked')).toEqual([])
  })
})
