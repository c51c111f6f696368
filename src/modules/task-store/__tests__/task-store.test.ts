import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import {
  ConcurrentModificationError,
  NoOpenInvocationError,
  TaskInvariantError,
  TaskNotFoundError,
} from '../../../core/errors.js'
import { TypedEventBusImpl } from '../../../core/event-bus.js'
import type { DatabaseWrapper } from '../../../persistence/database.js'
import { createTaskStore } from '../task-store.js'
import type { TaskStore } from '../task-store.js'
import { openTestDatabase } from '../../../../test/helpers/harness.js'

describe('SqliteTaskStore', () => {
  let wrapper: DatabaseWrapper
  let store: TaskStore
  let created: string[]

  beforeEach(() => {
    wrapper = openTestDatabase()
    const eventBus = new TypedEventBusImpl()
    created = []
    eventBus.on('task:created', ({ taskId }) => {
      created.push(taskId)
    })
    store = createTaskStore(wrapper.db, { eventBus })
  })

  afterEach(() => {
    wrapper.close()
  })

  describe('create', () => {
    it('stores a Draft task with pending steps and a creation entry', () => {
      const task = store.create({
        title: '  Nightly export  ',
        requirements: 'Export every night',
        steps: [{ description: 'Dump', acceptanceCriteria: ['file exists'] }, { description: 'Upload' }],
        createdBy: 'alice',
      })

      expect(task.id).toMatch(/^task-/)
      expect(task.title).toBe('Nightly export')
      expect(task.status).toBe('Draft')
      expect(task.version).toBe(1)
      expect(task.steps).toEqual([
        { description: 'Dump', acceptanceCriteria: ['file exists'], completionState: 'pending', evidence: null, splitRef: null },
        { description: 'Upload', acceptanceCriteria: [], completionState: 'pending', evidence: null, splitRef: null },
      ])
      expect(task.changelog).toHaveLength(1)
      expect(task.changelog[0]?.summary).toBe('Task created')
      expect(task.changelog[0]?.actor).toBe('alice')
      expect(created).toEqual([task.id])
    })

    it('rejects an empty title', () => {
      expect(() => store.create({ title: '   ' })).toThrow(TaskInvariantError)
    })

    it('rejects an unknown parent', () => {
      expect(() => store.create({ title: 'Child', parentId: 'task-missing' })).toThrow(TaskNotFoundError)
    })

    it('records the parent of a split child', () => {
      const parent = store.create({ title: 'Parent' })
      const child = store.create({ title: 'Child', parentId: parent.id })

      expect(child.parentId).toBe(parent.id)
      expect(child.changelog[0]?.summary).toBe(`Created from split of ${parent.id}`)
    })
  })

  it('load throws for an unknown id while find returns undefined', () => {
    expect(() => store.load('task-missing')).toThrow('Task not found: task-missing')
    expect(store.find('task-missing')).toBeUndefined()
  })

  describe('save', () => {
    it('writes the aggregate and bumps the version', () => {
      const task = store.create({ title: 'Export' })
      task.status = 'RequirementsReview'

      const saved = store.save(task)

      expect(saved.status).toBe('RequirementsReview')
      expect(saved.version).toBe(2)
    })

    it('rejects a write based on a stale version', () => {
      const task = store.create({ title: 'Export' })
      const first = store.load(task.id)
      const second = store.load(task.id)
      first.status = 'RequirementsReview'
      store.save(first)
      second.status = 'Blocked'

      expect(() => store.save(second)).toThrow(ConcurrentModificationError)
      expect(store.load(task.id).status).toBe('RequirementsReview')
    })

    it('rejects gates passed out of order', () => {
      const task = store.create({ title: 'Export' })
      task.gatesPassed = ['test_plan']

      expect(() => store.save(task)).toThrow('is not a prefix of the gate order')
    })

    it('refuses to change a reference that is already set', () => {
      const task = store.create({ title: 'Export' })
      store.setRef(task.id, 'branchRef', 'task/a')
      const loaded = store.load(task.id)
      loaded.branchRef = 'task/b'

      expect(() => store.save(loaded)).toThrow(`branchRef of task ${task.id} is write-once`)
    })
  })

  describe('setRef', () => {
    it('sets a reference once and accepts the same value again', () => {
      const task = store.create({ title: 'Export' })

      store.setRef(task.id, 'issueRef', 'https://issues.example.test/1')
      const again = store.setRef(task.id, 'issueRef', 'https://issues.example.test/1')

      expect(again.issueRef).toBe('https://issues.example.test/1')
    })

    it('throws when a different value is written', () => {
      const task = store.create({ title: 'Export' })
      store.setRef(task.id, 'issueRef', 'https://issues.example.test/1')

      expect(() => store.setRef(task.id, 'issueRef', 'https://issues.example.test/2')).toThrow(TaskInvariantError)
    })
  })

  describe('updateStep', () => {
    it('updates state and evidence and bumps the version', () => {
      const task = store.create({ title: 'Export', steps: [{ description: 'Dump' }] })

      const updated = store.updateStep(task.id, 0, 'done', 'dump.sql')

      expect(updated.steps[0]?.completionState).toBe('done')
      expect(updated.steps[0]?.evidence).toBe('dump.sql')
      expect(updated.version).toBe(2)
    })

    it('throws for a step that does not exist', () => {
      const task = store.create({ title: 'Export' })

      expect(() => store.updateStep(task.id, 3, 'done')).toThrow(`Task ${task.id} has no step 3`)
    })
  })

  it('replaceSteps checks the expected version', () => {
    const task = store.create({ title: 'Export', steps: [{ description: 'Dump' }] })

    expect(() => store.replaceSteps(task.id, [], 7)).toThrow(ConcurrentModificationError)
    expect(store.replaceSteps(task.id, [], 1).steps).toEqual([])
  })

  it('setHandover stores the note', () => {
    const task = store.create({ title: 'Export' })
    const note = {
      author: 'alice',
      summary: 'Half done',
      nextSteps: ['upload'],
      openQuestions: [],
      createdAt: '2026-03-01T12:00:00.000Z',
    }

    expect(store.setHandover(task.id, note).handover).toEqual(note)
  })

  it('appendChangelog keeps entries in order', () => {
    const task = store.create({ title: 'Export' })
    store.appendChangelog(task.id, { component: 'test', summary: 'one', effect: '', actor: 'alice' })
    store.appendChangelog(task.id, { component: 'test', summary: 'two', effect: '', actor: 'alice' })

    expect(store.load(task.id).changelog.map((e) => e.summary)).toEqual(['Task created', 'one', 'two'])
  })

  it('transaction rolls back every write when one throws', () => {
    const task = store.create({ title: 'Export' })

    expect(() =>
      store.transaction(() => {
        store.appendChangelog(task.id, { component: 'test', summary: 'lost', effect: '', actor: 'alice' })
        throw new Error('boom')
      }),
    ).toThrow('boom')
    expect(store.load(task.id).changelog).toHaveLength(1)
  })

  describe('invocations', () => {
    it('snapshots the task and records a verdict once', () => {
      const task = store.create({ title: 'Export', requirements: 'Nightly' })
      const invocation = store.createInvocation(task, 'technical_review', 'planner-reviewer')

      expect(invocation.state).toBe('open')
      expect(invocation.inputSnapshot.requirements).toBe('Nightly')

      const decided = store.decideInvocation(invocation.id, { verdict: 'Approved', artifacts: { plan: 'ok' } })
      expect(decided.state).toBe('decided')
      expect(decided.artifacts).toEqual({ plan: 'ok' })

      expect(() => store.decideInvocation(invocation.id, { verdict: 'Rejected' })).toThrow(NoOpenInvocationError)
    })

    it('abandons only open invocations', () => {
      const task = store.create({ title: 'Export' })
      const invocation = store.createInvocation(task, 'technical_review', 'planner-reviewer')

      expect(store.abandonInvocation(invocation.id, 'blocked')).toBe(true)
      expect(store.abandonInvocation(invocation.id, 'blocked')).toBe(false)
      expect(store.getInvocation(invocation.id)?.notes).toBe('blocked')
    })

    it('lists invocations per gate', () => {
      const task = store.create({ title: 'Export' })
      store.createInvocation(task, 'requirements', null)
      store.createInvocation(task, 'technical_review', 'planner-reviewer')

      expect(store.listInvocations(task.id).map((i) => i.gateId)).toEqual(['requirements', 'technical_review'])
      expect(store.listInvocations(task.id, 'requirements')).toHaveLength(1)
    })
  })

  it('list skips archived tasks unless asked', () => {
    const kept = store.create({ title: 'Kept' })
    const archived = store.create({ title: 'Gone' })
    archived.status = 'Archived'
    store.save(archived)

    expect(store.list().map((t) => t.id)).toEqual([kept.id])
    expect(store.list({ includeArchived: true }).map((t) => t.id)).toEqual([kept.id, archived.id])
  })
})
