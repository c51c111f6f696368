/**
 * End-to-end runs through the wired container with a file-backed database.
 * Each stage opens a fresh container, the way separate CLI invocations do;
 * the fake version control host, tracker and workers persist between them.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { createContainer } from '../../src/core/container-impl.js'
import type { Container } from '../../src/core/container.js'
import { DEFAULT_CONFIG } from '../../src/modules/config/defaults.js'
import { WorkerRegistry } from '../../src/modules/agent-dispatch/worker-registry.js'
import {
  FakeIssueTracker,
  FakeVersionControl,
  RecordingConfirmer,
  ScriptedWorker,
  approve,
  revise,
} from '../helpers/fakes.js'

describe('task lifecycle (integration)', () => {
  let root: string
  let vcs: FakeVersionControl
  let tracker: FakeIssueTracker
  let confirmer: RecordingConfirmer
  let workers: WorkerRegistry

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'taskgate-e2e-'))
    vcs = new FakeVersionControl()
    tracker = new FakeIssueTracker()
    confirmer = new RecordingConfirmer(true)
    workers = new WorkerRegistry()
    workers.register(new ScriptedWorker('changelog-writer', [approve({ entries: [] })]))
    workers.register(new ScriptedWorker('validator', [approve({ unmet_criteria: [] })]))
    workers.register(new ScriptedWorker('pr-creator', [approve({ title: 'Nightly export', body: 'Adds the job' })]))
    workers.register(new ScriptedWorker('doc-updater', [approve({ updated_documents: ['docs/export.md'] })]))
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  async function withContainer<T>(fn: (container: Container) => Promise<T>): Promise<T> {
    const container = await createContainer({
      config: DEFAULT_CONFIG,
      projectRoot: root,
      databasePath: join(root, 'state.db'),
      confirmer,
      versionControl: vcs,
      issueTracker: tracker,
      workers,
    })
    try {
      return await fn(container)
    } finally {
      await container.shutdown()
    }
  }

  it('takes a task from creation to Done across restarts', async () => {
    workers.register(new ScriptedWorker('planner-reviewer', [revise('Name the bucket'), approve()]))
    workers.register(new ScriptedWorker('splitter', [approve({ children: [] })]))

    const id = await withContainer(async (c) => {
      const report = await c.lifecycle.createTask(
        { title: 'Nightly export', requirements: 'Export every night', steps: [{ description: 'Dump' }] },
        'alice',
      )
      return report.task.id
    })

    const firstPlan = await withContainer((c) => c.lifecycle.reviewPlan(id, 'alice'))
    expect(firstPlan.stages.map((s) => s.result)).toEqual(['passed', 'passed', 'needs_revision'])
    expect(firstPlan.task.status).toBe('NeedsRevision')
    expect(firstPlan.task.revisionCounts).toEqual({ technical_review: 1 })

    const secondPlan = await withContainer((c) => c.lifecycle.reviewPlan(id, 'alice'))
    expect(secondPlan.stages.map((s) => s.result)).toEqual([
      'already_passed',
      'already_passed',
      'passed',
      'passed',
    ])
    expect(secondPlan.task.status).toBe('ReadyForImplementation')

    await withContainer((c) => c.lifecycle.startImplementation(id, 'alice'))
    await withContainer((c) => c.lifecycle.continueImplementation(id, [{ stepIndex: 0, state: 'done', evidence: null }], 'alice'))
    const review = await withContainer((c) => c.lifecycle.startReview(id, 'alice'))
    expect(review.task.status).toBe('DocumentationUpdate')
    await withContainer((c) => c.lifecycle.updateDocumentation(id, 'alice'))
    const merged = await withContainer((c) => c.lifecycle.merge(id, 'alice'))

    expect(merged.task.status).toBe('Done')
    expect(merged.task.gatesPassed).toEqual([
      'requirements',
      'test_plan',
      'technical_review',
      'split_evaluation',
      'implementation',
      'code_review',
      'documentation',
      'merge',
    ])
    expect(merged.task.branchRef).toBe(`task/${id}`)
    expect(tracker.statusOf(merged.task.issueRef)).toBe('Done')
    expect(vcs.pushed).toEqual([`task/${id}`])
    expect(vcs.changeRequests.get('https://git.example.test/pr/1')?.state).toBe('merged')

    expect(confirmer.questions).toEqual([
      `Business requirements signed off for "Nightly export" (${id})?`,
      `Test plan signed off for "Nightly export" (${id})?`,
      `Start implementation of "Nightly export" (${id})?`,
      `Merge confirmed for "Nightly export" (${id})?`,
    ])

    await withContainer(async (c) => {
      expect(c.reconciler.findDrift(id)).toEqual([])
      expect(c.store.listInvocations(id, 'technical_review').map((i) => i.verdict)).toEqual([
        'NeedsRevision',
        'Approved',
      ])
    })
  })

  it('splits a task and plans a child on its own', async () => {
    workers.register(new ScriptedWorker('planner-reviewer', [approve()]))
    workers.register(
      new ScriptedWorker('splitter', [
        approve({
          children: [
            { title: 'Dump tables', steps: [{ description: 'pg_dump' }] },
            { title: 'Upload dumps' },
          ],
        }),
        approve({ children: [] }),
      ]),
    )

    const plan = await withContainer(async (c) => {
      const { task } = await c.lifecycle.createTask(
        { title: 'Nightly export', steps: [{ description: 'Dump' }, { description: 'Upload' }] },
        'alice',
      )
      return c.lifecycle.reviewPlan(task.id, 'alice')
    })

    const parent = plan.task
    expect(parent.status).toBe('ReadyForImplementation')
    const childIds = parent.steps.map((s) => s.splitRef?.childTaskId ?? null)
    expect(parent.steps.map((s) => s.description)).toEqual(['Dump tables', 'Upload dumps'])
    expect(childIds.every((childId) => childId !== null)).toBe(true)

    const [firstChild] = childIds
    if (firstChild === null || firstChild === undefined) throw new Error('no child')

    const child = await withContainer((c) => Promise.resolve(c.store.load(firstChild)))
    expect(child.status).toBe('Draft')
    expect(child.parentId).toBe(parent.id)
    expect(child.issueRef).toBe('https://issues.example.test/1')
    expect(tracker.statusOf(child.issueRef)).toBe('Business Review')

    const childPlan = await withContainer((c) => c.lifecycle.reviewPlan(firstChild, 'alice'))
    expect(childPlan.stages.map((s) => `${s.stage}:${s.result}`)).toEqual([
      'submit:passed',
      'requirements:passed',
      'test_plan:passed',
      'technical_review:passed',
      'split_evaluation:passed',
    ])
    expect(childPlan.task.status).toBe('ReadyForImplementation')
    expect(childPlan.task.steps.map((s) => s.description)).toEqual(['pg_dump'])
  })
})
