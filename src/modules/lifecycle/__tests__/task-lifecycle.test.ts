/**
 * Tests for TaskLifecycleImpl: command sequencing, confirmations and idempotency.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { createTestHarness } from '../../../../test/helpers/harness.js'
import type { TestHarness } from '../../../../test/helpers/harness.js'
import { ScriptedWorker, approve, revise } from '../../../../test/helpers/fakes.js'
import type { Worker } from '../../agent-dispatch/types.js'
import { TaskInvariantError } from '../../../core/errors.js'

let harness: TestHarness | undefined

afterEach(() => {
  harness?.close()
  harness = undefined
})

function planningWorkers(): Worker[] {
  return [new ScriptedWorker('planner-reviewer', [approve()]), new ScriptedWorker('splitter', [approve({ children: [] })])]
}

function setup(workers: Worker[] = planningWorkers()): TestHarness {
  harness = createTestHarness({ workers })
  return harness
}

async function readyTask(h: TestHarness): Promise<string> {
  const { task } = await h.lifecycle.createTask(
    { title: 'Nightly backup', steps: [{ description: 'dump database' }, { description: 'upload archive' }] },
    'alice',
  )
  await h.lifecycle.reviewPlan(task.id, 'alice')
  return task.id
}

describe('createTask', () => {
  it('creates the task and submits it for requirements review', async () => {
    const h = setup()

    const report = await h.lifecycle.createTask({ title: 'Nightly backup' }, 'alice')

    expect(report.task.status).toBe('RequirementsReview')
    expect(report.stages).toEqual([{ stage: 'submit', result: 'passed', notes: null }])
    expect(report.task.changelog.map((e) => [e.component, e.actor])).toEqual([
      ['task-store', 'alice'],
      ['confirmation', 'alice'],
    ])
  })
})

describe('reviewPlan', () => {
  it('confirms the human gates and runs the agent gates', async () => {
    const h = setup()
    const { task } = await h.lifecycle.createTask({ title: 'Nightly backup' }, 'alice')

    const report = await h.lifecycle.reviewPlan(task.id, 'alice')

    expect(report.stages.map((s) => [s.stage, s.result])).toEqual([
      ['requirements', 'passed'],
      ['test_plan', 'passed'],
      ['technical_review', 'passed'],
      ['split_evaluation', 'passed'],
    ])
    expect(report.task.status).toBe('ReadyForImplementation')
    expect(h.confirmer.questions).toEqual([
      `Business requirements signed off for "Nightly backup" (${task.id})?`,
      `Test plan signed off for "Nightly backup" (${task.id})?`,
    ])
  })

  it('reports passed gates without side effects when run again', async () => {
    const h = setup()
    const taskId = await readyTask(h)
    const invocations = h.controller.getInvocations(taskId).length

    const again = await h.lifecycle.reviewPlan(taskId, 'alice')

    expect(again.stages.map((s) => s.result)).toEqual(['already_passed', 'already_passed', 'already_passed', 'already_passed'])
    expect(h.controller.getInvocations(taskId)).toHaveLength(invocations)
    expect(h.confirmer.questions).toHaveLength(2)
    expect(again.syncResults).toEqual([])
  })

  it('stops at a declined confirmation', async () => {
    const h = setup()
    const { task } = await h.lifecycle.createTask({ title: 'Nightly backup' }, 'alice')
    h.confirmer.answer = false

    const report = await h.lifecycle.reviewPlan(task.id, 'alice')

    expect(report.stages).toEqual([{ stage: 'requirements', result: 'declined', notes: null }])
    expect(report.task.status).toBe('RequirementsReview')
    expect(h.controller.getInvocations(task.id)).toEqual([])
  })

  it('stops at the first gate that asks for revision', async () => {
    const splitter = new ScriptedWorker('splitter', [approve({ children: [] })])
    const h = setup([new ScriptedWorker('planner-reviewer', [revise('missing rollback plan')]), splitter])
    const { task } = await h.lifecycle.createTask({ title: 'Nightly backup' }, 'alice')

    const report = await h.lifecycle.reviewPlan(task.id, 'alice')

    expect(report.stages[2]).toEqual({ stage: 'technical_review', result: 'needs_revision', notes: 'missing rollback plan' })
    expect(report.stages).toHaveLength(3)
    expect(report.task.status).toBe('NeedsRevision')
    expect(splitter.contexts).toEqual([])
  })

  it('submits a Draft child task before reviewing it', async () => {
    const h = setup()
    const draft = h.store.create({ title: 'Child from a split' })

    const report = await h.lifecycle.reviewPlan(draft.id, 'alice')

    expect(report.stages[0]).toEqual({ stage: 'submit', result: 'passed', notes: null })
    expect(report.task.status).toBe('ReadyForImplementation')
  })
})

describe('startImplementation', () => {
  it('takes the start edge and creates the branch once', async () => {
    const h = setup()
    const taskId = await readyTask(h)

    const first = await h.lifecycle.startImplementation(taskId, 'alice')
    const second = await h.lifecycle.startImplementation(taskId, 'alice')

    expect(first.task.status).toBe('InProgress')
    expect(first.task.branchRef).toBe(`task/${taskId}`)
    expect(h.vcs.branches.has(`task/${taskId}`)).toBe(true)
    expect(second.stages).toEqual([{ stage: 'start', result: 'already_passed', notes: null }])
    expect(h.vcs.switches.count('createBranch')).toBe(1)
  })
})

describe('continueImplementation', () => {
  it('records step progress and appends the changelog writer entries', async () => {
    const writer = new ScriptedWorker('changelog-writer', [
      approve({ entries: [{ component: 'backup', summary: 'Dump job added', effect: 'Database dumped nightly' }] }),
    ])
    const h = setup([...planningWorkers(), writer])
    const taskId = await readyTask(h)
    await h.lifecycle.startImplementation(taskId, 'alice')

    const report = await h.lifecycle.continueImplementation(
      taskId,
      [{ stepIndex: 0, state: 'done', evidence: 'backup.sh' }],
      'alice',
    )

    expect(report.task.steps.map((s) => s.completionState)).toEqual(['done', 'pending'])
    expect(report.task.steps[0]?.evidence).toBe('backup.sh')
    expect(writer.contexts[0]?.instructions).toBe('Step 1 "dump database": done (evidence: backup.sh)')
    expect(report.task.changelog.slice(-2).map((e) => e.summary)).toEqual(['Recorded progress on 1 step(s)', 'Dump job added'])
  })

  it('keeps the progress when no changelog writer is available', async () => {
    const h = setup()
    const taskId = await readyTask(h)
    await h.lifecycle.startImplementation(taskId, 'alice')

    const report = await h.lifecycle.continueImplementation(taskId, [{ stepIndex: 1, state: 'in_progress' }], 'alice')

    expect(report.changelog.error?.kind).toBe('unknown_agent')
    expect(report.task.steps[1]?.completionState).toBe('in_progress')
  })

  it('records nothing when any step index is unknown', async () => {
    const h = setup()
    const taskId = await readyTask(h)
    await h.lifecycle.startImplementation(taskId, 'alice')
    const before = h.store.load(taskId)

    await expect(
      h.lifecycle.continueImplementation(
        taskId,
        [
          { stepIndex: 0, state: 'done' },
          { stepIndex: 7, state: 'done' },
        ],
        'alice',
      ),
    ).rejects.toThrow(`Task ${taskId} has no step 7`)

    const after = h.store.load(taskId)
    expect(after.steps.map((s) => s.completionState)).toEqual(['pending', 'pending'])
    expect(after.version).toBe(before.version)
    expect(after.changelog).toHaveLength(before.changelog.length)
  })

  it('refuses progress on a task that is not being implemented', async () => {
    const h = setup()
    const taskId = await readyTask(h)

    await expect(h.lifecycle.continueImplementation(taskId, [], 'alice')).rejects.toThrow(TaskInvariantError)
  })
})

describe('startReview', () => {
  it('adopts a change request the pr-creator already opened', async () => {
    const agentRef = 'https://git.example.test/pr/agent-77'
    const h = setup([
      ...planningWorkers(),
      new ScriptedWorker('validator', [approve()]),
      new ScriptedWorker('pr-creator', [approve({ change_request_ref: agentRef })]),
    ])
    const taskId = await readyTask(h)
    await h.lifecycle.startImplementation(taskId, 'alice')

    const report = await h.lifecycle.startReview(taskId, 'alice')

    expect(report.task.status).toBe('DocumentationUpdate')
    expect(report.task.changeRequestRef).toBe(agentRef)
    expect(h.vcs.switches.count('openChangeRequest')).toBe(0)
    expect(h.vcs.changeRequests.size).toBe(0)
    expect(h.auditLog.latest(taskId, 'open_change_request')?.result).toBe('success')
    expect(h.reconciler.findDrift(taskId)).toEqual([])
  })

  it('opens the change request from the pr-creator draft', async () => {
    const h = setup([
      ...planningWorkers(),
      new ScriptedWorker('validator', [approve()]),
      new ScriptedWorker('pr-creator', [approve({ title: 'Nightly backup job', body: 'Adds the dump and upload' })]),
    ])
    const taskId = await readyTask(h)
    await h.lifecycle.startImplementation(taskId, 'alice')

    const report = await h.lifecycle.startReview(taskId, 'alice')

    expect(report.task.changeRequestRef).toBe('https://git.example.test/pr/1')
    expect(h.vcs.changeRequests.get('https://git.example.test/pr/1')?.title).toBe('Nightly backup job')
  })
})

describe('prepareHandover', () => {
  it('stores the note and comments on the issue', async () => {
    const h = setup()
    const taskId = await readyTask(h)

    const report = await h.lifecycle.prepareHandover(taskId, {
      author: 'bob',
      summary: 'Dump works, upload pending',
      nextSteps: ['configure bucket'],
      openQuestions: [],
    })

    expect(report.task.handover?.summary).toBe('Dump works, upload pending')
    expect(report.comment?.result).toBe('success')
    const issue = report.task.issueRef !== null ? h.tracker.issues.get(report.task.issueRef) : undefined
    expect(issue?.comments).toEqual([
      `Handover\n\n_bob, ${report.task.handover?.createdAt ?? ''}_\n\nDump works, upload pending\n\nNext steps:\n- configure bucket`,
    ])
  })

  it('skips the comment when the task has no issue', async () => {
    const h = setup()
    const { task } = await h.lifecycle.createTask({ title: 'Early notes' }, 'alice')

    const report = await h.lifecycle.prepareHandover(task.id, {
      author: 'bob',
      summary: 'Requirements still open',
      nextSteps: [],
      openQuestions: ['who owns retention?'],
    })

    expect(report.comment).toBeNull()
    expect(report.task.changelog[report.task.changelog.length - 1]?.component).toBe('handover')
  })
})
