import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { TaskDocumentError } from '../../../core/errors.js'
import type { Task } from '../types.js'
import {
  exportTaskDocument,
  parseTaskDocument,
  renderHandoverNote,
  renderTaskDocument,
  serializeTaskDocument,
  taskSpecFromDocument,
} from '../task-document.js'

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    title: 'Nightly export',
    parentId: null,
    status: 'InProgress',
    gatesPassed: ['requirements', 'test_plan'],
    branchRef: 'task/task-1',
    issueRef: null,
    changeRequestRef: null,
    requirements: 'Export every night',
    testPlan: '',
    steps: [
      {
        description: 'Dump',
        acceptanceCriteria: ['file exists'],
        completionState: 'done',
        evidence: 'dump.sql',
        splitRef: null,
      },
      {
        description: 'Upload',
        acceptanceCriteria: [],
        completionState: 'pending',
        evidence: null,
        splitRef: { childTaskId: 'task-2' },
      },
    ],
    changelog: [
      {
        timestamp: '2026-03-01T12:00:00.000Z',
        component: 'task-store',
        summary: 'Task created',
        effect: 'Recorded',
        actor: 'alice',
      },
    ],
    handover: null,
    revisionCounts: {},
    revisionGate: null,
    stuckGate: null,
    blockedFrom: null,
    openInvocationId: null,
    version: 4,
    createdAt: '2026-03-01T12:00:00.000Z',
    updatedAt: '2026-03-01T12:00:00.000Z',
    ...overrides,
  }
}

describe('renderTaskDocument', () => {
  it('renders sections with step markers', () => {
    expect(renderTaskDocument(makeTask())).toBe(
      [
        '# Nightly export',
        '',
        '- **Id:** task-1',
        '- **Status:** InProgress',
        '- **Gates passed:** requirements, test_plan',
        '',
        '## Requirements',
        '',
        'Export every night',
        '',
        '## Test plan',
        '',
        '_None recorded._',
        '',
        '## Steps',
        '',
        '1. [x] Dump',
        '   - file exists',
        '   - Evidence: dump.sql',
        '2. [ ] Upload (moved to task-2)',
        '',
        '## Tracking',
        '',
        '- Branch: task/task-1',
        '- Issue: -',
        '- Change request: -',
        '',
        '## Changelog',
        '',
        '- 2026-03-01T12:00:00.000Z [task-store] Task created → Recorded (alice)',
        '',
      ].join('\n'),
    )
  })
})

describe('renderHandoverNote', () => {
  it('lists next steps and omits empty sections', () => {
    const text = renderHandoverNote({
      author: 'alice',
      summary: 'Dump works',
      nextSteps: ['upload'],
      openQuestions: [],
      createdAt: '2026-03-01T12:00:00.000Z',
    })

    expect(text).toBe(['_alice, 2026-03-01T12:00:00.000Z_', '', 'Dump works', '', 'Next steps:', '- upload'].join('\n'))
  })
})

describe('YAML exchange form', () => {
  it('reads back the descriptive fields it writes', () => {
    const doc = parseTaskDocument(serializeTaskDocument(makeTask()))

    expect(taskSpecFromDocument(doc)).toEqual({
      title: 'Nightly export',
      requirements: 'Export every night',
      testPlan: '',
      steps: [
        { description: 'Dump', acceptanceCriteria: ['file exists'] },
        { description: 'Upload', acceptanceCriteria: [] },
      ],
    })
    expect(doc.status).toBe('InProgress')
    expect(doc.tracking).toEqual({ branch: 'task/task-1', issue: null, change_request: null })
  })

  it('fills defaults for a minimal document', () => {
    const doc = parseTaskDocument('title: Rotate keys\n')

    expect(doc.version).toBe('1')
    expect(doc.steps).toEqual([])
    expect(doc.requirements).toBe('')
  })

  it('reports schema violations as issues', () => {
    try {
      parseTaskDocument('title: ""\nsteps: []\n')
      expect.fail('expected a TaskDocumentError')
    } catch (err) {
      expect(err).toBeInstanceOf(TaskDocumentError)
      if (err instanceof TaskDocumentError) {
        expect(err.message).toBe('Task document failed validation')
        expect(err.context['issues']).toEqual(['title: String must contain at least 1 character(s)'])
      }
    }
  })

  it('rejects an unsupported version', () => {
    expect(() => parseTaskDocument('version: "2"\ntitle: Rotate keys\n')).toThrow(TaskDocumentError)
  })

  it('wraps YAML syntax errors', () => {
    expect(() => parseTaskDocument('title: [unclosed\n')).toThrow(/^YAML parse error: /)
  })
})

describe('exportTaskDocument', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'taskgate-doc-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('picks the format from the extension', () => {
    const task = makeTask()
    exportTaskDocument(task, join(dir, 'task.md'))
    exportTaskDocument(task, join(dir, 'task.yaml'))

    expect(readFileSync(join(dir, 'task.md'), 'utf-8')).toBe(renderTaskDocument(task))
    expect(readFileSync(join(dir, 'task.yaml'), 'utf-8')).toBe(serializeTaskDocument(task))
  })
})
