/**
 * Task document: human-readable markdown rendering and a YAML exchange form.
 *
 * The YAML form is what `taskgate show --export` writes and what
 * `taskgate create --from` reads. Only the descriptive parts of a task
 * (title, requirements, test plan, steps) are accepted back in; lifecycle
 * fields in an imported document are ignored.
 */

import { renameSync, unlinkSync, writeFileSync } from 'node:fs'
import { dump as yamlDump, load as yamlLoad } from 'js-yaml'
import { z } from 'zod'
import { TaskDocumentError } from '../../core/errors.js'
import { GateIdSchema, HandoverNoteSchema, StepStateSchema, TaskStatusSchema } from './codec.js'
import type { HandoverNote, Task, TaskSpec } from './types.js'

/** Document format versions this build reads */
export const SUPPORTED_DOCUMENT_VERSIONS = ['1'] as const

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const DocumentStepSchema = z.object({
  description: z.string().min(1),
  acceptance_criteria: z.array(z.string()).default([]),
  state: StepStateSchema.default('pending'),
  evidence: z.string().nullable().optional(),
  split_task: z.string().nullable().optional(),
})

export const TaskDocumentSchema = z.object({
  version: z.enum(SUPPORTED_DOCUMENT_VERSIONS).default('1'),
  title: z.string().min(1),
  requirements: z.string().default(''),
  test_plan: z.string().default(''),
  steps: z.array(DocumentStepSchema).default([]),
  // Exported for reading only
  id: z.string().optional(),
  parent_id: z.string().nullable().optional(),
  status: TaskStatusSchema.optional(),
  gates_passed: z.array(GateIdSchema).optional(),
  tracking: z
    .object({
      branch: z.string().nullable(),
      issue: z.string().nullable(),
      change_request: z.string().nullable(),
    })
    .optional(),
  handover: HandoverNoteSchema.nullable().optional(),
})

export type TaskDocument = z.infer<typeof TaskDocumentSchema>

// ---------------------------------------------------------------------------
// Markdown
// ---------------------------------------------------------------------------

const STEP_MARKERS = {
  pending: '[ ]',
  in_progress: '[~]',
  done: '[x]',
  skipped: '[-]',
} as const

/**
 * Render a handover note as markdown; also used as the issue comment body.
 */
export function renderHandoverNote(note: HandoverNote): string {
  const lines = [`_${note.author}, ${note.createdAt}_`, '', note.summary]
  if (note.nextSteps.length > 0) {
    lines.push('', 'Next steps:')
    for (const item of note.nextSteps) lines.push(`- ${item}`)
  }
  if (note.openQuestions.length > 0) {
    lines.push('', 'Open questions:')
    for (const item of note.openQuestions) lines.push(`- ${item}`)
  }
  return lines.join('\n')
}

/**
 * Render a task as a markdown document.
 */
export function renderTaskDocument(task: Task): string {
  const lines: string[] = []

  lines.push(`# ${task.title}`)
  lines.push('')
  lines.push(`- **Id:** ${task.id}`)
  lines.push(`- **Status:** ${task.status}`)
  if (task.parentId !== null) lines.push(`- **Parent:** ${task.parentId}`)
  lines.push(`- **Gates passed:** ${task.gatesPassed.length > 0 ? task.gatesPassed.join(', ') : 'none'}`)
  lines.push('')

  lines.push('## Requirements')
  lines.push('')
  lines.push(task.requirements !== '' ? task.requirements : '_None recorded._')
  lines.push('')

  lines.push('## Test plan')
  lines.push('')
  lines.push(task.testPlan !== '' ? task.testPlan : '_None recorded._')
  lines.push('')

  lines.push('## Steps')
  lines.push('')
  if (task.steps.length === 0) {
    lines.push('_No steps._')
  }
  task.steps.forEach((step, index) => {
    const split = step.splitRef !== null ? ` (moved to ${step.splitRef.childTaskId})` : ''
    lines.push(`${String(index + 1)}. ${STEP_MARKERS[step.completionState]} ${step.description}${split}`)
    for (const criterion of step.acceptanceCriteria) {
      lines.push(`   - ${criterion}`)
    }
    if (step.evidence !== null) {
      lines.push(`   - Evidence: ${step.evidence}`)
    }
  })
  lines.push('')

  lines.push('## Tracking')
  lines.push('')
  lines.push(`- Branch: ${task.branchRef ?? '-'}`)
  lines.push(`- Issue: ${task.issueRef ?? '-'}`)
  lines.push(`- Change request: ${task.changeRequestRef ?? '-'}`)
  lines.push('')

  if (task.handover !== null) {
    lines.push('## Handover')
    lines.push('')
    lines.push(renderHandoverNote(task.handover))
    lines.push('')
  }

  lines.push('## Changelog')
  lines.push('')
  if (task.changelog.length === 0) {
    lines.push('_Empty._')
  }
  for (const entry of task.changelog) {
    lines.push(`- ${entry.timestamp} [${entry.component}] ${entry.summary} → ${entry.effect} (${entry.actor})`)
  }

  return lines.join('\n') + '\n'
}

// ---------------------------------------------------------------------------
// YAML exchange form
// ---------------------------------------------------------------------------

export function toTaskDocument(task: Task): TaskDocument {
  return {
    version: '1',
    id: task.id,
    parent_id: task.parentId,
    title: task.title,
    status: task.status,
    gates_passed: [...task.gatesPassed],
    requirements: task.requirements,
    test_plan: task.testPlan,
    steps: task.steps.map((step) => ({
      description: step.description,
      acceptance_criteria: [...step.acceptanceCriteria],
      state: step.completionState,
      evidence: step.evidence,
      split_task: step.splitRef?.childTaskId ?? null,
    })),
    tracking: {
      branch: task.branchRef,
      issue: task.issueRef,
      change_request: task.changeRequestRef,
    },
    handover: task.handover,
  }
}

export function serializeTaskDocument(task: Task): string {
  return yamlDump(toTaskDocument(task), { lineWidth: 100, noRefs: true })
}

/**
 * Parse and validate a YAML task document.
 *
 * @throws {TaskDocumentError} on YAML syntax errors or schema violations
 */
export function parseTaskDocument(content: string): TaskDocument {
  let raw: unknown
  try {
    raw = yamlLoad(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new TaskDocumentError(`YAML parse error: ${message}`)
  }

  const result = TaskDocumentSchema.safeParse(raw)
  if (!result.success) {
    throw new TaskDocumentError('Task document failed validation', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    })
  }
  return result.data
}

/** The creation input described by a document */
export function taskSpecFromDocument(doc: TaskDocument): TaskSpec {
  return {
    title: doc.title,
    requirements: doc.requirements,
    testPlan: doc.test_plan,
    steps: doc.steps.map((s) => ({
      description: s.description,
      acceptanceCriteria: s.acceptance_criteria,
    })),
  }
}

/**
 * Write a file atomically (temp file + rename).
 */
export function writeFileAtomic(outputPath: string, content: string): void {
  const tmpPath = `${outputPath}.tmp.${String(process.pid)}.${String(Date.now())}`
  try {
    writeFileSync(tmpPath, content, 'utf-8')
    renameSync(tmpPath, outputPath)
  } catch (err) {
    try {
      unlinkSync(tmpPath)
    } catch {
      // tmp file was never created
    }
    throw err
  }
}

/**
 * Write a task to disk: `.md` paths get the markdown rendering, anything
 * else the YAML exchange form.
 */
export function exportTaskDocument(task: Task, outputPath: string): void {
  const content = outputPath.toLowerCase().endsWith('.md')
    ? renderTaskDocument(task)
    : serializeTaskDocument(task)
  writeFileAtomic(outputPath, content)
}
