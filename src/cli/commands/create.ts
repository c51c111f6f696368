/**
 * `taskgate create` command
 *
 * Creates a task and submits it for requirements review.
 *
 * Usage:
 *   taskgate create "Nightly export" --requirements "..." --step "Dump database" --step "Upload"
 *   taskgate create --from task.yaml
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Usage error (no title, unreadable or invalid document)
 */

import type { Command } from 'commander'
import { readFile } from 'fs/promises'
import { TaskDocumentError } from '../../core/errors.js'
import {
  parseTaskDocument,
  taskSpecFromDocument,
} from '../../modules/task-store/task-document.js'
import type { TaskSpec } from '../../modules/task-store/types.js'
import { emitLifecycleReport } from '../formatters/streaming.js'
import { renderLifecycleReport } from '../formatters/task-formatter.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  addTaskFlags,
  reportError,
  runTaskCommand,
  taskOptionsFrom,
  type TaskCommandFlags,
  type TaskCommandOptions,
} from '../utils/command-context.js'

export interface CreateActionOptions extends TaskCommandOptions {
  title?: string
  requirements?: string
  testPlan?: string
  steps?: string[]
  /** YAML task document to create from; flags override its fields */
  from?: string
}

/** Build the creation input from a document and/or flags */
export async function buildTaskSpec(options: CreateActionOptions): Promise<TaskSpec> {
  let spec: TaskSpec | null = null
  if (options.from !== undefined) {
    spec = taskSpecFromDocument(parseTaskDocument(await readFile(options.from, 'utf-8')))
  }

  const title = options.title ?? spec?.title
  if (title === undefined || title.trim() === '') {
    throw new Error('A title is required (pass it as an argument or in the --from document)')
  }

  const steps = options.steps !== undefined && options.steps.length > 0
    ? options.steps.map((description) => ({ description }))
    : spec?.steps

  return {
    title: title.trim(),
    ...(spec !== null && spec.requirements !== undefined && { requirements: spec.requirements }),
    ...(spec !== null && spec.testPlan !== undefined && { testPlan: spec.testPlan }),
    ...(options.requirements !== undefined && { requirements: options.requirements }),
    ...(options.testPlan !== undefined && { testPlan: options.testPlan }),
    ...(steps !== undefined && { steps }),
  }
}

export async function runCreateAction(options: CreateActionOptions): Promise<number> {
  let spec: TaskSpec
  try {
    spec = await buildTaskSpec(options)
  } catch (err) {
    if (err instanceof TaskDocumentError) return reportError(err)
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`)
    return EXIT_USAGE_ERROR
  }

  return runTaskCommand(options, async ({ container, actor }) => {
    const report = await container.lifecycle.createTask(spec, actor)
    if (options.outputFormat === 'json') {
      emitLifecycleReport('create', report)
    } else {
      process.stdout.write(renderLifecycleReport(report) + '\n')
    }
    return EXIT_SUCCESS
  })
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function registerCreateCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  addTaskFlags(
    program
      .command('create [title]')
      .description('Create a task and submit it for requirements review')
      .option('--requirements <text>', 'Requirements text')
      .option('--test-plan <text>', 'Test plan text')
      .option('--step <description>', 'Implementation step (repeatable)', collect, [])
      .option('--from <file>', 'Create from a YAML task document'),
  ).action(
    async (
      title: string | undefined,
      opts: TaskCommandFlags & { requirements?: string; testPlan?: string; step: string[]; from?: string },
    ) => {
      process.exitCode = await runCreateAction({
        ...taskOptionsFrom(opts, projectRoot),
        steps: opts.step,
        ...(title !== undefined && { title }),
        ...(opts.requirements !== undefined && { requirements: opts.requirements }),
        ...(opts.testPlan !== undefined && { testPlan: opts.testPlan }),
        ...(opts.from !== undefined && { from: opts.from }),
      })
    },
  )
}
