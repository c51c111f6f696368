/**
 * `taskgate continue` command
 *
 * Records implementation progress on a task's steps and asks the
 * changelog writer to summarise it.
 *
 * Usage:
 *   taskgate continue <taskId> --step 1:done:"backup.sh added" --step 2:in_progress
 *
 * Step specs are `<number>:<state>[:<evidence>]` with 1-based step numbers
 * and state one of pending, in_progress, done, skipped.
 *
 * Exit codes:
 *   0 - Progress recorded (even when the changelog writer failed)
 *   1 - System error
 *   2 - Usage or state error (bad step spec, task not in progress)
 */

import type { Command } from 'commander'
import type { StepState, TaskId } from '../../core/types.js'
import type { StepProgress } from '../../modules/lifecycle/task-lifecycle.js'
import { emitEvent, taskStateToJson } from '../formatters/streaming.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  addTaskFlags,
  runTaskCommand,
  taskOptionsFrom,
  type TaskCommandFlags,
  type TaskCommandOptions,
} from '../utils/command-context.js'

const STEP_STATES: readonly StepState[] = ['pending', 'in_progress', 'done', 'skipped']

function isStepState(value: string): value is StepState {
  return STEP_STATES.some((state) => state === value)
}

/**
 * Parse `<number>:<state>[:<evidence>]`. Returns an error message for an
 * invalid spec. Evidence may itself contain colons.
 */
export function parseStepSpec(spec: string): StepProgress | string {
  const first = spec.indexOf(':')
  if (first === -1) return `Invalid step "${spec}": expected <number>:<state>[:<evidence>]`

  const numberText = spec.slice(0, first)
  const rest = spec.slice(first + 1)
  const second = rest.indexOf(':')
  const state = second === -1 ? rest : rest.slice(0, second)
  const evidence = second === -1 ? null : rest.slice(second + 1)

  if (!/^\d+$/.test(numberText) || parseInt(numberText, 10) < 1) {
    return `Invalid step "${spec}": step number must be a positive integer`
  }
  if (!isStepState(state)) {
    return `Invalid step "${spec}": state must be one of ${STEP_STATES.join(', ')}`
  }
  return {
    stepIndex: parseInt(numberText, 10) - 1,
    state,
    evidence: evidence !== null && evidence !== '' ? evidence : null,
  }
}

export interface ContinueActionOptions extends TaskCommandOptions {
  taskId: TaskId
  steps: string[]
}

export async function runContinueAction(options: ContinueActionOptions): Promise<number> {
  if (options.steps.length === 0) {
    process.stderr.write('Error: Pass at least one --step <number>:<state>[:<evidence>]\n')
    return EXIT_USAGE_ERROR
  }

  const progress: StepProgress[] = []
  for (const spec of options.steps) {
    const parsed = parseStepSpec(spec)
    if (typeof parsed === 'string') {
      process.stderr.write(`Error: ${parsed}\n`)
      return EXIT_USAGE_ERROR
    }
    progress.push(parsed)
  }

  return runTaskCommand(options, async ({ container, actor }) => {
    const { task, changelog } = await container.lifecycle.continueImplementation(options.taskId, progress, actor)

    if (options.outputFormat === 'json') {
      emitEvent('continue:completed', {
        task: taskStateToJson(task),
        steps: task.steps.map((s, index) => ({ number: index + 1, state: s.completionState, evidence: s.evidence })),
        changelog: {
          agent: changelog.agent,
          verdict: changelog.verdict,
          notes: changelog.notes,
          error: changelog.error?.message ?? null,
        },
      })
      return EXIT_SUCCESS
    }

    const lines = [`${task.id}  ${task.title}`, `Recorded progress on ${String(progress.length)} step(s):`]
    for (const p of progress) {
      const step = task.steps[p.stepIndex]
      lines.push(`  ${String(p.stepIndex + 1)}. ${step?.description ?? '?'}: ${p.state}`)
    }
    lines.push(
      changelog.error !== null
        ? `Changelog writer failed: ${changelog.error.message}`
        : `Changelog writer: ${changelog.notes ?? changelog.verdict ?? 'done'}`,
    )
    process.stdout.write(lines.join('\n') + '\n')
    return EXIT_SUCCESS
  })
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function registerContinueCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  addTaskFlags(
    program
      .command('continue <taskId>')
      .description('Record implementation progress and update the changelog')
      .option('--step <spec>', 'Step progress as <number>:<state>[:<evidence>] (repeatable)', collect, []),
  ).action(async (taskId: string, opts: TaskCommandFlags & { step: string[] }) => {
    process.exitCode = await runContinueAction({ ...taskOptionsFrom(opts, projectRoot), taskId, steps: opts.step })
  })
}
