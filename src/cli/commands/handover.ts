/**
 * `taskgate handover` command
 *
 * Writes the task's handover note and posts it as a comment on the
 * task's issue, when it has one.
 *
 * Usage:
 *   taskgate handover <taskId> --summary "Dump works, upload pending" --next "configure bucket"
 *
 * Exit codes:
 *   0 - Note written (a failed comment is reported, not fatal)
 *   1 - System error
 *   2 - Usage error (no summary, unknown task)
 */

import type { Command } from 'commander'
import type { TaskId } from '../../core/types.js'
import { emitEvent, syncResultToJson, taskStateToJson } from '../formatters/streaming.js'
import { renderSyncResult } from '../formatters/task-formatter.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  addTaskFlags,
  runTaskCommand,
  taskOptionsFrom,
  type TaskCommandFlags,
  type TaskCommandOptions,
} from '../utils/command-context.js'

export interface HandoverActionOptions extends TaskCommandOptions {
  taskId: TaskId
  summary: string
  nextSteps?: string[]
  openQuestions?: string[]
}

export async function runHandoverAction(options: HandoverActionOptions): Promise<number> {
  if (options.summary.trim() === '') {
    process.stderr.write('Error: --summary must not be empty\n')
    return EXIT_USAGE_ERROR
  }

  return runTaskCommand(options, async ({ container, actor }) => {
    const { task, comment } = await container.lifecycle.prepareHandover(options.taskId, {
      author: actor,
      summary: options.summary.trim(),
      nextSteps: options.nextSteps ?? [],
      openQuestions: options.openQuestions ?? [],
    })

    if (options.outputFormat === 'json') {
      emitEvent('handover:completed', {
        task: taskStateToJson(task),
        handover: task.handover,
        comment: comment !== null ? syncResultToJson(comment) : null,
      })
      return EXIT_SUCCESS
    }

    const lines = [`Handover note written for ${task.id}`]
    lines.push(comment !== null ? `Issue comment: ${renderSyncResult(comment)}` : 'Issue comment: skipped (no issue)')
    process.stdout.write(lines.join('\n') + '\n')
    return EXIT_SUCCESS
  })
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function registerHandoverCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  addTaskFlags(
    program
      .command('handover <taskId>')
      .description('Write a handover note and post it on the issue')
      .requiredOption('--summary <text>', 'Where the work stands')
      .option('--next <item>', 'Next step for whoever picks this up (repeatable)', collect, [])
      .option('--question <item>', 'Open question (repeatable)', collect, []),
  ).action(
    async (taskId: string, opts: TaskCommandFlags & { summary: string; next: string[]; question: string[] }) => {
      process.exitCode = await runHandoverAction({
        ...taskOptionsFrom(opts, projectRoot),
        taskId,
        summary: opts.summary,
        nextSteps: opts.next,
        openQuestions: opts.question,
      })
    },
  )
}
