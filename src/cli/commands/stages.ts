/**
 * Stage commands: one per step of the task lifecycle.
 *
 *   taskgate review-plan <taskId>   requirements, test plan, technical review, split evaluation
 *   taskgate start <taskId>         confirm the start of implementation and create the branch
 *   taskgate review <taskId>        implementation validation and code review
 *   taskgate docs <taskId>          documentation update
 *   taskgate merge <taskId>         merge confirmation
 *
 * Each command is idempotent: stages already passed are reported and
 * skipped. The command stops at the first stage that does not pass.
 *
 * Exit codes:
 *   0 - Command ran (see the report for each stage's result)
 *   1 - System error
 *   2 - State error (unknown task, gate out of order, stuck gate)
 */

import type { Command } from 'commander'
import type { TaskId } from '../../core/types.js'
import type { LifecycleReport, TaskLifecycle } from '../../modules/lifecycle/task-lifecycle.js'
import { emitLifecycleReport } from '../formatters/streaming.js'
import { renderLifecycleReport } from '../formatters/task-formatter.js'
import {
  EXIT_SUCCESS,
  addTaskFlags,
  runTaskCommand,
  taskOptionsFrom,
  type TaskCommandFlags,
  type TaskCommandOptions,
} from '../utils/command-context.js'

export const STAGE_COMMAND_NAMES = ['review-plan', 'start', 'review', 'docs', 'merge'] as const

export type StageCommand = (typeof STAGE_COMMAND_NAMES)[number]

interface StageCommandDefinition {
  description: string
  run(lifecycle: TaskLifecycle, taskId: TaskId, actor: string): Promise<LifecycleReport>
}

export const STAGE_COMMANDS: Record<StageCommand, StageCommandDefinition> = {
  'review-plan': {
    description: 'Confirm requirements and test plan, then run technical review and split evaluation',
    run: (lifecycle, taskId, actor) => lifecycle.reviewPlan(taskId, actor),
  },
  start: {
    description: 'Start implementation and create the task branch',
    run: (lifecycle, taskId, actor) => lifecycle.startImplementation(taskId, actor),
  },
  review: {
    description: 'Validate the implementation and open the change request',
    run: (lifecycle, taskId, actor) => lifecycle.startReview(taskId, actor),
  },
  docs: {
    description: 'Run the documentation update',
    run: (lifecycle, taskId, actor) => lifecycle.updateDocumentation(taskId, actor),
  },
  merge: {
    description: 'Confirm the merge and close the task',
    run: (lifecycle, taskId, actor) => lifecycle.merge(taskId, actor),
  },
}

export interface StageActionOptions extends TaskCommandOptions {
  command: StageCommand
  taskId: TaskId
}

export function runStageAction(options: StageActionOptions): Promise<number> {
  return runTaskCommand(options, async ({ container, actor }) => {
    const report = await STAGE_COMMANDS[options.command].run(container.lifecycle, options.taskId, actor)
    if (options.outputFormat === 'json') {
      emitLifecycleReport(options.command, report)
    } else {
      process.stdout.write(renderLifecycleReport(report) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerStageCommands(program: Command, _version: string, projectRoot = process.cwd()): void {
  for (const name of STAGE_COMMAND_NAMES) {
    addTaskFlags(program.command(`${name} <taskId>`).description(STAGE_COMMANDS[name].description)).action(
      async (taskId: string, opts: TaskCommandFlags) => {
        process.exitCode = await runStageAction({
          ...taskOptionsFrom(opts, projectRoot),
          command: name,
          taskId,
        })
      },
    )
  }
}
