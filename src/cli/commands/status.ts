/**
 * `taskgate status` command
 *
 * Usage:
 *   taskgate status                         List active tasks
 *   taskgate status --all                   Include archived tasks
 *   taskgate status --status InProgress     Only tasks in one status
 *   taskgate status <taskId>                Lifecycle state and gate invocations of one task
 *   taskgate status <taskId> --output-format json
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Usage error (unknown task or status)
 */

import type { Command } from 'commander'
import { isTaskStatus } from '../../core/types.js'
import type { TaskId } from '../../core/types.js'
import type { TaskListFilter } from '../../modules/task-store/types.js'
import { emitEvent, taskStateToJson } from '../formatters/streaming.js'
import { renderTaskStatus, renderTaskTable } from '../formatters/task-formatter.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  addTaskFlags,
  runTaskCommand,
  taskOptionsFrom,
  type TaskCommandFlags,
  type TaskCommandOptions,
} from '../utils/command-context.js'

export interface StatusActionOptions extends TaskCommandOptions {
  taskId?: TaskId
  status?: string
  all?: boolean
}

export async function runStatusAction(options: StatusActionOptions): Promise<number> {
  const filter: TaskListFilter = { includeArchived: options.all === true }
  if (options.status !== undefined) {
    if (!isTaskStatus(options.status)) {
      process.stderr.write(`Error: Unknown status "${options.status}"\n`)
      return EXIT_USAGE_ERROR
    }
    filter.status = options.status
    filter.includeArchived = options.all === true || options.status === 'Archived'
  }

  return runTaskCommand(options, async ({ container }) => {
    if (options.taskId !== undefined) {
      const task = container.store.load(options.taskId)
      const invocations = container.controller.getInvocations(task.id)

      if (options.outputFormat === 'json') {
        emitEvent('status:task', {
          task: taskStateToJson(task),
          invocations: invocations.map((inv) => ({
            id: inv.id,
            gateId: inv.gateId,
            state: inv.state,
            verdict: inv.verdict,
            notes: inv.notes,
            invokedAgent: inv.invokedAgent,
            confirmedBy: inv.confirmedBy,
            createdAt: inv.createdAt,
            decidedAt: inv.decidedAt,
          })),
        })
      } else {
        process.stdout.write(renderTaskStatus(task, invocations) + '\n')
      }
      return EXIT_SUCCESS
    }

    const tasks = container.store.list(filter)
    if (options.outputFormat === 'json') {
      emitEvent('status:list', { tasks: tasks.map(taskStateToJson) })
    } else {
      process.stdout.write(renderTaskTable(tasks) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerStatusCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  addTaskFlags(
    program
      .command('status [taskId]')
      .description('Show tasks and where they are in the lifecycle')
      .option('--status <status>', 'Only tasks in this status')
      .option('--all', 'Include archived tasks'),
  ).action(async (taskId: string | undefined, opts: TaskCommandFlags & { status?: string; all?: boolean }) => {
    process.exitCode = await runStatusAction({
      ...taskOptionsFrom(opts, projectRoot),
      ...(taskId !== undefined && { taskId }),
      ...(opts.status !== undefined && { status: opts.status }),
      ...(opts.all !== undefined && { all: opts.all }),
    })
  })
}
