/**
 * Operator overrides outside the gate sequence.
 *
 *   taskgate block <taskId> --reason "waiting on vendor"
 *   taskgate unblock <taskId>
 *   taskgate override <taskId> <gateId>   clear a stuck gate's revision count
 *   taskgate archive <taskId>             prompts unless --yes
 *
 * Exit codes:
 *   0 - Success (or archive declined)
 *   1 - System error
 *   2 - State error (illegal transition, gate not stuck, unknown task or gate)
 */

import type { Command } from 'commander'
import { GATE_ORDER, isGateId } from '../../core/types.js'
import type { TaskId } from '../../core/types.js'
import type { SyncResult } from '../../modules/external-sync/types.js'
import type { Task } from '../../modules/task-store/types.js'
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

export type OperatorCommand = 'block' | 'unblock' | 'override' | 'archive'

export interface OperatorActionOptions extends TaskCommandOptions {
  command: OperatorCommand
  taskId: TaskId
  /** block */
  reason?: string
  /** override */
  gateId?: string
}

function writeResult(
  options: OperatorActionOptions,
  message: string,
  task: Task,
  syncResults: SyncResult[] = [],
): void {
  if (options.outputFormat === 'json') {
    emitEvent(`${options.command}:completed`, {
      task: taskStateToJson(task),
      syncResults: syncResults.map(syncResultToJson),
    })
    return
  }
  const lines = [message, ...syncResults.map((r) => `  ${renderSyncResult(r)}`)]
  process.stdout.write(lines.join('\n') + '\n')
}

export async function runOperatorAction(options: OperatorActionOptions): Promise<number> {
  if (options.command === 'block' && (options.reason === undefined || options.reason.trim() === '')) {
    process.stderr.write('Error: block needs --reason\n')
    return EXIT_USAGE_ERROR
  }
  const gateId = options.gateId
  if (options.command === 'override' && (gateId === undefined || !isGateId(gateId))) {
    process.stderr.write(`Error: Unknown gate "${gateId ?? ''}"; expected one of ${GATE_ORDER.join(', ')}\n`)
    return EXIT_USAGE_ERROR
  }

  return runTaskCommand(options, async ({ container, actor, confirmer }) => {
    const { controller } = container
    switch (options.command) {
      case 'block': {
        const { task, syncResults } = await controller.block(options.taskId, options.reason?.trim() ?? '', actor)
        writeResult(options, `${task.id} blocked (was ${task.blockedFrom ?? '?'})`, task, syncResults)
        return EXIT_SUCCESS
      }
      case 'unblock': {
        const { task, syncResults } = await controller.unblock(options.taskId, actor)
        writeResult(options, `${task.id} unblocked; status ${task.status}`, task, syncResults)
        return EXIT_SUCCESS
      }
      case 'override': {
        if (gateId === undefined || !isGateId(gateId)) return EXIT_USAGE_ERROR
        const task = controller.overrideStuckGate(options.taskId, gateId, actor)
        writeResult(options, `Cleared stuck gate ${gateId} on ${task.id}; status ${task.status}`, task)
        return EXIT_SUCCESS
      }
      case 'archive': {
        const current = container.store.load(options.taskId)
        if (!(await confirmer.confirm(`Archive "${current.title}" (${current.id})? This cannot be undone.`))) {
          writeResult(options, 'Archive cancelled.', current)
          return EXIT_SUCCESS
        }
        const task = controller.archive(options.taskId, actor)
        writeResult(options, `${task.id} archived`, task)
        return EXIT_SUCCESS
      }
    }
  })
}

export function registerOperatorCommands(program: Command, _version: string, projectRoot = process.cwd()): void {
  addTaskFlags(
    program
      .command('block <taskId>')
      .description('Pause a task; unblock returns it to where it was')
      .requiredOption('--reason <text>', 'Why the task is blocked'),
  ).action(async (taskId: string, opts: TaskCommandFlags & { reason: string }) => {
    process.exitCode = await runOperatorAction({
      ...taskOptionsFrom(opts, projectRoot),
      command: 'block',
      taskId,
      reason: opts.reason,
    })
  })

  addTaskFlags(program.command('unblock <taskId>').description('Return a blocked task to its previous status')).action(
    async (taskId: string, opts: TaskCommandFlags) => {
      process.exitCode = await runOperatorAction({ ...taskOptionsFrom(opts, projectRoot), command: 'unblock', taskId })
    },
  )

  addTaskFlags(
    program.command('override <taskId> <gateId>').description('Clear a stuck gate so it can be entered again'),
  ).action(async (taskId: string, gateId: string, opts: TaskCommandFlags) => {
    process.exitCode = await runOperatorAction({
      ...taskOptionsFrom(opts, projectRoot),
      command: 'override',
      taskId,
      gateId,
    })
  })

  addTaskFlags(program.command('archive <taskId>').description('Archive a task that will not be finished')).action(
    async (taskId: string, opts: TaskCommandFlags) => {
      process.exitCode = await runOperatorAction({ ...taskOptionsFrom(opts, projectRoot), command: 'archive', taskId })
    },
  )
}
