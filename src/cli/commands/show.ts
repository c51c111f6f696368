/**
 * `taskgate show` command
 *
 * Usage:
 *   taskgate show <taskId>                    Markdown task document
 *   taskgate show <taskId> --format yaml      YAML exchange form (readable by `create --from`)
 *   taskgate show <taskId> --export task.md   Write to a file (.md gets markdown, others YAML)
 *   taskgate show <taskId> --output-format json
 */

import type { Command } from 'commander'
import type { TaskId } from '../../core/types.js'
import {
  exportTaskDocument,
  renderTaskDocument,
  serializeTaskDocument,
  toTaskDocument,
} from '../../modules/task-store/task-document.js'
import { emitEvent } from '../formatters/streaming.js'
import {
  EXIT_SUCCESS,
  addTaskFlags,
  runTaskCommand,
  taskOptionsFrom,
  type TaskCommandFlags,
  type TaskCommandOptions,
} from '../utils/command-context.js'

export interface ShowActionOptions extends TaskCommandOptions {
  taskId: TaskId
  format?: 'markdown' | 'yaml'
  exportPath?: string
}

export function runShowAction(options: ShowActionOptions): Promise<number> {
  return runTaskCommand(options, async ({ container }) => {
    const task = container.store.load(options.taskId)

    if (options.exportPath !== undefined) {
      exportTaskDocument(task, options.exportPath)
      if (options.outputFormat === 'json') {
        emitEvent('show:exported', { taskId: task.id, path: options.exportPath })
      } else {
        process.stdout.write(`Wrote ${task.id} to ${options.exportPath}\n`)
      }
      return EXIT_SUCCESS
    }

    if (options.outputFormat === 'json') {
      emitEvent('show:task', { document: toTaskDocument(task), changelog: task.changelog })
    } else if (options.format === 'yaml') {
      process.stdout.write(serializeTaskDocument(task))
    } else {
      process.stdout.write(renderTaskDocument(task))
    }
    return EXIT_SUCCESS
  })
}

export function registerShowCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  addTaskFlags(
    program
      .command('show <taskId>')
      .description('Print the task document')
      .option('--format <format>', 'Document format: markdown (default) or yaml', 'markdown')
      .option('--export <file>', 'Write the document to a file instead'),
  ).action(async (taskId: string, opts: TaskCommandFlags & { format: string; export?: string }) => {
    process.exitCode = await runShowAction({
      ...taskOptionsFrom(opts, projectRoot),
      taskId,
      format: opts.format === 'yaml' ? 'yaml' : 'markdown',
      ...(opts.export !== undefined && { exportPath: opts.export }),
    })
  })
}
