/**
 * `taskgate reconcile` command
 *
 * Finds external operations (branches, issues, status labels, change
 * requests) that a task's status implies but that never succeeded, and
 * re-issues them.
 *
 * Usage:
 *   taskgate reconcile              Repair every task
 *   taskgate reconcile <taskId>     Repair one task
 *   taskgate reconcile --dry-run    Only list the drift
 *
 * Exit codes:
 *   0 - No drift left
 *   1 - Some operations still fail (or system error)
 *   2 - Usage error (unknown task)
 */

import type { Command } from 'commander'
import type { TaskId } from '../../core/types.js'
import { emitEvent, syncResultToJson } from '../formatters/streaming.js'
import { renderDrift, renderReconcileReport } from '../formatters/task-formatter.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  addTaskFlags,
  runTaskCommand,
  taskOptionsFrom,
  type TaskCommandFlags,
  type TaskCommandOptions,
} from '../utils/command-context.js'
import type { RepairOutcome } from '../../recovery/reconciler.js'

export interface ReconcileActionOptions extends TaskCommandOptions {
  taskId?: TaskId
  dryRun?: boolean
}

function outcomeToJson(outcome: RepairOutcome): Record<string, unknown> {
  return { drift: outcome.drift, result: syncResultToJson(outcome.result) }
}

export function runReconcileAction(options: ReconcileActionOptions): Promise<number> {
  return runTaskCommand(options, async ({ container }) => {
    if (options.taskId !== undefined) {
      // Unknown ids are a usage error, not an empty report
      container.store.load(options.taskId)
    }

    if (options.dryRun === true) {
      const drift = container.reconciler.findDrift(options.taskId)
      if (options.outputFormat === 'json') {
        emitEvent('reconcile:drift', { drift })
      } else {
        process.stdout.write(renderDrift(drift) + '\n')
      }
      return EXIT_SUCCESS
    }

    const report = await container.reconciler.reconcile(options.taskId)
    if (options.outputFormat === 'json') {
      emitEvent('reconcile:completed', {
        repaired: report.repaired.map(outcomeToJson),
        failing: report.failing.map(outcomeToJson),
      })
    } else {
      process.stdout.write(renderReconcileReport(report) + '\n')
    }
    return report.failing.length > 0 ? EXIT_ERROR : EXIT_SUCCESS
  })
}

export function registerReconcileCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  addTaskFlags(
    program
      .command('reconcile [taskId]')
      .description('Re-issue external operations that did not complete')
      .option('--dry-run', 'List drifting operations without repairing them'),
  ).action(async (taskId: string | undefined, opts: TaskCommandFlags & { dryRun?: boolean }) => {
    process.exitCode = await runReconcileAction({
      ...taskOptionsFrom(opts, projectRoot),
      ...(taskId !== undefined && { taskId }),
      ...(opts.dryRun !== undefined && { dryRun: opts.dryRun }),
    })
  })
}
