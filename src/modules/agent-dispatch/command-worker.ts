/**
 * CommandWorker: runs a sub-agent as an external command.
 *
 * Protocol:
 *  - the TaskContext is written to stdin as YAML (snake_case keys)
 *  - the command prints whatever it likes, ending with a YAML block that
 *    starts with `verdict:` (optionally fenced)
 *  - a non-zero exit code is an agent error
 */

import yaml from 'js-yaml'
import type { AgentName } from '../../core/types.js'
import { spawnProcess } from '../external-sync/spawn-utils.js'
import type { AgentCommandConfig } from '../config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import { WorkerOutputSchema } from './artifact-schemas.js'
import type { TaskContext, Worker, WorkerOutput } from './types.js'
import { extractYamlBlock, parseYamlResult } from './yaml-parser.js'

const logger = createLogger('command-worker')

/** Error raised by a worker whose output could not be understood */
export class WorkerOutputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'WorkerOutputError'
  }
}

/** Error raised by a worker process that exited unsuccessfully */
export class WorkerProcessError extends Error {
  public readonly exitCode: number

  constructor(message: string, exitCode: number) {
    super(message)
    this.name = 'WorkerProcessError'
    this.exitCode = exitCode
  }
}

/**
 * Serialize a context for a worker's stdin.
 */
export function serializeContext(agent: AgentName, context: TaskContext): string {
  return yaml.dump(
    {
      agent,
      task_id: context.taskId,
      title: context.title,
      status: context.status,
      parent_id: context.parentId,
      gate: context.gateId,
      instructions: context.instructions,
      requirements: context.requirements,
      test_plan: context.testPlan,
      steps: context.steps.map((s) => ({
        description: s.description,
        acceptance_criteria: [...s.acceptanceCriteria],
        state: s.completionState,
        evidence: s.evidence,
        split_task: s.splitRef?.childTaskId ?? null,
      })),
      gates_passed: [...context.gatesPassed],
      refs: {
        branch: context.branchRef,
        issue: context.issueRef,
        change_request: context.changeRequestRef,
      },
      handover: context.handover,
      recent_changelog: context.recentChangelog.map((e) => ({ ...e })),
    },
    { lineWidth: 120, noRefs: true },
  )
}

export class CommandWorker implements Worker {
  readonly name: AgentName
  private readonly _config: AgentCommandConfig
  private readonly _cwd: string

  constructor(name: AgentName, config: AgentCommandConfig, cwd: string) {
    this.name = name
    this._config = config
    this._cwd = config.cwd ?? cwd
  }

  async run(context: TaskContext, signal: AbortSignal): Promise<WorkerOutput> {
    logger.debug({ agent: this.name, command: this._config.command, taskId: context.taskId }, 'Running worker command')

    const result = await spawnProcess(this._config.command, this._config.args, {
      cwd: this._cwd,
      signal,
      input: serializeContext(this.name, context),
    })

    if (result.code !== 0) {
      const tail = (result.stderr !== '' ? result.stderr : result.stdout).split('\n').slice(-5).join('\n')
      throw new WorkerProcessError(`exited with code ${String(result.code)}: ${tail}`, result.code)
    }

    const block = extractYamlBlock(result.stdout)
    if (block === null) {
      throw new WorkerOutputError('no YAML result block (expected a trailing "verdict:" block)')
    }

    const parsed = parseYamlResult(block, WorkerOutputSchema)
    if (parsed.parsed === null) {
      throw new WorkerOutputError(parsed.error)
    }
    return parsed.parsed
  }
}
