/**
 * Shared plumbing for task commands: load configuration, open the
 * container against the project's database, run the action and map
 * failures to exit codes.
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error (unexpected exception)
 *   2 - Usage or state error (unknown task, gate out of order, stuck gate, ...)
 */

import type { Command } from 'commander'
import { existsSync } from 'fs'
import { join, resolve } from 'path'
import {
  ConfigError,
  ConfigIncompatibleFormatError,
  IllegalTransitionError,
  NoOpenInvocationError,
  OutOfOrderGateError,
  StuckGateError,
  TaskDocumentError,
  TaskInvariantError,
  TaskNotFoundError,
  TaskgateError,
} from '../../core/errors.js'
import type { Container, ContainerConfig } from '../../core/container.js'
import { createContainer, resolveDatabasePath } from '../../core/container-impl.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { TaskgateConfig } from '../../modules/config/config-schema.js'
import type { Confirmer } from '../../modules/lifecycle/confirmer.js'
import { IN_MEMORY } from '../../persistence/database.js'
import { streamLifecycleEvents } from '../formatters/streaming.js'
import { setupGracefulShutdown } from '../../recovery/shutdown-handler.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from './masking.js'
import { createCliConfirmer } from './readline-confirmer.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE_ERROR = 2

export type OutputFormat = 'human' | 'json'

export function parseOutputFormat(value: string | undefined): OutputFormat {
  return value === 'json' ? 'json' : 'human'
}

// ---------------------------------------------------------------------------
// Options shared by every task command
// ---------------------------------------------------------------------------

export interface CommandContextOptions {
  projectRoot: string
  /** Defaults to <projectRoot>/.taskgate */
  projectConfigDir?: string
  globalConfigDir?: string
  /** Environment for TASKGATE_* overrides and the operator fallback */
  env?: NodeJS.ProcessEnv
  /**
   * Replace parts of the wiring (adapters, workers, database path).
   * Used by tests to run commands against in-process fakes.
   */
  containerOverrides?: Partial<Omit<ContainerConfig, 'config' | 'projectRoot' | 'confirmer'>>
}

export function projectConfigDirOf(options: CommandContextOptions): string {
  return options.projectConfigDir ?? join(resolve(options.projectRoot), '.taskgate')
}

export async function loadConfig(options: CommandContextOptions): Promise<TaskgateConfig> {
  const system = createConfigSystem({
    projectConfigDir: projectConfigDirOf(options),
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
    ...(options.env !== undefined && { env: options.env }),
  })
  await system.load()
  return system.getConfig()
}

/**
 * Identity recorded on confirmations: --actor, then `global.operator`,
 * then $USER.
 */
export function resolveActor(
  explicit: string | undefined,
  config: TaskgateConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicit !== undefined && explicit !== '') return explicit
  if (config.global.operator !== undefined) return config.global.operator
  const user = env['USER'] ?? env['USERNAME']
  return user !== undefined && user !== '' ? user : 'operator'
}

// ---------------------------------------------------------------------------
// Container lifecycle
// ---------------------------------------------------------------------------

export interface CommandScope {
  container: Container
  config: TaskgateConfig
}

/**
 * Load config, open the existing database and run `fn`. The container is
 * always shut down afterwards. Errors are reported on stderr and turned
 * into an exit code; `fn` returns the code for the success path.
 */
export async function withContainer(
  options: CommandContextOptions,
  confirmer: Confirmer,
  fn: (scope: CommandScope) => Promise<number>,
): Promise<number> {
  let container: Container | undefined
  let removeSignalHandlers: (() => void) | undefined
  try {
    const config = await loadConfig(options)
    const projectRoot = resolve(options.projectRoot)
    const overrides = options.containerOverrides ?? {}
    const databasePath = resolveDatabasePath(
      overrides.databasePath ?? config.global.database_path,
      projectRoot,
    )

    if (databasePath !== IN_MEMORY && !existsSync(databasePath)) {
      process.stderr.write(
        `Error: No taskgate database found at ${databasePath}. Run \`taskgate init\` first.\n`,
      )
      return EXIT_USAGE_ERROR
    }

    container = await createContainer({ ...overrides, config, projectRoot, databasePath, confirmer })
    removeSignalHandlers = setupGracefulShutdown({ services: container.services })
    return await fn({ container, config })
  } catch (err) {
    return reportError(err)
  } finally {
    removeSignalHandlers?.()
    if (container !== undefined) {
      try {
        await container.shutdown()
      } catch (err) {
        logger.warn({ err }, 'Container shutdown failed')
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Task commands
// ---------------------------------------------------------------------------

export interface TaskCommandOptions extends CommandContextOptions {
  outputFormat: OutputFormat
  /** Answer yes to every confirmation */
  yes?: boolean
  actor?: string
  /** Stream lifecycle events as they happen, before the summary */
  events?: boolean
  /** Override for testing */
  isTTY?: boolean
}

export interface TaskCommandFlags {
  outputFormat?: string
  yes?: boolean
  actor?: string
  events?: boolean
}

export interface TaskScope extends CommandScope {
  actor: string
  confirmer: Confirmer
}

/** Flags every task command accepts */
export function addTaskFlags(command: Command): Command {
  return command
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('-y, --yes', 'Answer yes to confirmation prompts')
    .option('--actor <name>', 'Identity recorded on confirmations and changelog entries')
    .option('--events', 'Stream gate, dispatch and sync events while the command runs')
}

export function taskOptionsFrom(flags: TaskCommandFlags, projectRoot: string): TaskCommandOptions {
  return {
    projectRoot,
    outputFormat: parseOutputFormat(flags.outputFormat),
    ...(flags.yes !== undefined && { yes: flags.yes }),
    ...(flags.actor !== undefined && { actor: flags.actor }),
    ...(flags.events !== undefined && { events: flags.events }),
  }
}

export function runTaskCommand(
  options: TaskCommandOptions,
  fn: (scope: TaskScope) => Promise<number>,
): Promise<number> {
  const confirmer = createCliConfirmer({
    ...(options.yes !== undefined && { yes: options.yes }),
    ...(options.isTTY !== undefined && { isTTY: options.isTTY }),
  })
  return withContainer(options, confirmer, async (scope) => {
    const stopStreaming =
      options.events === true ? streamLifecycleEvents(scope.container.eventBus, options.outputFormat) : undefined
    try {
      return await fn({ ...scope, confirmer, actor: resolveActor(options.actor, scope.config, options.env) })
    } finally {
      stopStreaming?.()
    }
  })
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

const USAGE_ERRORS = [
  OutOfOrderGateError,
  StuckGateError,
  IllegalTransitionError,
  NoOpenInvocationError,
  TaskNotFoundError,
  TaskInvariantError,
  TaskDocumentError,
  ConfigError,
  ConfigIncompatibleFormatError,
] as const

export function exitCodeFor(err: unknown): number {
  return USAGE_ERRORS.some((ErrorClass) => err instanceof ErrorClass) ? EXIT_USAGE_ERROR : EXIT_ERROR
}

/** Write `Error: <message>` to stderr and return the matching exit code */
export function reportError(err: unknown): number {
  const code = exitCodeFor(err)
  const message = err instanceof Error ? err.message : String(err)
  if (code === EXIT_ERROR) {
    logger.error({ err }, 'Command failed')
  }
  process.stderr.write(`Error: ${maskSecrets(message)}\n`)
  if (err instanceof TaskDocumentError) {
    const issues = err.context['issues']
    if (Array.isArray(issues)) {
      for (const issue of issues) process.stderr.write(`  • ${String(issue)}\n`)
    }
  }
  if (err instanceof TaskgateError && code === EXIT_USAGE_ERROR) {
    logger.debug({ code: err.code, context: err.context }, 'Command rejected')
  }
  return code
}
