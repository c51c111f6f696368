/**
 * `taskgate init` command
 *
 * Creates `.taskgate/` in the project with a config.yaml and an empty,
 * migrated state database.
 *
 * Usage:
 *   taskgate init
 *   taskgate init --no-issue-tracker --operator alice
 *   taskgate init --repo acme/widgets --base-branch develop --force
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Config already exists (without --force) or invalid options
 */

import type { Command } from 'commander'
import { access, mkdir, writeFile } from 'fs/promises'
import { join, resolve } from 'path'
import yaml from 'js-yaml'
import { createContainer } from '../../core/container-impl.js'
import { AutoConfirmer } from '../../modules/lifecycle/confirmer.js'
import {
  CURRENT_CONFIG_FORMAT_VERSION,
  PartialTaskgateConfigSchema,
  type PartialTaskgateConfig,
} from '../../modules/config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  loadConfig,
  projectConfigDirOf,
  reportError,
  type CommandContextOptions,
} from '../utils/command-context.js'

const logger = createLogger('init')

export interface InitOptions extends CommandContextOptions {
  force?: boolean
  operator?: string
  versionControl?: boolean
  issueTracker?: boolean
  repo?: string
  baseBranch?: string
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/** The project config written by init; only what differs from defaults */
export function buildInitConfig(options: InitOptions): PartialTaskgateConfig {
  const config: PartialTaskgateConfig = { config_format_version: CURRENT_CONFIG_FORMAT_VERSION }
  if (options.operator !== undefined) {
    config.global = { operator: options.operator }
  }

  const versionControl = {
    ...(options.versionControl === false && { kind: 'disabled' as const }),
    ...(options.baseBranch !== undefined && { base_branch: options.baseBranch }),
  }
  const issueTracker = {
    ...(options.issueTracker === false && { kind: 'disabled' as const }),
    ...(options.repo !== undefined && { repo: options.repo }),
  }
  if (Object.keys(versionControl).length > 0 || Object.keys(issueTracker).length > 0) {
    config.sync = {
      ...(Object.keys(versionControl).length > 0 && { version_control: versionControl }),
      ...(Object.keys(issueTracker).length > 0 && { issue_tracker: issueTracker }),
    }
  }
  return config
}

export async function runInitAction(options: InitOptions): Promise<number> {
  const configDir = projectConfigDirOf(options)
  const configPath = join(configDir, 'config.yaml')

  if ((await fileExists(configPath)) && options.force !== true) {
    process.stderr.write(`Error: ${configPath} already exists. Use --force to overwrite.\n`)
    return EXIT_USAGE_ERROR
  }

  const parsed = PartialTaskgateConfigSchema.safeParse(buildInitConfig(options))
  if (!parsed.success) {
    process.stderr.write('Error: Invalid init options:\n')
    for (const issue of parsed.error.issues) {
      process.stderr.write(`  • ${issue.path.join('.')}: ${issue.message}\n`)
    }
    return EXIT_USAGE_ERROR
  }

  try {
    await mkdir(configDir, { recursive: true })
    await writeFile(configPath, yaml.dump(parsed.data), 'utf-8')
    logger.debug({ configPath }, 'Wrote project config')

    const config = await loadConfig(options)
    // Opening the container creates the database and runs migrations
    const container = await createContainer({
      ...options.containerOverrides,
      config,
      projectRoot: resolve(options.projectRoot),
      confirmer: new AutoConfirmer(),
    })
    await container.shutdown()
  } catch (err) {
    return reportError(err)
  }

  process.stdout.write(`Initialized taskgate in ${configDir}\n`)
  return EXIT_SUCCESS
}

export function registerInitCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  program
    .command('init')
    .description('Create .taskgate/ with a config file and the state database')
    .option('--force', 'Overwrite an existing config file')
    .option('--operator <name>', 'Identity recorded on confirmations')
    .option('--no-version-control', 'Do not create branches or change requests')
    .option('--no-issue-tracker', 'Do not mirror tasks into an issue tracker')
    .option('--repo <owner/name>', 'Repository that hosts issues and change requests')
    .option('--base-branch <branch>', 'Branch that task branches start from and merge into')
    .action(
      async (opts: {
        force?: boolean
        operator?: string
        versionControl: boolean
        issueTracker: boolean
        repo?: string
        baseBranch?: string
      }) => {
        const exitCode = await runInitAction({
          projectRoot,
          versionControl: opts.versionControl,
          issueTracker: opts.issueTracker,
          ...(opts.force !== undefined && { force: opts.force }),
          ...(opts.operator !== undefined && { operator: opts.operator }),
          ...(opts.repo !== undefined && { repo: opts.repo }),
          ...(opts.baseBranch !== undefined && { baseBranch: opts.baseBranch }),
        })
        process.exitCode = exitCode
      },
    )
}
