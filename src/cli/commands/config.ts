/**
 * `taskgate config` command group
 *
 * Subcommands:
 *   - `taskgate config show`              display merged config (credentials masked)
 *   - `taskgate config get <key>`         print one value by dot-notation key
 *   - `taskgate config set <key> <value>` update a project config value
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Invalid configuration, unknown key or invalid value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem, getByPath } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  projectConfigDirOf,
  reportError,
  type CommandContextOptions,
} from '../utils/command-context.js'

function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

async function loadSystem(opts: CommandContextOptions): Promise<ConfigSystem> {
  const system = createConfigSystem({
    projectConfigDir: projectConfigDirOf(opts),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  await system.load()
  return system
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends CommandContextOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions): Promise<number> {
  try {
    const masked = (await loadSystem(opts)).getMasked()
    if (opts.format === 'json') {
      process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
    } else {
      process.stdout.write('# taskgate configuration (credentials masked)\n\n')
      process.stdout.write(yaml.dump(masked))
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: CommandContextOptions): Promise<number> {
  try {
    const value = getByPath((await loadSystem(opts)).getMasked(), key)
    if (value === undefined) {
      process.stderr.write(`Error: Unknown or unset config key: ${key}\n`)
      return EXIT_USAGE_ERROR
    }
    process.stdout.write(typeof value === 'object' && value !== null ? yaml.dump(value) : `${String(value)}\n`)
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(key: string, rawValue: string, opts: CommandContextOptions): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('Error: key must not be empty\n')
    return EXIT_USAGE_ERROR
  }

  const value = coerceValue(rawValue)
  try {
    const system = await loadSystem(opts)
    await system.set(key, value)
    process.stdout.write(`Set ${key} = ${JSON.stringify(value)}\n`)
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err)
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command, _version: string, projectRoot = process.cwd()): void {
  const configCmd = program.command('config').description('View and modify taskgate configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (opts: { format: string }) => {
      process.exitCode = await runConfigShow({
        projectRoot,
        format: opts.format === 'json' ? 'json' : 'yaml',
      })
    })

  configCmd
    .command('get <key>')
    .description('Print a configuration value (e.g. gates.max_revisions)')
    .action(async (key: string) => {
      process.exitCode = await runConfigGet(key, { projectRoot })
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a project configuration value using dot-notation (e.g. global.log_level debug)')
    .action(async (key: string, value: string) => {
      process.exitCode = await runConfigSet(key, value, { projectRoot })
    })
}
