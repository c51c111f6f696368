/**
 * Builds the `taskgate` commander program.
 */

import { Command } from 'commander'
import { readFile } from 'fs/promises'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { registerConfigCommand } from './commands/config.js'
import { registerContinueCommand } from './commands/continue.js'
import { registerCreateCommand } from './commands/create.js'
import { registerHandoverCommand } from './commands/handover.js'
import { registerInitCommand } from './commands/init.js'
import { registerOperatorCommands } from './commands/operator.js'
import { registerReconcileCommand } from './commands/reconcile.js'
import { registerShowCommand } from './commands/show.js'
import { registerStageCommands } from './commands/stages.js'
import { registerStatusCommand } from './commands/status.js'

const PackageJsonSchema = z.object({ version: z.string() })

/** Read the version from package.json, whether running from src/ or dist/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../../../package.json')]

  for (const pkgPath of candidates) {
    try {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(await readFile(pkgPath, 'utf-8')))
      if (parsed.success) return parsed.data.version
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()
  const program = new Command()

  program
    .name('taskgate')
    .description('Move a task through gated review, implementation and merge')
    .version(version, '-v, --version', 'Output the current version')

  registerInitCommand(program, version, projectRoot)
  registerConfigCommand(program, version, projectRoot)
  registerCreateCommand(program, version, projectRoot)
  registerStageCommands(program, version, projectRoot)
  registerContinueCommand(program, version, projectRoot)
  registerHandoverCommand(program, version, projectRoot)
  registerStatusCommand(program, version, projectRoot)
  registerShowCommand(program, version, projectRoot)
  registerOperatorCommands(program, version, projectRoot)
  registerReconcileCommand(program, version, projectRoot)

  return program
}
