/**
 * Helpers for driving the GitHub CLI (`gh`).
 */

import { z } from 'zod'
import { runChecked } from './spawn-utils.js'

export interface GhOptions {
  cwd?: string
  /** owner/name; omitted to let gh use the working copy's remote */
  repo?: string
  /** Environment variable holding the token; exported to gh as GH_TOKEN */
  tokenEnv?: string
  env?: NodeJS.ProcessEnv
}

export function ghEnv(options: GhOptions): NodeJS.ProcessEnv {
  const base = options.env ?? process.env
  const token = options.tokenEnv !== undefined ? base[options.tokenEnv] : undefined
  return {
    ...base,
    GH_PROMPT_DISABLED: '1',
    NO_COLOR: '1',
    ...(token !== undefined && token !== '' ? { GH_TOKEN: token } : {}),
  }
}

/**
 * Run `gh` with the repo flag appended when configured and return stdout.
 */
export function runGh(args: string[], options: GhOptions, signal: AbortSignal): Promise<string> {
  const fullArgs = options.repo !== undefined ? [...args, '--repo', options.repo] : args
  return runChecked('gh', fullArgs, { cwd: options.cwd, env: ghEnv(options), signal })
}

/**
 * Parse gh `--json` output against a schema.
 */
export function parseGhJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, stdout: string, what: string): T {
  let raw: unknown
  try {
    raw = JSON.parse(stdout)
  } catch {
    throw new Error(`gh returned non-JSON output for ${what}`)
  }
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new Error(`gh returned unexpected JSON for ${what}: ${result.error.issues[0]?.message ?? 'invalid'}`)
  }
  return result.data
}

/** Last non-empty line of gh output; `gh * create` prints the new URL there */
export function lastLine(stdout: string): string {
  const lines = stdout.split('\n').map((l) => l.trim()).filter((l) => l !== '')
  const last = lines[lines.length - 1]
  if (last === undefined) {
    throw new Error('gh printed no reference')
  }
  return last
}
