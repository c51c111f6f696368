/**
 * spawn-utils.ts: subprocess helpers shared by the git and gh adapters.
 *
 * Commands are executed via child_process.spawn; no shell is involved, so
 * arguments are never re-parsed.
 */

import { spawn } from 'node:child_process'
import { maskSecrets } from '../../cli/utils/masking.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('spawn-utils')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Kills the child with SIGTERM when aborted */
  signal?: AbortSignal
  /** Written to stdin, which is then closed */
  input?: string
}

export interface SpawnResult {
  stdout: string
  stderr: string
  code: number
}

/** A subprocess exited non-zero */
export class CommandFailedError extends Error {
  public readonly code: number
  public readonly stderr: string

  constructor(command: string, args: string[], result: SpawnResult) {
    const detail = result.stderr !== '' ? result.stderr : result.stdout
    super(maskSecrets(`${command} ${args.join(' ')} exited with code ${String(result.code)}: ${detail}`))
    this.name = 'CommandFailedError'
    this.code = result.code
    this.stderr = maskSecrets(result.stderr)
  }
}

// ---------------------------------------------------------------------------
// spawnProcess
// ---------------------------------------------------------------------------

/**
 * Spawn a subprocess and collect its output. Never rejects; a spawn error
 * is reported as exit code 1 with the error message on stderr.
 */
export function spawnProcess(command: string, args: string[], options: SpawnOptions = {}): Promise<SpawnResult> {
  return new Promise((resolve) => {
    logger.debug({ command, args, cwd: options.cwd }, 'spawn')

    if (options.signal?.aborted === true) {
      resolve({ stdout: '', stderr: 'aborted before start', code: 1 })
      return
    }

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''

    const onAbort = (): void => {
      proc.kill('SIGTERM')
    }
    options.signal?.addEventListener('abort', onAbort, { once: true })

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    if (options.input !== undefined && proc.stdin !== null) {
      // EPIPE when the child exits without reading stdin is reported through close
      proc.stdin.on('error', (err) => {
        logger.debug({ command, err: err.message }, 'stdin closed early')
      })
      proc.stdin.end(options.input)
    }

    proc.on('close', (code) => {
      options.signal?.removeEventListener('abort', onAbort)
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err) => {
      options.signal?.removeEventListener('abort', onAbort)
      resolve({ stdout: '', stderr: err.message, code: 1 })
    })
  })
}

/**
 * Run a command and return its stdout, throwing CommandFailedError on a
 * non-zero exit.
 */
export async function runChecked(command: string, args: string[], options: SpawnOptions = {}): Promise<string> {
  const result = await spawnProcess(command, args, options)
  if (result.code !== 0) {
    throw new CommandFailedError(command, args, result)
  }
  return result.stdout
}

// ---------------------------------------------------------------------------
// git version
// ---------------------------------------------------------------------------

const MIN_GIT_MAJOR = 2
const MIN_GIT_MINOR = 20

/**
 * Installed git version string like "2.42.0".
 *
 * @throws Error if git is not installed or version cannot be parsed
 */
export async function getGitVersion(): Promise<string> {
  const stdout = await runChecked('git', ['--version'])
  const match = /git version\s+(\d+\.\d+(?:\.\d+)?)/.exec(stdout)
  if (match === null || match[1] === undefined) {
    throw new Error(`Unable to parse git version from output: "${stdout}"`)
  }
  return match[1]
}

export function isGitVersionSupported(version: string): boolean {
  const [major = 0, minor = 0] = version.split('.').map(Number)
  if (major !== MIN_GIT_MAJOR) return major > MIN_GIT_MAJOR
  return minor >= MIN_GIT_MINOR
}
