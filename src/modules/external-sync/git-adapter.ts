/**
 * GitVersionControlAdapter: branches through git, change requests through
 * GitHub pull requests (`gh pr`).
 */

import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { lastLine, parseGhJson, runGh, type GhOptions } from './gh-utils.js'
import { runChecked, spawnProcess } from './spawn-utils.js'
import type {
  ChangeRequestInfo,
  ChangeRequestState,
  OpenChangeRequestInput,
  VersionControlAdapter,
} from './types.js'

const logger = createLogger('git-adapter')

export interface GitAdapterOptions {
  /** Working copy the commands run in */
  cwd: string
  remote: string
  gh?: Omit<GhOptions, 'cwd'>
}

const PrStateSchema = z.enum(['OPEN', 'MERGED', 'CLOSED'])

const PrListSchema = z.array(z.object({ url: z.string(), state: PrStateSchema }))

const PrViewSchema = z.object({ state: PrStateSchema })

function toChangeRequestState(state: z.infer<typeof PrStateSchema>): ChangeRequestState {
  switch (state) {
    case 'OPEN':
      return 'open'
    case 'MERGED':
      return 'merged'
    case 'CLOSED':
      return 'closed'
  }
}

export class GitVersionControlAdapter implements VersionControlAdapter {
  private readonly _cwd: string
  private readonly _remote: string
  private readonly _gh: GhOptions

  constructor(options: GitAdapterOptions) {
    this._cwd = options.cwd
    this._remote = options.remote
    this._gh = { ...options.gh, cwd: options.cwd }
  }

  async findBranch(branch: string, signal: AbortSignal): Promise<boolean> {
    const stdout = await this._git(['ls-remote', '--heads', this._remote, branch], signal)
    return stdout.split('\n').some((line) => line.endsWith(`refs/heads/${branch}`))
  }

  async createBranch(branch: string, base: string, signal: AbortSignal): Promise<void> {
    await this._git(['fetch', this._remote, base], signal)

    const local = await spawnProcess('git', ['rev-parse', '--verify', '--quiet', `refs/heads/${branch}`], {
      cwd: this._cwd,
      signal,
    })
    if (local.code !== 0) {
      await this._git(['branch', branch, `${this._remote}/${base}`], signal)
    } else {
      logger.debug({ branch }, 'Local branch already exists; publishing it')
    }
    await this._git(['push', '--set-upstream', this._remote, branch], signal)
  }

  async pushBranch(branch: string, signal: AbortSignal): Promise<void> {
    await this._git(['push', this._remote, branch], signal)
  }

  async findChangeRequest(branch: string, signal: AbortSignal): Promise<ChangeRequestInfo | null> {
    const stdout = await runGh(
      ['pr', 'list', '--head', branch, '--state', 'all', '--json', 'url,state', '--limit', '1'],
      this._gh,
      signal,
    )
    const [first] = parseGhJson(PrListSchema, stdout, 'pr list')
    return first !== undefined ? { ref: first.url, state: toChangeRequestState(first.state) } : null
  }

  async openChangeRequest(input: OpenChangeRequestInput, signal: AbortSignal): Promise<string> {
    const stdout = await runGh(
      ['pr', 'create', '--head', input.branch, '--base', input.base, '--title', input.title, '--body', input.body],
      this._gh,
      signal,
    )
    return lastLine(stdout)
  }

  async getChangeRequestState(ref: string, signal: AbortSignal): Promise<ChangeRequestState> {
    const stdout = await runGh(['pr', 'view', ref, '--json', 'state'], this._gh, signal)
    return toChangeRequestState(parseGhJson(PrViewSchema, stdout, 'pr view').state)
  }

  async mergeChangeRequest(ref: string, signal: AbortSignal): Promise<void> {
    await runGh(['pr', 'merge', ref, '--merge'], this._gh, signal)
  }

  private _git(args: string[], signal: AbortSignal): Promise<string> {
    return runChecked('git', args, { cwd: this._cwd, signal })
  }
}
