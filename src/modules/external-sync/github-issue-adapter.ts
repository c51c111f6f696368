/**
 * GitHubIssueTrackerAdapter: GitHub issues through the `gh` CLI.
 *
 * The tracker status is carried as a single `status:<name>` label.
 */

import { z } from 'zod'
import { lastLine, parseGhJson, runGh, type GhOptions } from './gh-utils.js'
import type { CreateIssueInput, IssueTrackerAdapter } from './types.js'

export const STATUS_LABEL_PREFIX = 'status:'

const IssueSearchSchema = z.array(z.object({ url: z.string(), body: z.string() }))

const IssueLabelsSchema = z.object({
  labels: z.array(z.object({ name: z.string() })),
})

export function statusLabel(status: string): string {
  return `${STATUS_LABEL_PREFIX}${status}`
}

export class GitHubIssueTrackerAdapter implements IssueTrackerAdapter {
  private readonly _gh: GhOptions

  constructor(options: GhOptions = {}) {
    this._gh = options
  }

  async findIssue(marker: string, signal: AbortSignal): Promise<string | null> {
    const stdout = await runGh(
      ['issue', 'list', '--state', 'all', '--search', `"${marker}" in:body`, '--json', 'url,body', '--limit', '20'],
      this._gh,
      signal,
    )
    // Search is fuzzy; confirm the marker is really in the body
    const match = parseGhJson(IssueSearchSchema, stdout, 'issue list').find((issue) => issue.body.includes(marker))
    return match?.url ?? null
  }

  async createIssue(input: CreateIssueInput, signal: AbortSignal): Promise<string> {
    const stdout = await runGh(['issue', 'create', '--title', input.title, '--body', input.body], this._gh, signal)
    const ref = lastLine(stdout)
    await this.setStatus(ref, input.status, signal)
    return ref
  }

  async getStatus(ref: string, signal: AbortSignal): Promise<string | null> {
    const labels = await this._statusLabels(ref, signal)
    const first = labels[0]
    return first !== undefined ? first.slice(STATUS_LABEL_PREFIX.length) : null
  }

  async setStatus(ref: string, status: string, signal: AbortSignal): Promise<void> {
    const label = statusLabel(status)
    await runGh(['label', 'create', label, '--force', '--description', 'taskgate status'], this._gh, signal)

    const args = ['issue', 'edit', ref, '--add-label', label]
    for (const existing of await this._statusLabels(ref, signal)) {
      if (existing !== label) args.push('--remove-label', existing)
    }
    await runGh(args, this._gh, signal)
  }

  async comment(ref: string, body: string, signal: AbortSignal): Promise<void> {
    await runGh(['issue', 'comment', ref, '--body', body], this._gh, signal)
  }

  private async _statusLabels(ref: string, signal: AbortSignal): Promise<string[]> {
    const stdout = await runGh(['issue', 'view', ref, '--json', 'labels'], this._gh, signal)
    return parseGhJson(IssueLabelsSchema, stdout, 'issue view')
      .labels.map((l) => l.name)
      .filter((name) => name.startsWith(STATUS_LABEL_PREFIX))
  }
}
