/**
 * Built-in default configuration.
 * Lowest priority in the merge hierarchy.
 */

import type { TaskgateConfig } from './config-schema.js'

/** Default sub-agent timeout: 5 minutes */
export const DEFAULT_DISPATCH_TIMEOUT_MS = 300_000

/** Default external call timeout: 30 seconds */
export const DEFAULT_SYNC_TIMEOUT_MS = 30_000

export const DEFAULT_MAX_REVISIONS = 5

export const DEFAULT_CONFIG: TaskgateConfig = {
  config_format_version: '1',
  global: {
    log_level: 'info',
    database_path: '.taskgate/state.db',
  },
  gates: {
    max_revisions: DEFAULT_MAX_REVISIONS,
  },
  dispatch: {
    timeout_ms: DEFAULT_DISPATCH_TIMEOUT_MS,
    stale_grace_ms: 60_000,
    agents: {},
  },
  sync: {
    timeout_ms: DEFAULT_SYNC_TIMEOUT_MS,
    version_control: {
      kind: 'git',
      remote: 'origin',
      base_branch: 'main',
      branch_prefix: 'task/',
    },
    issue_tracker: {
      kind: 'github',
      token_env: 'GH_TOKEN',
    },
  },
}
