/**
 * Zod validation schemas for the taskgate configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - gate limits
 *  - sub-agent dispatch (timeouts, worker commands)
 *  - external sync (version control, issue tracker)
 *  - full config document
 */

import { z } from 'zod'
import { AGENT_NAMES } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Global / project settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** SQLite file, relative to the project directory unless absolute */
    database_path: z.string().min(1),
    /** Identity recorded on confirmations when none is given on the command line */
    operator: z.string().min(1).optional(),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Gates
// ---------------------------------------------------------------------------

export const GatesConfigSchema = z
  .object({
    /** NeedsRevision verdicts a gate may collect before it is marked stuck */
    max_revisions: z.number().int().min(1).max(100),
  })
  .strict()

export type GatesConfig = z.infer<typeof GatesConfigSchema>

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export const AgentNameSchema = z.enum(AGENT_NAMES)

/** How to run one sub-agent as an external command */
export const AgentCommandSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    /** Overrides dispatch.timeout_ms for this agent */
    timeout_ms: z.number().int().positive().optional(),
    cwd: z.string().optional(),
  })
  .strict()

export type AgentCommandConfig = z.infer<typeof AgentCommandSchema>

export const DispatchConfigSchema = z
  .object({
    timeout_ms: z.number().int().positive(),
    /** Extra age beyond timeout_ms after which an open agent invocation is treated as abandoned */
    stale_grace_ms: z.number().int().min(0),
    agents: z.record(AgentNameSchema, AgentCommandSchema),
  })
  .strict()

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>

// ---------------------------------------------------------------------------
// External sync
// ---------------------------------------------------------------------------

export const VersionControlConfigSchema = z
  .object({
    kind: z.enum(['git', 'disabled']),
    remote: z.string().min(1),
    base_branch: z.string().min(1),
    branch_prefix: z.string(),
  })
  .strict()

export type VersionControlConfig = z.infer<typeof VersionControlConfigSchema>

export const IssueTrackerConfigSchema = z
  .object({
    kind: z.enum(['github', 'disabled']),
    /** owner/name; the gh CLI infers it from the working copy when omitted */
    repo: z.string().optional(),
    /** Name of the environment variable that holds the tracker token */
    token_env: z.string().min(1),
  })
  .strict()

export type IssueTrackerConfig = z.infer<typeof IssueTrackerConfigSchema>

export const SyncConfigSchema = z
  .object({
    timeout_ms: z.number().int().positive(),
    version_control: VersionControlConfigSchema,
    issue_tracker: IssueTrackerConfigSchema,
  })
  .strict()

export type SyncConfig = z.infer<typeof SyncConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this build can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const TaskgateConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    gates: GatesConfigSchema,
    dispatch: DispatchConfigSchema,
    sync: SyncConfigSchema,
  })
  .strict()

export type TaskgateConfig = z.infer<typeof TaskgateConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files and overrides before merging)
// ---------------------------------------------------------------------------

export const PartialTaskgateConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    gates: GatesConfigSchema.partial().optional(),
    dispatch: z
      .object({
        timeout_ms: z.number().int().positive(),
        stale_grace_ms: z.number().int().min(0),
        agents: z.record(AgentNameSchema, AgentCommandSchema),
      })
      .strict()
      .partial()
      .optional(),
    sync: z
      .object({
        timeout_ms: z.number().int().positive(),
        version_control: VersionControlConfigSchema.partial(),
        issue_tracker: IssueTrackerConfigSchema.partial(),
      })
      .strict()
      .partial()
      .optional(),
  })
  .strict()

export type PartialTaskgateConfig = z.infer<typeof PartialTaskgateConfigSchema>
