/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { TaskgateConfig, PartialTaskgateConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .taskgate/ directory (default: <cwd>/.taskgate) */
  projectConfigDir?: string
  /** Path to the user-level .taskgate/ directory (default: ~/.taskgate) */
  globalConfigDir?: string
  /** Highest-priority values, typically from CLI flags */
  cliOverrides?: PartialTaskgateConfig
  /** Environment to read TASKGATE_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): TaskgateConfig

  /** Value at a dot-notation key (e.g. "gates.max_revisions"), or undefined */
  get(key: string): unknown

  /**
   * Persist a single scalar value to the project config file.
   * @throws {ConfigError} if key is unknown or the value is invalid.
   */
  set(key: string, value: unknown): Promise<void>

  /** Merged config with credential values masked, safe to print */
  getMasked(): TaskgateConfig

  /** Directory holding the project config and, by default, the database */
  readonly projectConfigDir: string

  readonly isLoaded: boolean
}
