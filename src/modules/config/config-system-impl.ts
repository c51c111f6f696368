/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.taskgate/config.yaml)
 *     → project config      (./.taskgate/config.yaml)
 *     → environment vars    (TASKGATE_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import {
  TaskgateConfigSchema,
  PartialTaskgateConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type TaskgateConfig,
  type PartialTaskgateConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` into `base`. Nested plain objects merge key by key;
 * arrays and scalars replace. `undefined` never overwrites.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of TASKGATE_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  TASKGATE_LOG_LEVEL: 'global.log_level',
  TASKGATE_DATABASE_PATH: 'global.database_path',
  TASKGATE_OPERATOR: 'global.operator',
  TASKGATE_MAX_REVISIONS: 'gates.max_revisions',
  TASKGATE_DISPATCH_TIMEOUT_MS: 'dispatch.timeout_ms',
  TASKGATE_SYNC_TIMEOUT_MS: 'sync.timeout_ms',
  TASKGATE_VERSION_CONTROL: 'sync.version_control.kind',
  TASKGATE_BASE_BRANCH: 'sync.version_control.base_branch',
  TASKGATE_ISSUE_TRACKER: 'sync.issue_tracker.kind',
  TASKGATE_ISSUE_REPO: 'sync.issue_tracker.repo',
}

function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialTaskgateConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, configPath, coerceEnvValue(rawValue))
  }

  const parsed = PartialTaskgateConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`, creating intermediate
 * objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) {
    return { ...obj, [head]: value }
  }
  const child = obj[head]
  return {
    ...obj,
    [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value),
  }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: TaskgateConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialTaskgateConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.taskgate')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.taskgate')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectConfigDir(): string {
    return this._projectConfigDir
  }

  async load(): Promise<void> {
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) {
      merged = deepMerge(merged, globalConfig)
    }

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) {
      merged = deepMerge(merged, projectConfig)
    }

    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) {
      merged = deepMerge(merged, envOverrides)
    }

    if (Object.keys(this._cliOverrides).length > 0) {
      merged = deepMerge(merged, this._cliOverrides)
    }

    const result = TaskgateConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): TaskgateConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    // Optional keys (global.operator, sync.issue_tracker.repo) are unset by default
    const optionalKeys = new Set(['global.operator', 'sync.issue_tracker.repo'])
    if (existing === undefined && !optionalKeys.has(key)) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }
    if (isPlainObject(existing) || Array.isArray(existing)) {
      throw new ConfigError(
        `Cannot set object key "${key}"; use a more specific dot-notation path`,
        { key }
      )
    }

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfigRaw: Record<string, unknown> =
      (await this._loadYamlFile(projectConfigPath)) ?? {}

    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialTaskgateConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(
        `Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`,
        { key, value, issues: partial.error.issues }
      )
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(partial.data), 'utf-8')

    await this.load()
  }

  getMasked(): TaskgateConfig {
    return TaskgateConfigSchema.parse(deepMask(this.getConfig()))
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialTaskgateConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    try {
      const raw = await readFile(filePath, 'utf-8')
      const parsed: unknown = yaml.load(raw)
      if (parsed === null || parsed === undefined) return {}

      if (isPlainObject(parsed)) {
        const version = parsed['config_format_version']
        if (typeof version === 'string' && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version)) {
          throw new ConfigIncompatibleFormatError(
            `Config format version "${version}" is not supported. ` +
              `This build supports: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}.`,
            { filePath, version }
          )
        }
      }

      const result = PartialTaskgateConfigSchema.safeParse(parsed)
      if (!result.success) {
        throw new ConfigError(
          `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
          { filePath, issues: result.error.issues }
        )
      }

      return result.data
    } catch (err) {
      if (err instanceof ConfigError) throw err
      if (err instanceof ConfigIncompatibleFormatError) throw err
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
