/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  deepMerge,
  getByPath,
  setByPath,
  ENV_VAR_MAP,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  TaskgateConfigSchema,
  PartialTaskgateConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  AgentCommandConfig,
  DispatchConfig,
  GatesConfig,
  IssueTrackerConfig,
  PartialTaskgateConfig,
  SyncConfig,
  TaskgateConfig,
  VersionControlConfig,
} from './config-schema.js'
export {
  DEFAULT_CONFIG,
  DEFAULT_DISPATCH_TIMEOUT_MS,
  DEFAULT_MAX_REVISIONS,
  DEFAULT_SYNC_TIMEOUT_MS,
} from './defaults.js'
