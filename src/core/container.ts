/**
 * Container interface: the wired set of services one command works with.
 *
 * Create an instance via `createContainer()` from container-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { ServiceRegistry } from './di.js'
import type { TaskgateConfig } from '../modules/config/config-schema.js'
import type { Dispatcher } from '../modules/agent-dispatch/types.js'
import type { WorkerRegistry } from '../modules/agent-dispatch/worker-registry.js'
import type {
  ExternalSync,
  IssueTrackerAdapter,
  VersionControlAdapter,
} from '../modules/external-sync/types.js'
import type { GateController } from '../modules/gate-controller/gate-controller.js'
import type { Confirmer } from '../modules/lifecycle/confirmer.js'
import type { TaskLifecycle } from '../modules/lifecycle/task-lifecycle.js'
import type { TaskStore } from '../modules/task-store/task-store.js'
import type { AuditLog } from '../recovery/audit-log.js'
import type { Reconciler } from '../recovery/reconciler.js'

export interface ContainerConfig {
  config: TaskgateConfig

  /** Working copy that git commands and worker processes run in */
  projectRoot: string

  /** Overrides `global.database_path` (resolved against projectRoot) */
  databasePath?: string

  confirmer: Confirmer

  /**
   * Replace the adapters built from `sync.*` config; null disables the
   * system regardless of config.
   */
  versionControl?: VersionControlAdapter | null
  issueTracker?: IssueTrackerAdapter | null

  /** Replace the command workers built from `dispatch.agents` */
  workers?: WorkerRegistry

  eventBus?: TypedEventBus
}

export interface Container {
  readonly config: TaskgateConfig
  readonly eventBus: TypedEventBus
  readonly services: ServiceRegistry
  readonly store: TaskStore
  readonly auditLog: AuditLog
  readonly sync: ExternalSync
  readonly dispatcher: Dispatcher
  readonly controller: GateController
  readonly lifecycle: TaskLifecycle
  readonly reconciler: Reconciler

  /** Shut down every service; safe to call twice */
  shutdown(): Promise<void>
}
