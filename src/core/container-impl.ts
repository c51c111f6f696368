/**
 * createContainer: wires every module with constructor injection.
 *
 * Steps performed:
 *  1. Create the event bus and the database service
 *  2. Register the database in the ServiceRegistry and initialize it
 *     (opens SQLite, runs migrations)
 *  3. Build the store, audit log, adapters, sync layer, worker registry,
 *     dispatcher, gate controller, lifecycle and reconciler
 *
 * Modules never import each other's implementations; all wiring is here.
 */

import { isAbsolute, resolve } from 'node:path'
import { createLogger } from '../utils/logger.js'
import { createEventBus } from './event-bus.js'
import type { TypedEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import type { Container, ContainerConfig } from './container.js'
import { AGENT_NAMES } from './types.js'
import type { AgentName } from './types.js'
import type { TaskgateConfig } from '../modules/config/config-schema.js'
import { IN_MEMORY, createDatabaseService } from '../persistence/database.js'
import { createDispatcher } from '../modules/agent-dispatch/dispatcher-impl.js'
import type { Dispatcher } from '../modules/agent-dispatch/types.js'
import { createWorkerRegistryFromConfig } from '../modules/agent-dispatch/worker-registry.js'
import { createExternalSync } from '../modules/external-sync/external-sync-impl.js'
import { GitVersionControlAdapter } from '../modules/external-sync/git-adapter.js'
import { GitHubIssueTrackerAdapter } from '../modules/external-sync/github-issue-adapter.js'
import type {
  ExternalSync,
  IssueTrackerAdapter,
  VersionControlAdapter,
} from '../modules/external-sync/types.js'
import { createGateController } from '../modules/gate-controller/gate-controller.js'
import type { GateController } from '../modules/gate-controller/gate-controller.js'
import { createTaskLifecycle } from '../modules/lifecycle/task-lifecycle.js'
import type { TaskLifecycle } from '../modules/lifecycle/task-lifecycle.js'
import { createTaskStore } from '../modules/task-store/task-store.js'
import type { TaskStore } from '../modules/task-store/task-store.js'
import { createAuditLog } from '../recovery/audit-log.js'
import type { AuditLog } from '../recovery/audit-log.js'
import { createReconciler } from '../recovery/reconciler.js'
import type { Reconciler } from '../recovery/reconciler.js'

const logger = createLogger('container')

interface ContainerParts {
  config: TaskgateConfig
  eventBus: TypedEventBus
  services: ServiceRegistry
  store: TaskStore
  auditLog: AuditLog
  sync: ExternalSync
  dispatcher: Dispatcher
  controller: GateController
  lifecycle: TaskLifecycle
  reconciler: Reconciler
}

class ContainerImpl implements Container {
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
  private _shutdown = false

  constructor(parts: ContainerParts) {
    this.config = parts.config
    this.eventBus = parts.eventBus
    this.services = parts.services
    this.store = parts.store
    this.auditLog = parts.auditLog
    this.sync = parts.sync
    this.dispatcher = parts.dispatcher
    this.controller = parts.controller
    this.lifecycle = parts.lifecycle
    this.reconciler = parts.reconciler
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true
    await this.services.shutdownAll()
    logger.debug('Container shut down')
  }
}

function versionControlFor(config: TaskgateConfig, projectRoot: string): VersionControlAdapter | null {
  const vcs = config.sync.version_control
  if (vcs.kind === 'disabled') return null
  const tracker = config.sync.issue_tracker
  return new GitVersionControlAdapter({
    cwd: projectRoot,
    remote: vcs.remote,
    gh: { repo: tracker.repo, tokenEnv: tracker.token_env },
  })
}

function issueTrackerFor(config: TaskgateConfig, projectRoot: string): IssueTrackerAdapter | null {
  const tracker = config.sync.issue_tracker
  if (tracker.kind === 'disabled') return null
  return new GitHubIssueTrackerAdapter({ cwd: projectRoot, repo: tracker.repo, tokenEnv: tracker.token_env })
}

function agentTimeoutsFor(config: TaskgateConfig): Partial<Record<AgentName, number>> {
  const timeouts: Partial<Record<AgentName, number>> = {}
  for (const name of AGENT_NAMES) {
    const timeout = config.dispatch.agents[name]?.timeout_ms
    if (timeout !== undefined) timeouts[name] = timeout
  }
  return timeouts
}

/** Resolve a configured database path against the project root */
export function resolveDatabasePath(configuredPath: string, projectRoot: string): string {
  if (configuredPath === IN_MEMORY || isAbsolute(configuredPath)) return configuredPath
  return resolve(projectRoot, configuredPath)
}

/**
 * Open the database and wire all modules for one process.
 *
 * @example
 * const container = await createContainer({ config, projectRoot, confirmer })
 * try {
 *   await container.lifecycle.reviewPlan(taskId, 'alice')
 * } finally {
 *   await container.shutdown()
 * }
 */
export async function createContainer(options: ContainerConfig): Promise<Container> {
  const { config, projectRoot } = options
  const databasePath = resolveDatabasePath(options.databasePath ?? config.global.database_path, projectRoot)
  logger.debug({ databasePath, projectRoot }, 'Creating container')

  const eventBus = options.eventBus ?? createEventBus()
  const database = createDatabaseService(databasePath)

  const services = new ServiceRegistry()
  services.register('database', database)
  try {
    await services.initializeAll()
  } catch (err) {
    logger.error({ err }, 'Service initialization failed; cleaning up')
    await services.shutdownAll()
    throw err
  }

  const store = createTaskStore(database.db, { eventBus })
  const auditLog = createAuditLog(database.db)
  const sync = createExternalSync({
    store,
    auditLog,
    versionControl: options.versionControl !== undefined ? options.versionControl : versionControlFor(config, projectRoot),
    issueTracker: options.issueTracker !== undefined ? options.issueTracker : issueTrackerFor(config, projectRoot),
    eventBus,
    timeoutMs: config.sync.timeout_ms,
    baseBranch: config.sync.version_control.base_branch,
    branchPrefix: config.sync.version_control.branch_prefix,
  })

  const dispatcher = createDispatcher({
    registry: options.workers ?? createWorkerRegistryFromConfig(config.dispatch, projectRoot),
    store,
    sync,
    eventBus,
    timeoutMs: config.dispatch.timeout_ms,
    agentTimeouts: agentTimeoutsFor(config),
  })
  const controller = createGateController({
    store,
    dispatcher,
    sync,
    eventBus,
    maxRevisions: config.gates.max_revisions,
    staleInvocationMs: config.dispatch.timeout_ms + config.dispatch.stale_grace_ms,
  })
  const lifecycle = createTaskLifecycle({ store, controller, dispatcher, sync, confirmer: options.confirmer })
  const reconciler = createReconciler({ store, auditLog, sync })

  return new ContainerImpl({
    config,
    eventBus,
    services,
    store,
    auditLog,
    sync,
    dispatcher,
    controller,
    lifecycle,
    reconciler,
  })
}
