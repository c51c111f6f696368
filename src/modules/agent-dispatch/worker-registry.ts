/**
 * WorkerRegistry: resolves agent names to Worker implementations.
 */

import { AGENT_NAMES } from '../../core/types.js'
import type { AgentName } from '../../core/types.js'
import type { DispatchConfig } from '../config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import { CommandWorker } from './command-worker.js'
import type { Worker } from './types.js'

const logger = createLogger('worker-registry')

export class WorkerRegistry {
  private readonly _workers = new Map<AgentName, Worker>()

  /** Register (or replace) the worker for its agent name */
  register(worker: Worker): void {
    if (this._workers.has(worker.name)) {
      logger.debug({ agent: worker.name }, 'Replacing registered worker')
    }
    this._workers.set(worker.name, worker)
  }

  resolve(agent: AgentName): Worker | undefined {
    return this._workers.get(agent)
  }

  has(agent: AgentName): boolean {
    return this._workers.has(agent)
  }

  registeredNames(): AgentName[] {
    return AGENT_NAMES.filter((name) => this._workers.has(name))
  }
}

/**
 * Build a registry of CommandWorkers from the `dispatch.agents` config.
 */
export function createWorkerRegistryFromConfig(config: DispatchConfig, cwd: string): WorkerRegistry {
  const registry = new WorkerRegistry()
  for (const name of AGENT_NAMES) {
    const agentConfig = config.agents[name]
    if (agentConfig !== undefined) {
      registry.register(new CommandWorker(name, agentConfig, cwd))
    }
  }
  return registry
}
