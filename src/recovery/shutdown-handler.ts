/**
 * setupGracefulShutdown: registers SIGTERM and SIGINT handlers for clean process exit.
 *
 * On signal receipt the service registry is shut down in reverse order
 * (checkpointing the WAL and closing the database) and the process exits
 * with code 1. Anything saved before the
 * signal stays saved; external calls that were cut off are left for
 * `reconcile`.
 *
 * Returns a cleanup function that removes the listeners (for test teardown).
 */

import type pino from 'pino'
import type { ServiceRegistry } from '../core/di.js'
import { createLogger } from '../utils/logger.js'

const defaultLogger = createLogger('shutdown-handler')

export interface ShutdownHandlerOptions {
  services: ServiceRegistry
  logger?: pino.Logger
  /** Defaults to process.exit */
  exit?: (code: number) => void
}

export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const { services } = options
  const log = options.logger ?? defaultLogger
  const exit = options.exit ?? ((code: number): void => process.exit(code))
  let shuttingDown = false

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    log.info({ signal }, 'Graceful shutdown initiated')

    try {
      await services.shutdownAll()
      log.info('Graceful shutdown complete')
    } catch (err) {
      log.error({ err }, 'Errors during shutdown')
    }
    exit(1)
  }

  const sigintHandler = (): void => {
    void shutdown('SIGINT')
  }

  const sigtermHandler = (): void => {
    void shutdown('SIGTERM')
  }

  process.on('SIGINT', sigintHandler)
  process.on('SIGTERM', sigtermHandler)

  return (): void => {
    process.removeListener('SIGINT', sigintHandler)
    process.removeListener('SIGTERM', sigtermHandler)
  }
}
