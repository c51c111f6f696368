/**
 * taskgate - main module exports
 * Public API surface for embedding the lifecycle controller
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export * from './utils/helpers.js'

// Container
export { createContainer, resolveDatabasePath } from './core/container-impl.js'
export type { Container, ContainerConfig } from './core/container.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { LifecycleEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Persistence
export { IN_MEMORY, createDatabaseService } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/task-store/index.js'
export * from './modules/gate-controller/index.js'
export * from './modules/agent-dispatch/index.js'
export * from './modules/external-sync/index.js'
export * from './modules/lifecycle/index.js'

// Audit log, reconciliation, shutdown
export * from './recovery/index.js'
