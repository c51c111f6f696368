/**
 * Public API for the recovery module: the sync audit log, drift
 * reconciliation and graceful shutdown.
 */

export { AuditLog, createAuditLog } from './audit-log.js'

export {
  Reconciler,
  createReconciler,
  type DriftItem,
  type RepairOutcome,
  type ReconcileReport,
  type ReconcilerOptions,
} from './reconciler.js'

export {
  setupGracefulShutdown,
  type ShutdownHandlerOptions,
} from './shutdown-handler.js'
