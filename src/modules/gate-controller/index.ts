export { createGateController } from './gate-controller.js'
export type {
  EnterGateOptions,
  GateController,
  GateControllerOptions,
  GateResult,
  RecordVerdictOptions,
  TransitionResult,
} from './gate-controller.js'
export { GateControllerImpl } from './gate-controller-impl.js'
export { GATE_DEFINITIONS, gateForEntryStatus, getGate, isHumanGate, predecessorOf } from './gates.js'
export type { GateDefinition, GateWorker } from './gates.js'
export {
  ACTIVE_STATUSES,
  ARCHIVABLE_STATUSES,
  SYNC_PLANS,
  TERMINAL_STATUSES,
  assertTransition,
  canTransition,
  cumulativeOperations,
  statusIndex,
  syncPlanFor,
} from './state-graph.js'
