export { AutoConfirmer } from './confirmer.js'
export type { Confirmer } from './confirmer.js'
export { createTaskLifecycle } from './task-lifecycle.js'
export type {
  HandoverReport,
  LifecycleReport,
  NewHandoverNote,
  ProgressReport,
  Stage,
  StageReport,
  StageResult,
  StepProgress,
  TaskLifecycle,
  TaskLifecycleOptions,
} from './task-lifecycle.js'
export { TaskLifecycleImpl } from './task-lifecycle-impl.js'
