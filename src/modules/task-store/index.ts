export type { TaskStore, TaskStoreOptions } from './task-store.js'
export { createTaskStore } from './task-store.js'
export { SqliteTaskStore } from './task-store-impl.js'
export { snapshotOf } from './codec.js'
export {
  exportTaskDocument,
  parseTaskDocument,
  renderHandoverNote,
  renderTaskDocument,
  serializeTaskDocument,
  taskSpecFromDocument,
  toTaskDocument,
  writeFileAtomic,
} from './task-document.js'
export type { TaskDocument } from './task-document.js'
export { CONFIRMATION_COMPONENT } from './types.js'
export type {
  ChangelogEntry,
  ExternalRefField,
  ExternalSyncRecord,
  GateInvocation,
  HandoverNote,
  InvocationDecision,
  InvocationState,
  NewChangelogEntry,
  NewSyncRecord,
  SplitReference,
  Step,
  StepSpec,
  SyncOperation,
  SyncResultKind,
  Task,
  TargetSystem,
  TaskListFilter,
  TaskSnapshot,
  TaskSpec,
} from './types.js'
