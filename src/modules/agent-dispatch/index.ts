/**
 * agent-dispatch module: sub-agent dispatch
 *
 * Public API re-exports for the agent-dispatch module.
 */

export type {
  Dispatcher,
  DispatchOptions,
  DispatchOutcome,
  TaskContext,
  Worker,
  WorkerOutput,
} from './types.js'

export {
  ARTIFACT_SCHEMAS,
  ChangelogWriterArtifactsSchema,
  ChildTaskSpecSchema,
  DocUpdaterArtifactsSchema,
  PlannerReviewerArtifactsSchema,
  PrCreatorArtifactsSchema,
  SplitterArtifactsSchema,
  ValidatorArtifactsSchema,
  VerdictSchema,
  WorkerOutputSchema,
} from './artifact-schemas.js'
export type { ChangelogWriterArtifacts, ChildTaskSpec, PrCreatorArtifacts, SplitterArtifacts } from './artifact-schemas.js'

export { YAML_ANCHOR_KEY, extractYamlBlock, parseYamlResult } from './yaml-parser.js'
export type { YamlParseResult } from './yaml-parser.js'

export { CONTEXT_CHANGELOG_LIMIT, buildTaskContext } from './task-context.js'
export type { TaskContextOptions } from './task-context.js'

export { CommandWorker, WorkerOutputError, WorkerProcessError, serializeContext } from './command-worker.js'
export { WorkerRegistry, createWorkerRegistryFromConfig } from './worker-registry.js'

export { DispatcherImpl, createDispatcher } from './dispatcher-impl.js'
export type { CreateDispatcherOptions } from './dispatcher-impl.js'
