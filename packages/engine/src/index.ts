export { Reconciler, type ReconcilerOptions, type ApplyOutcome } from "./reconciler.js";
export {
  DependencyGraphBuilder,
  buildGraph,
  dependencyIds,
  descendantsOf,
  reverseOrder,
  type DependencyGraph,
} from "./graph/dependency-graph.js";
export { collectRefs, isAttributeRef, resolveRefs } from "./graph/references.js";
export { Planner, recordToNode } from "./plan/planner.js";
export { ChangeTriggerEvaluator, isAggregate, type TriggerEvaluation } from "./plan/triggers.js";
export {
  canonicalJson,
  diffAttributes,
  digest,
  fingerprintAggregate,
  fingerprintNode,
} from "./plan/fingerprint.js";
export { isSensitiveField, replacementFields } from "./plan/kinds.js";
export {
  ApplyExecutor,
  type ApplyOptions,
  type ApplyRunOptions,
} from "./apply/executor.js";
export { WorkerPool } from "./apply/pool.js";
export { MemoryStateStore, type StateStore } from "./state/store.js";
export { FileStateStore } from "./state/file-store.js";
export { SqliteStateStore } from "./state/sqlite-store.js";
export type { ProvisioningProvider, CreateResult } from "./provider/types.js";
export { LocalProvider, computedOutputs } from "./provider/local-provider.js";
export type { LocalResource } from "./provider/local-provider.js";
export { renderCorsNodes } from "./cors.js";
export {
  CycleError,
  DanglingReferenceError,
  ProviderError,
  ReferenceResolutionError,
  StatePersistenceError,
  type ProviderErrorCategory,
} from "./errors.js";
