// ============================================
// Workflows Module Barrel Export
// ============================================

export {
  assertValidWorkflow,
  type NormalizedPhase,
  normalizePhases,
  normalizeWorkerRef,
  type PhaseDefinition,
  type PhaseWorker,
  readyPhases,
  topologicalOrder,
  validateWorkflow,
  type WorkerRef,
  type WorkflowDefinition,
  type WorkflowSource,
} from "./definition.js";
export {
  compileLoopPredicate,
  type LoopPredicate,
  type LoopUntil,
  noFollowUpRequested,
  parseLoopExpression,
} from "./loop-predicate.js";
export {
  type LoadedWorkflow,
  parseWorkflowFile,
  WorkflowLoader,
} from "./workflow-loader.js";
