/**
 * Schema Index
 * Exports all schema definitions for workflow and worker files
 */

export {
  type EventKind,
  eventKindSchema,
  type InputField,
  inputFieldSchema,
  type OutcomeStatus,
  type OutputField,
  outcomeStatusSchema,
  outputFieldSchema,
  type TriggerMatch,
  type TriggerMode,
  type TriggerPredicate,
  triggerMatchSchema,
  triggerPredicateSchema,
  type WorkerDescriptor,
  type WorkerDescriptorInput,
  workerDescriptorSchema,
  workerRetrySchema,
} from "./worker.js";
export {
  type ComparisonOperator,
  comparisonOperatorSchema,
  type DiagnosticMetric,
  diagnosticMetricSchema,
  identifierPattern,
  type LoopCondition,
  type LoopUntilSpec,
  loopConditionSchema,
  loopUntilSchema,
  type PhaseFrontmatter,
  type PhaseWorkerRef,
  phaseSchema,
  phaseWorkerRefSchema,
  type WorkflowFrontmatter,
  type WorkflowFrontmatterInput,
  workflowFrontmatterSchema,
} from "./workflow.js";
