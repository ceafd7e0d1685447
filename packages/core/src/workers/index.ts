// ============================================
// Workers - Barrel Export
// ============================================

export {
  type CommandInvokerOptions,
  type CommandResult,
  createCommandInvoker,
  parseCommandOutput,
  RETRYABLE_EXIT_CODE,
  runCommand,
  serializeRequest,
  unboundInvoker,
} from "./command-invoker.js";
export { outputContractViolations } from "./contract.js";
export {
  type AggregatedDiagnostics,
  aggregateDiagnostics,
  type AttributedError,
  type AttributedIssue,
  type AttributedOutcome,
  emptyDiagnostics,
  mergeDiagnostics,
} from "./diagnostics.js";
export {
  CAPABILITY_PREFIX,
  type RegisterOptions,
  type RegistryEvents,
  type RegistryOptions,
  WorkerRegistry,
} from "./registry.js";
export {
  type DiagnosticIssue,
  type Diagnostics,
  diagnosticIssueSchema,
  diagnosticsSchema,
  type OutcomeError,
  outcomeErrorSchema,
  type Severity,
  type SeverityCounts,
  severityCountsSchema,
  severitySchema,
  type WorkerInvoker,
  type WorkerOutcome,
  type WorkerOutcomeInput,
  type WorkerRequest,
  workerOutcomeSchema,
} from "./types.js";
export {
  type InvokerFactory,
  type LoadedWorker,
  parseWorkerFile,
  registerLoadedWorkers,
  WorkerLoader,
} from "./worker-loader.js";
