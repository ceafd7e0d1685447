export {
  aggregate,
  type FailureRecord,
  type FinalResult,
  type IterationSummary,
  type PhaseSummary,
  type WorkerSummary,
} from "./aggregator.js";
export { mapWithConcurrency } from "./concurrency.js";
export {
  type ApprovalGate,
  type ApprovalRequest,
  Orchestrator,
  type OrchestratorOptions,
  type ReactOptions,
  type RunOptions,
} from "./orchestrator.js";
export { EXIT_CODES, type ExitCode, exitCodeFor, type RunReport, toRunReport } from "./report.js";
export {
  type AbortReason,
  type FollowUp,
  type IterationRecord,
  type PhaseState,
  type PhaseStatus,
  type WorkerRecord,
  type WorkerRecordStatus,
  WorkflowRun,
} from "./run.js";
export {
  isTerminalStatus,
  RUN_TRANSITIONS,
  RunStateMachine,
  type RunStatus,
  type TerminalRunStatus,
} from "./state-machine.js";
