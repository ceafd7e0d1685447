// ============================================
// Outcome Aggregator
// ============================================

import { RunNotTerminalError } from "../errors/workflow-errors.js";
import { type AggregatedDiagnostics, mergeDiagnostics } from "../workers/diagnostics.js";
import type { OutcomeError } from "../workers/types.js";
import type {
  AbortReason,
  FollowUp,
  PhaseStatus,
  WorkerRecord,
  WorkerRecordStatus,
  WorkflowRun,
} from "./run.js";
import type { TerminalRunStatus } from "./state-machine.js";

// ============================================
// Types
// ============================================

export interface WorkerSummary {
  workerId: string;
  status: WorkerRecordStatus;
  advisory: boolean;
  attempts: number;
  durationMs: number;
  error?: OutcomeError;
}

export interface IterationSummary {
  iteration: number;
  /** Phase-iteration key, e.g. `review#2` */
  key: string;
  workers: WorkerSummary[];
  diagnostics: AggregatedDiagnostics;
  loopSatisfied?: boolean;
}

export interface PhaseSummary {
  id: string;
  status: PhaseStatus;
  reason?: string;
  /** Number of iterations run; 0 for skipped phases */
  iterations: number;
  /** Workers of the last iteration, in declaration order */
  workers: WorkerSummary[];
  iterationDetails: IterationSummary[];
  /** Diagnostics of every iteration, concatenated */
  diagnostics: AggregatedDiagnostics;
}

/**
 * A failed worker invocation, or one that broke a context bus rule.
 */
export interface FailureRecord {
  workerId: string;
  phaseId: string;
  iteration: number;
  advisory: boolean;
  /** The run failed because of this one */
  fatal: boolean;
  error?: OutcomeError;
}

export interface FinalResult {
  runId: string;
  workflow: string;
  status: TerminalRunStatus;
  durationMs: number;
  /** In declaration order */
  perPhaseSummaries: PhaseSummary[];
  mergedDiagnostics: AggregatedDiagnostics;
  failures: FailureRecord[];
  followUps: FollowUp[];
  abortReason?: AbortReason;
  fatalError?: OutcomeError;
}

// ============================================
// Aggregation
// ============================================

function errorOf(record: WorkerRecord): OutcomeError | undefined {
  if (record.fatalError) {
    const { name, message, code } = record.fatalError;
    return { name, message, code };
  }
  const error = record.outcome?.diagnostics.error;
  return error ? { ...error } : undefined;
}

function summarizeWorker(record: WorkerRecord): WorkerSummary {
  const summary: WorkerSummary = {
    workerId: record.workerId,
    status: record.status,
    advisory: record.advisory,
    attempts: record.attempts,
    durationMs: record.durationMs,
  };
  const error = errorOf(record);
  if (error) {
    summary.error = error;
  }
  return summary;
}

/**
 * Folds a terminal run into its final result. Reads the run and nothing
 * else, so calling it twice gives deep-equal results.
 *
 * Diagnostics are concatenated across phases and iterations; nothing is
 * overwritten.
 *
 * @example
 * ```typescript
 * const run = await orchestrator.run(definition);
 * const result = aggregate(run);
 * result.perPhaseSummaries.map((p) => p.status); // ["Succeeded", "PartiallyFailed"]
 * ```
 *
 * @throws RunNotTerminalError if the run is still pending or running
 */
export function aggregate(run: WorkflowRun): FinalResult {
  const status = run.status;
  if (status === "Pending" || status === "Running") {
    throw new RunNotTerminalError(run.id, status);
  }

  const perPhaseSummaries: PhaseSummary[] = [];
  const failures: FailureRecord[] = [];

  for (const state of run.phases.values()) {
    const iterationDetails = state.iterations.map((iteration) => {
      for (const record of iteration.workers) {
        if (record.status === "Failure" || record.fatalError) {
          failures.push({
            workerId: record.workerId,
            phaseId: state.id,
            iteration: iteration.iteration,
            advisory: record.advisory,
            fatal: record.fatalError !== undefined,
            error: errorOf(record),
          });
        }
      }

      const detail: IterationSummary = {
        iteration: iteration.iteration,
        key: iteration.key,
        workers: iteration.workers.map(summarizeWorker),
        diagnostics: mergeDiagnostics([iteration.diagnostics]),
      };
      if (iteration.loopSatisfied !== undefined) {
        detail.loopSatisfied = iteration.loopSatisfied;
      }
      return detail;
    });

    const summary: PhaseSummary = {
      id: state.id,
      status: state.status ?? "Skipped",
      iterations: iterationDetails.length,
      workers: iterationDetails.at(-1)?.workers ?? [],
      iterationDetails,
      diagnostics: mergeDiagnostics(iterationDetails.map((detail) => detail.diagnostics)),
    };
    if (state.reason !== undefined) {
      summary.reason = state.reason;
    }
    perPhaseSummaries.push(summary);
  }

  const result: FinalResult = {
    runId: run.id,
    workflow: run.definition.name,
    status,
    durationMs: run.durationMs,
    perPhaseSummaries,
    mergedDiagnostics: mergeDiagnostics(perPhaseSummaries.map((summary) => summary.diagnostics)),
    failures,
    followUps: run.followUps.map((followUp) => ({
      ...followUp,
      triggeredBy: { ...followUp.triggeredBy },
    })),
  };

  if (run.abortReason) {
    result.abortReason = run.abortReason;
  }
  if (run.fatalError) {
    const { name, message, code } = run.fatalError;
    result.fatalError = { name, message, code };
  }

  return result;
}
