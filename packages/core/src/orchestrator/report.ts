// ============================================
// Run Report
// ============================================

import type { FinalResult } from "./aggregator.js";
import type { AbortReason, PhaseStatus, WorkerRecordStatus } from "./run.js";
import type { TerminalRunStatus } from "./state-machine.js";

/** Process exit code for each terminal run status */
export const EXIT_CODES = {
  Succeeded: 0,
  Failed: 1,
  PartiallyFailed: 2,
} as const satisfies Record<TerminalRunStatus, number>;

export type ExitCode = (typeof EXIT_CODES)[TerminalRunStatus];

export function exitCodeFor(status: TerminalRunStatus): ExitCode {
  return EXIT_CODES[status];
}

export interface RunReport {
  workflow: string;
  runId: string;
  status: TerminalRunStatus;
  exitCode: ExitCode;
  abortReason?: AbortReason;
  phases: Array<{
    id: string;
    status: PhaseStatus;
    iterations: number;
    reason?: string;
    workers: Array<{ id: string; status: WorkerRecordStatus; error?: string }>;
  }>;
  diagnostics: { critical: number; high: number; medium: number; low: number };
  failures: Array<{ workerId: string; phase: string; message: string; fatal: boolean }>;
  followUps: Array<{ workerId: string; mode: string; after: string }>;
}

/**
 * Flattens a final result into the shape printed by the CLI. Phase
 * workers are those of the last iteration.
 *
 * @example
 * ```typescript
 * const report = toRunReport(aggregate(run));
 * process.stdout.write(JSON.stringify(report, null, 2));
 * process.exitCode = report.exitCode;
 * ```
 */
export function toRunReport(result: FinalResult): RunReport {
  const report: RunReport = {
    workflow: result.workflow,
    runId: result.runId,
    status: result.status,
    exitCode: exitCodeFor(result.status),
    phases: result.perPhaseSummaries.map((phase) => {
      const entry: RunReport["phases"][number] = {
        id: phase.id,
        status: phase.status,
        iterations: phase.iterations,
        workers: phase.workers.map((worker) =>
          worker.error
            ? { id: worker.workerId, status: worker.status, error: worker.error.message }
            : { id: worker.workerId, status: worker.status }
        ),
      };
      if (phase.reason !== undefined) {
        entry.reason = phase.reason;
      }
      return entry;
    }),
    diagnostics: {
      critical: result.mergedDiagnostics.criticalCount,
      high: result.mergedDiagnostics.highCount,
      medium: result.mergedDiagnostics.mediumCount,
      low: result.mergedDiagnostics.lowCount,
    },
    failures: result.failures.map((failure) => ({
      workerId: failure.workerId,
      phase: `${failure.phaseId}#${failure.iteration}`,
      message: failure.error?.message ?? "failed without an error message",
      fatal: failure.fatal,
    })),
    followUps: result.followUps.map((followUp) => ({
      workerId: followUp.workerId,
      mode: followUp.mode,
      after: followUp.triggeredBy.workerId,
    })),
  };

  if (result.abortReason) {
    report.abortReason = result.abortReason;
  }
  return report;
}
