// ============================================
// Diagnostics Aggregation
// ============================================

import {
  type DiagnosticIssue,
  type OutcomeError,
  type Severity,
  severitySchema,
  type WorkerOutcome,
} from "./types.js";

/** Issue tagged with the worker and phase-iteration that reported it */
export interface AttributedIssue extends DiagnosticIssue {
  workerId: string;
  phase: string;
}

export interface AttributedError extends OutcomeError {
  workerId: string;
  phase: string;
}

/**
 * Diagnostics of several outcomes merged together. Loop predicates and
 * run reports read these.
 */
export interface AggregatedDiagnostics {
  criticalCount: number;
  highCount: number;
  mediumCount: number;
  lowCount: number;
  /** Sum of the four severity counts */
  issueCount: number;
  failureCount: number;
  followUpCount: number;
  issues: AttributedIssue[];
  errors: AttributedError[];
}

/** An outcome together with where it came from */
export interface AttributedOutcome {
  workerId: string;
  phase: string;
  outcome: WorkerOutcome;
}

export function emptyDiagnostics(): AggregatedDiagnostics {
  return {
    criticalCount: 0,
    highCount: 0,
    mediumCount: 0,
    lowCount: 0,
    issueCount: 0,
    failureCount: 0,
    followUpCount: 0,
    issues: [],
    errors: [],
  };
}

const COUNT_KEYS = {
  critical: "criticalCount",
  high: "highCount",
  medium: "mediumCount",
  low: "lowCount",
} as const satisfies Record<Severity, keyof AggregatedDiagnostics>;

function severityCountsOf(outcome: WorkerOutcome): Record<Severity, number> {
  const given = outcome.diagnostics.severityCounts;
  if (given) {
    return given;
  }

  const counted: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const issue of outcome.diagnostics.issues ?? []) {
    counted[issue.severity] += 1;
  }
  return counted;
}

/**
 * Folds outcomes into one diagnostics record, in the order given.
 * Severity counts come from `severityCounts` when an outcome has them,
 * otherwise from its issue list.
 */
export function aggregateDiagnostics(outcomes: readonly AttributedOutcome[]): AggregatedDiagnostics {
  const result = emptyDiagnostics();

  for (const { workerId, phase, outcome } of outcomes) {
    const counts = severityCountsOf(outcome);
    for (const severity of severitySchema.options) {
      result[COUNT_KEYS[severity]] += counts[severity];
      result.issueCount += counts[severity];
    }

    if (outcome.status === "Failure") result.failureCount += 1;
    if (outcome.status === "NeedsFollowUp") result.followUpCount += 1;

    for (const issue of outcome.diagnostics.issues ?? []) {
      result.issues.push({ ...issue, workerId, phase });
    }
    if (outcome.diagnostics.error) {
      result.errors.push({ ...outcome.diagnostics.error, workerId, phase });
    }
  }

  return result;
}

/**
 * Concatenates already aggregated diagnostics; nothing is overwritten.
 */
export function mergeDiagnostics(parts: readonly AggregatedDiagnostics[]): AggregatedDiagnostics {
  const result = emptyDiagnostics();

  for (const part of parts) {
    result.criticalCount += part.criticalCount;
    result.highCount += part.highCount;
    result.mediumCount += part.mediumCount;
    result.lowCount += part.lowCount;
    result.issueCount += part.issueCount;
    result.failureCount += part.failureCount;
    result.followUpCount += part.followUpCount;
    result.issues.push(...part.issues);
    result.errors.push(...part.errors);
  }

  return result;
}
