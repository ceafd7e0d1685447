// ============================================
// Loop Predicates
// ============================================

import {
  type ComparisonOperator,
  comparisonOperatorSchema,
  type DiagnosticMetric,
  diagnosticMetricSchema,
  Err,
  type LoopCondition,
  type LoopUntilSpec,
  Ok,
  type Result,
} from "@phaseflow/shared";

import { ErrorCode, PhaseflowError } from "../errors/types.js";
import type { AggregatedDiagnostics } from "../workers/diagnostics.js";

/**
 * Decides whether a phase is done looping, given the diagnostics of its
 * latest iteration.
 */
export type LoopPredicate = (diagnostics: AggregatedDiagnostics) => boolean;

/** Declarative form, or a function for cases the declarative form cannot express */
export type LoopUntil = LoopUntilSpec | LoopPredicate;

const CONDITION_PATTERN = /^(?:diagnostics\.)?([A-Za-z]+)\s*(==|!=|<=|>=|<|>)\s*(-?\d+(?:\.\d+)?)$/;

function compare(actual: number, op: ComparisonOperator, expected: number): boolean {
  switch (op) {
    case "==":
      return actual === expected;
    case "!=":
      return actual !== expected;
    case "<":
      return actual < expected;
    case "<=":
      return actual <= expected;
    case ">":
      return actual > expected;
    case ">=":
      return actual >= expected;
  }
}

/**
 * Parses `"criticalCount == 0 && highCount <= 2"`. The `diagnostics.` prefix
 * is optional and conditions may be joined with `&&` or `and`.
 *
 * @example
 * ```typescript
 * parseLoopExpression("diagnostics.criticalCount == 0");
 * // { ok: true, value: [{ metric: "criticalCount", op: "==", value: 0 }] }
 * ```
 */
export function parseLoopExpression(expression: string): Result<LoopCondition[], string> {
  const parts = expression.split(/\s*(?:&&|\band\b)\s*/);
  const conditions: LoopCondition[] = [];

  for (const part of parts) {
    const match = CONDITION_PATTERN.exec(part.trim());
    if (!match) {
      return Err(`cannot parse loop condition "${part.trim()}"`);
    }

    const [, rawMetric, rawOp, rawValue] = match;
    const metric = diagnosticMetricSchema.safeParse(rawMetric);
    if (!metric.success) {
      return Err(`unknown diagnostic metric "${rawMetric}"`);
    }
    const op = comparisonOperatorSchema.safeParse(rawOp);
    if (!op.success) {
      return Err(`unknown operator "${rawOp}"`);
    }

    conditions.push({ metric: metric.data, op: op.data, value: Number(rawValue) });
  }

  return Ok(conditions);
}

function metricValue(diagnostics: AggregatedDiagnostics, metric: DiagnosticMetric): number {
  return diagnostics[metric];
}

/**
 * Turns any `loopUntil` form into a predicate.
 *
 * @throws PhaseflowError (WORKFLOW_INVALID) for an expression that does not parse
 */
export function compileLoopPredicate(loopUntil: LoopUntil): LoopPredicate {
  if (typeof loopUntil === "function") {
    return loopUntil;
  }

  let conditions: LoopCondition[];
  if (typeof loopUntil === "string") {
    const parsed = parseLoopExpression(loopUntil);
    if (!parsed.ok) {
      throw new PhaseflowError(`Invalid loopUntil: ${parsed.error}`, ErrorCode.WORKFLOW_INVALID);
    }
    conditions = parsed.value;
  } else {
    conditions = Array.isArray(loopUntil) ? loopUntil : [loopUntil];
  }

  return (diagnostics) =>
    conditions.every((c) => compare(metricValue(diagnostics, c.metric), c.op, c.value));
}

/**
 * Used when a phase may loop but declares no `loopUntil`: done once no
 * worker asks for a follow-up.
 */
export const noFollowUpRequested: LoopPredicate = (diagnostics) =>
  diagnostics.followUpCount === 0;
