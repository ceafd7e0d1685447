// ============================================
// Workflow Definitions
// ============================================

import { identifierPattern } from "@phaseflow/shared";

import { InvalidWorkflowError } from "../errors/workflow-errors.js";
import { type LoopUntil, parseLoopExpression } from "./loop-predicate.js";

// ============================================
// Types
// ============================================

/**
 * A worker id, `capability:<tag>`, or an object marking the worker advisory.
 * Advisory failures degrade a phase instead of failing it.
 */
export type WorkerRef = string | { worker: string; advisory?: boolean };

export interface PhaseDefinition {
  id: string;
  description?: string;
  workers: WorkerRef[];
  /** Dispatch workers concurrently (default: false) */
  parallel?: boolean;
  /** Phases that must finish first. Omitted: the previously declared phase. */
  dependsOn?: string[];
  loopUntil?: LoopUntil;
  /** Loop cap; falls back to the configured default */
  maxIterations?: number;
  /** Default deadline for this phase's workers */
  timeoutMs?: number;
}

export type WorkflowSource = "builtin" | "user" | "project" | "inline";

/**
 * @example
 * ```typescript
 * const qualitySprint: WorkflowDefinition = {
 *   name: "quality-sprint",
 *   phases: [
 *     { id: "review", workers: ["code-reviewer"], loopUntil: "criticalCount == 0", maxIterations: 3 },
 *     { id: "refactor", workers: ["refactoring-expert"] },
 *   ],
 * };
 * ```
 */
export interface WorkflowDefinition {
  name: string;
  description?: string;
  version?: string;
  phases: PhaseDefinition[];
  /** Where the definition came from */
  source?: WorkflowSource;
  /** Markdown body of a file-based definition */
  body?: string;
}

export interface PhaseWorker {
  ref: string;
  advisory: boolean;
}

/** Phase with defaults applied */
export interface NormalizedPhase {
  id: string;
  description?: string;
  workers: PhaseWorker[];
  parallel: boolean;
  dependsOn: string[];
  loopUntil?: LoopUntil;
  maxIterations?: number;
  timeoutMs?: number;
}

// ============================================
// Normalization
// ============================================

export function normalizeWorkerRef(ref: WorkerRef): PhaseWorker {
  return typeof ref === "string"
    ? { ref, advisory: false }
    : { ref: ref.worker, advisory: ref.advisory ?? false };
}

/**
 * Applies defaults: sequential dispatch, critical workers, and an edge to
 * the previous phase when `dependsOn` is omitted.
 */
export function normalizePhases(definition: WorkflowDefinition): NormalizedPhase[] {
  return definition.phases.map((phase, index) => {
    const previous = definition.phases[index - 1];
    return {
      id: phase.id,
      description: phase.description,
      workers: phase.workers.map(normalizeWorkerRef),
      parallel: phase.parallel ?? false,
      dependsOn: phase.dependsOn ?? (previous ? [previous.id] : []),
      loopUntil: phase.loopUntil,
      maxIterations: phase.maxIterations,
      timeoutMs: phase.timeoutMs,
    };
  });
}

// ============================================
// Graph
// ============================================

/**
 * Phases in dependency order; ties keep declaration order.
 * Returns `undefined` when the graph has a cycle.
 */
export function topologicalOrder(phases: readonly NormalizedPhase[]): string[] | undefined {
  const known = new Set(phases.map((p) => p.id));
  const indegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const phase of phases) {
    const deps = phase.dependsOn.filter((dep) => known.has(dep));
    indegree.set(phase.id, deps.length);
    for (const dep of deps) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), phase.id]);
    }
  }

  const order: string[] = [];
  const done = new Set<string>();

  while (order.length < phases.length) {
    const next = phases.find((p) => !done.has(p.id) && indegree.get(p.id) === 0);
    if (!next) {
      return undefined;
    }
    order.push(next.id);
    done.add(next.id);
    for (const dependent of dependents.get(next.id) ?? []) {
      indegree.set(dependent, (indegree.get(dependent) ?? 0) - 1);
    }
  }

  return order;
}

/**
 * Phases not yet finished whose dependencies all are, in declaration order.
 */
export function readyPhases<P extends Pick<NormalizedPhase, "id" | "dependsOn">>(
  phases: readonly P[],
  finished: ReadonlySet<string>
): P[] {
  return phases.filter(
    (phase) => !finished.has(phase.id) && phase.dependsOn.every((dep) => finished.has(dep))
  );
}

// ============================================
// Validation
// ============================================

/**
 * Every structural problem of a definition. Empty when valid.
 */
export function validateWorkflow(definition: WorkflowDefinition): string[] {
  const issues: string[] = [];

  if (!identifierPattern.test(definition.name)) {
    issues.push(`workflow name "${definition.name}" must be lowercase alphanumeric with hyphens`);
  }
  if (definition.phases.length === 0) {
    issues.push("workflow has no phases");
    return issues;
  }

  const phases = normalizePhases(definition);
  const seen = new Set<string>();

  for (const phase of phases) {
    if (seen.has(phase.id)) {
      issues.push(`duplicate phase id "${phase.id}"`);
    }
    seen.add(phase.id);

    if (phase.workers.length === 0) {
      issues.push(`phase "${phase.id}" has no workers`);
    }
    if (phase.workers.some((w) => w.ref.trim() === "")) {
      issues.push(`phase "${phase.id}" has an empty worker reference`);
    }
    if (
      phase.maxIterations !== undefined &&
      (!Number.isInteger(phase.maxIterations) || phase.maxIterations < 1)
    ) {
      issues.push(`phase "${phase.id}" maxIterations must be an integer >= 1`);
    }
    if (typeof phase.loopUntil === "string") {
      const parsed = parseLoopExpression(phase.loopUntil);
      if (!parsed.ok) {
        issues.push(`phase "${phase.id}" loopUntil: ${parsed.error}`);
      }
    }
  }

  for (const phase of phases) {
    for (const dep of phase.dependsOn) {
      if (!seen.has(dep)) {
        issues.push(`phase "${phase.id}" depends on unknown phase "${dep}"`);
      } else if (dep === phase.id) {
        issues.push(`phase "${phase.id}" depends on itself`);
      }
    }
  }

  if (issues.length === 0 && topologicalOrder(phases) === undefined) {
    issues.push("phase dependencies form a cycle");
  }

  return issues;
}

/**
 * @throws InvalidWorkflowError listing every problem found
 */
export function assertValidWorkflow(definition: WorkflowDefinition): void {
  const issues = validateWorkflow(definition);
  if (issues.length > 0) {
    throw new InvalidWorkflowError(definition.name, issues);
  }
}
