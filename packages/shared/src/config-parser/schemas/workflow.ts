/**
 * Workflow schema definitions.
 * Defines the structure for workflow YAML frontmatter.
 *
 * @module config-parser/schemas/workflow
 */

import { z } from "zod";

/**
 * Identifier pattern shared by workflows, phases and workers.
 */
export const identifierPattern = /^[a-z][a-z0-9-]*$/;

// ============================================
// Loop Conditions
// ============================================

/**
 * Metrics exposed by a phase's aggregated diagnostics.
 */
export const diagnosticMetricSchema = z.enum([
  "criticalCount",
  "highCount",
  "mediumCount",
  "lowCount",
  "issueCount",
  "failureCount",
  "followUpCount",
]);

export type DiagnosticMetric = z.infer<typeof diagnosticMetricSchema>;

export const comparisonOperatorSchema = z.enum(["==", "!=", "<", "<=", ">", ">="]);

export type ComparisonOperator = z.infer<typeof comparisonOperatorSchema>;

/**
 * A single comparison over a diagnostic metric.
 *
 * @example
 * ```yaml
 * loopUntil:
 *   metric: criticalCount
 *   op: "=="
 *   value: 0
 * ```
 */
export const loopConditionSchema = z.object({
  metric: diagnosticMetricSchema,
  op: comparisonOperatorSchema,
  value: z.number(),
});

export type LoopCondition = z.infer<typeof loopConditionSchema>;

/**
 * `loopUntil` accepts an expression string (`"criticalCount == 0"`),
 * a single condition, or a list of conditions that must all hold.
 */
export const loopUntilSchema = z.union([
  z.string().min(1),
  loopConditionSchema,
  z.array(loopConditionSchema).min(1),
]);

export type LoopUntilSpec = z.infer<typeof loopUntilSchema>;

// ============================================
// Phase Schema
// ============================================

/**
 * Reference to a worker inside a phase. Either a worker id,
 * `capability:<tag>`, or an object marking the worker advisory.
 */
export const phaseWorkerRefSchema = z.union([
  z.string().min(1),
  z.object({
    worker: z.string().min(1),
    advisory: z.boolean().default(false),
  }),
]);

export type PhaseWorkerRef = z.infer<typeof phaseWorkerRefSchema>;

/**
 * Schema for a single phase.
 *
 * @example
 * ```yaml
 * phases:
 *   - id: review
 *     workers: [code-reviewer]
 *     loopUntil: "criticalCount == 0"
 *     maxIterations: 3
 *   - id: checks
 *     parallel: true
 *     workers:
 *       - security-auditor
 *       - worker: performance-analyst
 *         advisory: true
 * ```
 */
export const phaseSchema = z.object({
  id: z
    .string()
    .min(1)
    .max(50)
    .regex(identifierPattern, "Phase ID must be lowercase alphanumeric with hyphens"),
  description: z.string().max(2048).optional(),
  workers: z.array(phaseWorkerRefSchema).min(1, "A phase needs at least one worker"),
  parallel: z.boolean().default(false),
  /** Phases that must finish first. Omitted: the previously declared phase. */
  dependsOn: z.array(z.string().min(1)).optional(),
  loopUntil: loopUntilSchema.optional(),
  maxIterations: z.number().int().min(1).max(100).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type PhaseFrontmatter = z.infer<typeof phaseSchema>;

// ============================================
// Workflow Frontmatter Schema
// ============================================

/**
 * Schema for workflow frontmatter.
 *
 * @example
 * ```yaml
 * ---
 * name: quality-sprint
 * description: Review, refactor, test and document a change
 * phases:
 *   - id: review
 *     workers: [code-reviewer]
 *   - id: refactor
 *     workers: [refactoring-expert]
 * ---
 * ```
 */
export const workflowFrontmatterSchema = z.object({
  name: z
    .string()
    .min(1, "Workflow name is required")
    .max(100)
    .regex(identifierPattern, "Name must be lowercase alphanumeric with hyphens"),
  description: z.string().max(2048).optional(),
  version: z.string().default("1.0"),
  phases: z.array(phaseSchema).min(1, "At least one phase is required"),
});

export type WorkflowFrontmatter = z.infer<typeof workflowFrontmatterSchema>;

export type WorkflowFrontmatterInput = z.input<typeof workflowFrontmatterSchema>;
