// ============================================
// Orchestration Event Definitions
// ============================================

import { z } from "zod";
import { defineEvent } from "./bus.js";

const runStatusSchema = z.enum(["Pending", "Running", "Succeeded", "PartiallyFailed", "Failed"]);
const phaseStatusSchema = z.enum(["Succeeded", "PartiallyFailed", "Failed", "Skipped"]);
const workerStatusSchema = z.enum(["Success", "Failure", "NeedsFollowUp", "Skipped"]);

// ============================================
// Run Events
// ============================================

/**
 * Emitted once a run has passed validation and starts executing.
 */
export const runStart = defineEvent(
  "run:start",
  z.object({
    runId: z.string(),
    workflow: z.string(),
  })
);

/**
 * Emitted when a run reaches a terminal status.
 */
export const runEnd = defineEvent(
  "run:end",
  z.object({
    runId: z.string(),
    workflow: z.string(),
    status: runStatusSchema,
    durationMs: z.number(),
  })
);

// ============================================
// Phase Events
// ============================================

export const phaseStart = defineEvent(
  "phase:start",
  z.object({
    runId: z.string(),
    phaseId: z.string(),
    /** 1-based loop iteration */
    iteration: z.number().int().positive(),
  })
);

/**
 * Emitted after every iteration of a phase, including the last.
 */
export const phaseEnd = defineEvent(
  "phase:end",
  z.object({
    runId: z.string(),
    phaseId: z.string(),
    iteration: z.number().int().positive(),
    status: phaseStatusSchema,
  })
);

// ============================================
// Worker Events
// ============================================

export const workerStart = defineEvent(
  "worker:start",
  z.object({
    runId: z.string(),
    phaseId: z.string(),
    iteration: z.number().int().positive(),
    workerId: z.string(),
  })
);

export const workerEnd = defineEvent(
  "worker:end",
  z.object({
    runId: z.string(),
    phaseId: z.string(),
    iteration: z.number().int().positive(),
    workerId: z.string(),
    status: workerStatusSchema,
    durationMs: z.number(),
  })
);

// ============================================
// Trigger and Approval Events
// ============================================

/**
 * Emitted for every worker a trigger predicate selected.
 */
export const triggerMatched = defineEvent(
  "trigger:matched",
  z.object({
    runId: z.string().optional(),
    eventKind: z.enum(["FileChanged", "ErrorObserved", "ExplicitCommand", "WorkerCompleted"]),
    workerId: z.string(),
    mode: z.enum(["auto", "confirm"]),
  })
);

export const approvalRequested = defineEvent(
  "approval:requested",
  z.object({
    runId: z.string(),
    phaseId: z.string(),
    status: phaseStatusSchema,
  })
);

// ============================================
// Error Events
// ============================================

/**
 * Emitted when an error is handled by the GlobalErrorHandler.
 */
export const errorEvent = defineEvent(
  "error",
  z.object({
    /** The error that occurred */
    error: z.instanceof(Error),
    /** Additional context about where/why the error occurred */
    context: z.record(z.unknown()).optional(),
  })
);

// ============================================
// Events Registry
// ============================================

/**
 * All orchestration events, keyed for convenient access.
 *
 * @example
 * ```typescript
 * bus.on(Events.workerEnd, ({ workerId, status }) => {
 *   logger.info(`${workerId} finished: ${status}`);
 * });
 * ```
 */
export const Events = {
  runStart,
  runEnd,
  phaseStart,
  phaseEnd,
  workerStart,
  workerEnd,
  triggerMatched,
  approvalRequested,
  error: errorEvent,
} as const;

/**
 * Helper type to extract payload type from an event definition.
 */
export type EventPayload<T extends keyof typeof Events> = z.infer<(typeof Events)[T]["schema"]>;
