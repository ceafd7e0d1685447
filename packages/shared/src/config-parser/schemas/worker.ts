/**
 * Worker descriptor schema definitions.
 * Used both for programmatic registration and for worker markdown files.
 *
 * @module config-parser/schemas/worker
 */

import { z } from "zod";
import { identifierPattern } from "./workflow.js";

export const eventKindSchema = z.enum([
  "FileChanged",
  "ErrorObserved",
  "ExplicitCommand",
  "WorkerCompleted",
]);

export type EventKind = z.infer<typeof eventKindSchema>;

export const outcomeStatusSchema = z.enum(["Success", "Failure", "NeedsFollowUp"]);

export type OutcomeStatus = z.infer<typeof outcomeStatusSchema>;

// ============================================
// Trigger Predicates
// ============================================

/**
 * What a trigger predicate inspects in the event payload.
 */
export const triggerMatchSchema = z.discriminatedUnion("type", [
  /** Glob over `payload.path` */
  z.object({ type: z.literal("file"), pattern: z.string().min(1) }),
  /** `|`-separated keywords over `payload.text` / `payload.message` */
  z.object({ type: z.literal("keyword"), pattern: z.string().min(1) }),
  z.object({ type: z.literal("regex"), pattern: z.string().min(1), flags: z.string().optional() }),
  /** Completion of another worker */
  z.object({
    type: z.literal("worker"),
    workerId: z.string().min(1).optional(),
    status: outcomeStatusSchema.optional(),
  }),
  z.object({ type: z.literal("always") }),
]);

export type TriggerMatch = z.infer<typeof triggerMatchSchema>;

/**
 * Schema for a trigger predicate.
 *
 * @example
 * ```yaml
 * triggerPredicates:
 *   - on: FileChanged
 *     match: { type: file, pattern: "src/**\/*.ts" }
 *   - on: [ErrorObserved]
 *     match: { type: keyword, pattern: "TypeError|undefined is not" }
 *     mode: confirm
 * ```
 */
export const triggerPredicateSchema = z.object({
  on: z.union([eventKindSchema, z.array(eventKindSchema).min(1)]),
  match: triggerMatchSchema,
  mode: z.enum(["auto", "confirm"]).default("auto"),
});

export type TriggerPredicate = z.infer<typeof triggerPredicateSchema>;

export type TriggerMode = TriggerPredicate["mode"];

// ============================================
// Contracts
// ============================================

export const inputFieldSchema = z.object({
  field: z.string().min(1),
  required: z.boolean().default(true),
  /** Used when the field was never written to the context bus. */
  default: z.unknown().optional(),
});

export type InputField = z.infer<typeof inputFieldSchema>;

export const outputFieldSchema = z.object({
  field: z.string().min(1),
  description: z.string().optional(),
});

export type OutputField = z.infer<typeof outputFieldSchema>;

// ============================================
// Worker Descriptor Schema
// ============================================

export const workerRetrySchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  baseDelayMs: z.number().int().min(0).default(1000),
});

/**
 * Schema for worker descriptors.
 *
 * @example
 * ```yaml
 * ---
 * id: code-reviewer
 * name: Code Reviewer
 * capabilities: [code-review, security-review]
 * inputContract:
 *   - field: argument
 * outputContract:
 *   - field: reviewFindings
 * ---
 * Review the change for correctness and security issues.
 * ```
 */
export const workerDescriptorSchema = z.object({
  id: z
    .string()
    .min(1)
    .max(64)
    .regex(identifierPattern, "Worker ID must be lowercase alphanumeric with hyphens"),
  name: z.string().max(200).optional(),
  description: z.string().max(2048).optional(),
  capabilities: z.array(z.string().min(1)).default([]),
  triggerPredicates: z.array(triggerPredicateSchema).default([]),
  inputContract: z.array(inputFieldSchema).default([]),
  outputContract: z.array(outputFieldSchema).default([]),
  timeoutMs: z.number().int().positive().optional(),
  retry: workerRetrySchema.optional(),
});

export type WorkerDescriptor = z.infer<typeof workerDescriptorSchema>;

export type WorkerDescriptorInput = z.input<typeof workerDescriptorSchema>;
