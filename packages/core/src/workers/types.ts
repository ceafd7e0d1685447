// ============================================
// Worker Outcome and Invocation Types
// ============================================

import { outcomeStatusSchema } from "@phaseflow/shared";
import { z } from "zod";

// ============================================
// Diagnostics
// ============================================

export const severitySchema = z.enum(["critical", "high", "medium", "low"]);

export type Severity = z.infer<typeof severitySchema>;

export const diagnosticIssueSchema = z.object({
  severity: severitySchema,
  message: z.string(),
  /** Free-form location, usually `path:line` */
  location: z.string().optional(),
});

export type DiagnosticIssue = z.infer<typeof diagnosticIssueSchema>;

/**
 * Pre-counted severities. Takes precedence over counting `issues`.
 */
export const severityCountsSchema = z.object({
  critical: z.number().int().min(0).default(0),
  high: z.number().int().min(0).default(0),
  medium: z.number().int().min(0).default(0),
  low: z.number().int().min(0).default(0),
});

export type SeverityCounts = z.infer<typeof severityCountsSchema>;

export const outcomeErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  code: z.union([z.string(), z.number()]).optional(),
});

export type OutcomeError = z.infer<typeof outcomeErrorSchema>;

export const diagnosticsSchema = z.object({
  severityCounts: severityCountsSchema.optional(),
  issues: z.array(diagnosticIssueSchema).optional(),
  error: outcomeErrorSchema.optional(),
  detail: z.record(z.unknown()).optional(),
});

export type Diagnostics = z.infer<typeof diagnosticsSchema>;

// ============================================
// Outcome
// ============================================

/**
 * What a worker returns. Also the JSON a command-bound worker prints on stdout.
 *
 * @example
 * ```json
 * {
 *   "status": "Success",
 *   "producedFields": { "reviewFindings": ["unused import"] },
 *   "diagnostics": { "severityCounts": { "low": 1 } }
 * }
 * ```
 */
export const workerOutcomeSchema = z.object({
  status: outcomeStatusSchema,
  producedFields: z.record(z.unknown()).default({}),
  diagnostics: diagnosticsSchema.default({}),
});

export type WorkerOutcome = z.infer<typeof workerOutcomeSchema>;

/** Outcome as written by an invoker; omitted parts get defaults. */
export type WorkerOutcomeInput = z.input<typeof workerOutcomeSchema>;

// ============================================
// Invocation Boundary
// ============================================

/**
 * Everything a worker sees for one invocation.
 */
export interface WorkerRequest {
  runId: string;
  workflow: string;
  phaseId: string;
  /** 1-based loop iteration of the phase */
  iteration: number;
  workerId: string;
  /** Snapshot of the context bus built from the worker's input contract */
  context: Record<string, unknown>;
  /** Field names from the worker's input contract */
  declaredInputFields: string[];
  /** Aborted on run cancellation or when the worker's deadline passes */
  signal: AbortSignal;
}

export type WorkerInvoker = (request: WorkerRequest) => Promise<WorkerOutcomeInput>;
