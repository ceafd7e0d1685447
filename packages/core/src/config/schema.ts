import { z } from "zod";
import { LOG_LEVELS } from "../logger/types.js";
import { CONFIG_DEFAULTS, DEFAULT_FOCUS_TAGS } from "./defaults.js";

// ============================================
// Orchestrator
// ============================================

export const OrchestratorConfigSchema = z.object({
  defaultMaxIterations: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(CONFIG_DEFAULTS.orchestrator.defaultMaxIterations),
  maxParallelWorkers: z
    .number()
    .int()
    .min(1)
    .default(CONFIG_DEFAULTS.orchestrator.maxParallelWorkers),
  /** Fallback deadline for workers and phases that declare none */
  workerTimeoutMs: z.number().int().positive().optional(),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;

// ============================================
// Logging
// ============================================

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default(CONFIG_DEFAULTS.logging.level),
  json: z.boolean().default(CONFIG_DEFAULTS.logging.json),
});

// ============================================
// Workflows and Workers
// ============================================

export const WorkflowsConfigSchema = z.object({
  /** Also read workflows and workers from the user's home directory */
  loadUser: z.boolean().default(true),
});

/**
 * Binds a worker id to an external command.
 *
 * @example
 * ```toml
 * [workers.code-reviewer]
 * command = "node"
 * args = ["scripts/review.js"]
 * timeoutMs = 60000
 * ```
 */
export const WorkerBindingSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeoutMs: z.number().int().positive().optional(),
  env: z.record(z.string()).optional(),
});

export type WorkerBinding = z.infer<typeof WorkerBindingSchema>;

// ============================================
// Root Schema
// ============================================

export const ConfigSchema = z.object({
  orchestrator: OrchestratorConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  workflows: WorkflowsConfigSchema.default({}),
  focus: z.record(z.array(z.string().min(1))).default(DEFAULT_FOCUS_TAGS),
  workers: z.record(WorkerBindingSchema).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export type PartialConfig = z.input<typeof ConfigSchema>;
