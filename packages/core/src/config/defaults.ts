/**
 * Centralized configuration defaults.
 * Hardcoded values live here and are imported elsewhere.
 */

export const CONFIG_DEFAULTS = {
  orchestrator: {
    /** Loop cap for phases that declare none */
    defaultMaxIterations: 3,
    /** Concurrency cap inside a parallel phase */
    maxParallelWorkers: 4,
  },

  retry: {
    baseDelayMs: 1000,
    maxDelayMs: 30_000,
  },

  logging: {
    level: "info",
    json: false,
  },
} as const;

/**
 * Focus name → capability tags a worker must carry to be dispatched.
 * Unknown focus names are treated as a single tag of the same name.
 */
export const DEFAULT_FOCUS_TAGS: Record<string, string[]> = {
  security: ["security-review"],
  performance: ["performance-review"],
  quality: ["quality"],
};

/** Directory holding project and user workflow/worker files */
export const PROJECT_DIR_NAME = ".phaseflow";
