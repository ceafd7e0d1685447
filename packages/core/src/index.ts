// ============================================
// Phaseflow Core Engine
// ============================================

/**
 * @module @phaseflow/core
 *
 * Workflow orchestration engine: a worker registry, trigger evaluation,
 * a context bus shared by the workers of a run, phase scheduling with
 * loops and parallel dispatch, and outcome aggregation.
 */

// ============================================
// Catalog
// ============================================
export * from "./catalog/index.js";

// ============================================
// Config
// ============================================
export * from "./config/index.js";

// ============================================
// Context Bus
// ============================================
export * from "./bus/index.js";

// ============================================
// Errors
// ============================================
export * from "./errors/index.js";

// ============================================
// Events
// ============================================
export * from "./events/index.js";

// ============================================
// Logger
// ============================================
export * from "./logger/index.js";

// ============================================
// Orchestrator
// ============================================
export * from "./orchestrator/index.js";

// ============================================
// Triggers
// ============================================
export * from "./triggers/index.js";

// ============================================
// Workers
// ============================================
export * from "./workers/index.js";

// ============================================
// Workflows
// ============================================
export * from "./workflows/index.js";
