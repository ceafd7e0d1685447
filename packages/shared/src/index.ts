// ============================================
// Phaseflow Shared Types
// ============================================

export * from "./config-parser/index.js";
export type { Result } from "./types/result.js";
// Result type (shared so core and cli agree on one shape)
export { Err, Ok } from "./types/result.js";
export { createId } from "./utils/id.js";
