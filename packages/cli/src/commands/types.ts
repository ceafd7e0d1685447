/**
 * Shared command types.
 *
 * @module cli/commands/types
 */

import type { CliIO } from "../io.js";
import type { EngineOptions } from "./engine.js";

/**
 * What every command gets from the entry point. Tests swap the terminal
 * and the worker invokers here.
 */
export interface CliDeps extends Omit<EngineOptions, "cwd" | "overrides"> {
  io: CliIO;
}

/** Options every command accepts */
export interface CommonOptions {
  cwd?: string;
  json?: boolean;
  verbose?: boolean;
}
