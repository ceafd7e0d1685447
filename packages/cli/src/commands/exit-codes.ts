/**
 * Process exit codes of the phaseflow command.
 *
 * A finished run exits with the code of its terminal status:
 * - 0: Succeeded
 * - 1: Failed
 * - 2: PartiallyFailed
 *
 * Anything that stops the command before a run starts uses a code outside
 * that range, so scripts can tell "the workflow failed" from "the workflow
 * never ran".
 *
 * @module cli/commands/exit-codes
 */

import { EXIT_CODES as RUN_EXIT_CODES, type FinalResult } from "@phaseflow/core";

// =============================================================================
// Exit Code Constants
// =============================================================================

export const EXIT_CODES = {
  ...RUN_EXIT_CODES,
  /** Bad arguments, unknown workflow or worker, invalid configuration (EX_USAGE) */
  USAGE_ERROR: 64,
  /** Interrupted by signal (128 + SIGINT=2) */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// =============================================================================
// Exit Code Mapper
// =============================================================================

/**
 * Maps run results and thrown values to process exit codes.
 *
 * @example
 * ```typescript
 * const result = await orchestrator.execute(definition, options);
 * process.exitCode = ExitCodeMapper.fromResult(result);
 * ```
 */
// biome-ignore lint/complexity/noStaticOnlyClass: ExitCodeMapper provides a logical grouping for exit code mapping
export class ExitCodeMapper {
  /**
   * A cancelled run is Failed, so it exits with 1 like any other failure.
   */
  static fromResult(result: Pick<FinalResult, "status">): ExitCode {
    return EXIT_CODES[result.status];
  }

  /**
   * Map an exception thrown before or around a run to an exit code.
   * A prompt closed with Ctrl+C counts as an interruption.
   */
  static fromException(error: unknown): ExitCode {
    if (error instanceof Error && (error.name === "AbortError" || error.name === "ExitPromptError")) {
      return EXIT_CODES.INTERRUPTED;
    }
    return EXIT_CODES.USAGE_ERROR;
  }

  static describe(code: ExitCode): string {
    switch (code) {
      case EXIT_CODES.Succeeded:
        return "Succeeded";
      case EXIT_CODES.Failed:
        return "Failed";
      case EXIT_CODES.PartiallyFailed:
        return "Partially failed";
      case EXIT_CODES.USAGE_ERROR:
        return "Usage error";
      case EXIT_CODES.INTERRUPTED:
        return "Interrupted";
    }
  }
}
