#!/usr/bin/env node
import { EXIT_CODES } from "./commands/exit-codes.js";
import { processIO } from "./io.js";
import { runCli } from "./program.js";
import { executeShutdownCleanup } from "./shutdown.js";

// ============================================
// Graceful Shutdown Setup
// ============================================

/**
 * The first signal cancels the active run, which then finishes with its
 * report. A second signal, or one with no run active, exits at once.
 */
function setupGlobalShutdownHandlers(): void {
  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

  for (const signal of signals) {
    process.on(signal, () => {
      if (executeShutdownCleanup()) {
        process.stderr.write(`\nReceived ${signal}, cancelling run...\n`);
        return;
      }
      process.exit(EXIT_CODES.INTERRUPTED);
    });
  }
}

setupGlobalShutdownHandlers();

process.exitCode = await runCli(process.argv.slice(2), { io: processIO() });
