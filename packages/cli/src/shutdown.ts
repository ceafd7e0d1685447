/**
 * Shutdown cleanup state module.
 * The run command registers how to cancel the active run; the signal
 * handlers in index.ts call it.
 */

/** Cleanup function to be called on shutdown */
let shutdownCleanup: (() => void) | null = null;

/**
 * Set the shutdown cleanup function, or clear it with null.
 */
export function setShutdownCleanup(cleanup: (() => void) | null): void {
  shutdownCleanup = cleanup;
}

/**
 * Execute shutdown cleanup if set.
 * Clears the cleanup function after execution.
 *
 * @returns Whether a cleanup function ran
 */
export function executeShutdownCleanup(): boolean {
  if (!shutdownCleanup) {
    return false;
  }
  const cleanup = shutdownCleanup;
  shutdownCleanup = null;
  cleanup();
  return true;
}
