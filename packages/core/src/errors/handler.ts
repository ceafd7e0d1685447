// ============================================
// Global Error Handler
// Centralized error handling with logging and events
// ============================================

import type { EventBus } from "../events/bus.js";
import { Events } from "../events/definitions.js";
import type { Logger } from "../logger/logger.js";
import { ErrorCode, isFatalError, PhaseflowError } from "./types.js";

/**
 * Configuration options for GlobalErrorHandler.
 */
export interface GlobalErrorHandlerOptions {
  logger?: Logger;
  /** Optional event bus to emit error events */
  eventBus?: EventBus;
}

/**
 * Normalizes thrown values into PhaseflowError, logs them by severity
 * and optionally emits an `error` event.
 *
 * @example
 * ```typescript
 * const handler = new GlobalErrorHandler({ logger, eventBus });
 *
 * try {
 *   await orchestrator.run(definition, options);
 * } catch (error) {
 *   const normalized = handler.handle(error);
 *   process.exitCode = handler.isRecoverable(normalized) ? 2 : 1;
 * }
 * ```
 */
export class GlobalErrorHandler {
  private readonly logger?: Logger;
  private readonly eventBus?: EventBus;

  constructor(options: GlobalErrorHandlerOptions = {}) {
    this.logger = options.logger;
    this.eventBus = options.eventBus;
  }

  /**
   * Handle any error by normalizing, logging and emitting it.
   *
   * Normalization rules:
   * - PhaseflowError: returned as-is
   * - Error: wrapped with SYSTEM_UNKNOWN code
   * - string: becomes the message
   * - other: generic message, original value in context
   */
  handle(error: unknown): PhaseflowError {
    const normalized = GlobalErrorHandler.normalize(error);

    this.logError(normalized);

    this.eventBus?.emit(Events.error, {
      error: normalized,
      context: normalized.context,
    });

    return normalized;
  }

  /**
   * Anything that is not FATAL counts as recoverable, including foreign errors.
   */
  isRecoverable(error: unknown): boolean {
    return !isFatalError(error);
  }

  static normalize(error: unknown): PhaseflowError {
    if (error instanceof PhaseflowError) {
      return error;
    }

    if (error instanceof Error) {
      return new PhaseflowError(error.message, ErrorCode.SYSTEM_UNKNOWN, {
        cause: error,
        context: {
          originalName: error.name,
        },
      });
    }

    if (typeof error === "string") {
      return new PhaseflowError(error, ErrorCode.SYSTEM_UNKNOWN);
    }

    return new PhaseflowError("An unknown error occurred", ErrorCode.SYSTEM_UNKNOWN, {
      context: {
        originalValue: String(error),
        originalType: typeof error,
      },
    });
  }

  private logError(error: PhaseflowError): void {
    const level = isFatalError(error) ? "fatal" : "warn";
    this.logger?.log(level, error.message, error.toJSON());
  }
}
