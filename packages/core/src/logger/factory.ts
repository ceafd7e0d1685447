import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel, LogTransport } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'phaseflow') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** If true, output JSON lines instead of formatted text (default: false) */
  json?: boolean;
  /** Enable colored console output. Auto-detected when omitted. */
  colors?: boolean;
  /** Extra transports appended after the console one */
  transports?: LogTransport[];
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: config.logging.level, json: config.logging.json });
 * const orchestrator = new Orchestrator(registry, { logger });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    bindings: { logger: options.name ?? "phaseflow" },
  });

  if (options.console ?? true) {
    logger.addTransport(
      options.json ? new JsonTransport() : new ConsoleTransport({ colors: options.colors })
    );
  }

  for (const transport of options.transports ?? []) {
    logger.addTransport(transport);
  }

  return logger;
}
