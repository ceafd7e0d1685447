import { context, trace } from "@opentelemetry/api";
import type { LogEntry, LogFields, LoggerOptions, LogLevel, LogTransport } from "./types.js";
import { levelRank } from "./types.js";

function activeSpanIds(): Pick<LogEntry, "traceId" | "spanId"> {
  const span = trace.getSpan(context.active());
  if (!span) return {};
  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
}

/**
 * Leveled logger fanning entries out to transports.
 *
 * Children share the parent's transports and threshold and add their own
 * bindings, so a run logger carries `runId` on every line it writes.
 *
 * @example
 * ```typescript
 * const runLogger = logger.child({ runId: run.id });
 * runLogger.info("Phase finished", { phaseId: "review", iterations: 2 });
 * ```
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly bindings: LogFields;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.bindings = options.bindings ?? {};
    this.transports = options.transports ?? [];
  }

  trace(message: string, fields?: LogFields): void {
    this.log("trace", message, fields);
  }

  debug(message: string, fields?: LogFields): void {
    this.log("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log("error", message, fields);
  }

  fatal(message: string, fields?: LogFields): void {
    this.log("fatal", message, fields);
  }

  /**
   * Lets callers skip building expensive fields for lines that would be dropped.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return levelRank(level) >= levelRank(this.level);
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  child(bindings: LogFields): Logger {
    return new Logger({
      level: this.level,
      bindings: { ...this.bindings, ...bindings },
      transports: this.transports,
    });
  }

  log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = { level, message, timestamp: new Date(), ...activeSpanIds() };
    if (Object.keys(this.bindings).length > 0) entry.bindings = this.bindings;
    if (fields !== undefined) entry.fields = fields;

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }
}
