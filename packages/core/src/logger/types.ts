export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Position in LOG_LEVELS; an entry is kept when its rank reaches the logger's */
export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/** Structured key/value pairs attached to a log line */
export type LogFields = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Fields bound by the logger and its parents, such as runId or component */
  bindings?: LogFields;
  /** Fields passed with this one call */
  fields?: LogFields;
  /** Set when the line is written inside an active OpenTelemetry span */
  traceId?: string;
  spanId?: string;
}

export interface LogTransport {
  log(entry: LogEntry): void;
}

export interface LoggerOptions {
  /** Lowest level written (default: info) */
  level?: LogLevel;
  bindings?: LogFields;
  transports?: LogTransport[];
}
