import { Chalk, type ChalkInstance, supportsColorStderr } from "chalk";
import type { LogEntry, LogFields, LogLevel, LogTransport } from "../types.js";

export interface ConsoleTransportOptions {
  /** Force colors on or off. Follows stderr support and NO_COLOR when omitted. */
  colors?: boolean;
  /** Line sink (default: stderr, so stdout stays free for reports) */
  output?: (line: string) => void;
}

function levelPainters(chalk: ChalkInstance): Record<LogLevel, (text: string) => string> {
  return {
    trace: chalk.gray,
    debug: chalk.cyan,
    info: chalk.green,
    warn: chalk.yellow,
    error: chalk.red,
    fatal: chalk.magenta.bold,
  };
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  return JSON.stringify(value) ?? String(value);
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  return Object.entries(fields)
    .map(([key, value]) => ` ${key}=${formatValue(value)}`)
    .join("");
}

/**
 * Human-readable transport writing `HH:MM:SS LEVEL message key=value...`.
 * Bindings print dimmed after the call's own fields.
 *
 * @example
 * ```typescript
 * logger.child({ runId: "run-1" }).warn("Loop exhausted", { phaseId: "review" });
 * // 10:00:00 WARN  Loop exhausted phaseId=review runId=run-1
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly chalk: ChalkInstance;
  private readonly painters: Record<LogLevel, (text: string) => string>;
  private readonly output: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    const colors =
      options.colors ?? (process.env.NO_COLOR === undefined && supportsColorStderr !== false);
    this.chalk = new Chalk({ level: colors ? 1 : 0 });
    this.painters = levelPainters(this.chalk);
    this.output = options.output ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(entry: LogEntry): void {
    const time = entry.timestamp.toISOString().slice(11, 19);
    const level = this.painters[entry.level](entry.level.toUpperCase().padEnd(5));
    const bindings = formatFields(entry.bindings);

    this.output(
      `${time} ${level} ${entry.message}${formatFields(entry.fields)}${bindings && this.chalk.dim(bindings)}`
    );
  }
}
