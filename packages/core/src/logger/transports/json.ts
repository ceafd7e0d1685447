import type { LogEntry, LogTransport } from "../types.js";

export interface JsonTransportOptions {
  /** Line sink (default: stderr) */
  output?: (line: string) => void;
}

const RESERVED_KEYS = new Set(["time", "level", "msg", "traceId", "spanId"]);

/**
 * One flat JSON object per line: `time`, `level` and `msg` first, then the
 * logger's bindings and the call's fields. Fields shadow bindings of the
 * same name; neither can replace a reserved key.
 *
 * @example
 * ```typescript
 * logger.child({ runId: "run-1" }).info("Run started", { phases: 3 });
 * // {"time":"2026-01-01T10:00:00.000Z","level":"info","msg":"Run started","runId":"run-1","phases":3}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(entry: LogEntry): void {
    const line: Record<string, unknown> = {
      time: entry.timestamp.toISOString(),
      level: entry.level,
      msg: entry.message,
    };
    for (const [key, value] of Object.entries({ ...entry.bindings, ...entry.fields })) {
      if (!RESERVED_KEYS.has(key)) line[key] = value;
    }
    if (entry.traceId !== undefined) {
      line.traceId = entry.traceId;
      line.spanId = entry.spanId;
    }
    this.output(JSON.stringify(line));
  }
}
