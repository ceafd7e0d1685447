import { describe, expect, it } from "vitest";
import { createLogger } from "../factory.js";
import { Logger } from "../logger.js";
import { ConsoleTransport } from "../transports/console.js";
import { JsonTransport } from "../transports/json.js";
import type { LogEntry, LogTransport } from "../types.js";

function createMemoryTransport(): LogTransport & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { entries, log: (entry) => entries.push(entry) };
}

describe("Logger", () => {
  it("drops entries below its level", () => {
    const transport = createMemoryTransport();
    const logger = new Logger({ level: "warn", transports: [transport] });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.fatal("shown too");

    expect(transport.entries.map((e) => e.level)).toEqual(["warn", "fatal"]);
  });

  it("reports which levels are enabled", () => {
    const logger = new Logger({ level: "debug" });

    expect(logger.isLevelEnabled("trace")).toBe(false);
    expect(logger.isLevelEnabled("debug")).toBe(true);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("gives children merged bindings, the parent's level and its transports", () => {
    const transport = createMemoryTransport();
    const logger = new Logger({
      level: "warn",
      bindings: { logger: "phaseflow" },
      transports: [transport],
    });

    const child = logger.child({ runId: "run-1" });
    child.info("hidden");
    child.warn("phase retried", { phaseId: "review" });

    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]?.bindings).toEqual({ logger: "phaseflow", runId: "run-1" });
    expect(transport.entries[0]?.fields).toEqual({ phaseId: "review" });
  });

  it("reaches transports added after a child was created", () => {
    const logger = new Logger();
    const child = logger.child({ component: "registry" });
    const transport = createMemoryTransport();

    logger.addTransport(transport);
    child.info("registered");

    expect(transport.entries.map((e) => e.message)).toEqual(["registered"]);
  });

  it("leaves out empty bindings and absent fields", () => {
    const transport = createMemoryTransport();
    const logger = new Logger({ transports: [transport] });

    logger.info("plain");

    expect(transport.entries[0]).not.toHaveProperty("bindings");
    expect(transport.entries[0]).not.toHaveProperty("fields");
    expect(transport.entries[0]).not.toHaveProperty("traceId");
  });
});

describe("ConsoleTransport", () => {
  const entry: LogEntry = {
    level: "info",
    message: "Run started",
    timestamp: new Date("2026-01-01T10:00:00.000Z"),
  };

  it("writes time, padded level, message and key=value pairs", () => {
    const lines: string[] = [];
    const transport = new ConsoleTransport({ colors: false, output: (l) => lines.push(l) });

    transport.log(entry);
    transport.log({
      ...entry,
      level: "fatal",
      bindings: { runId: "run-1" },
      fields: { phases: 2, reason: "a critical worker failed" },
    });

    expect(lines).toEqual([
      "10:00:00 INFO  Run started",
      '10:00:00 FATAL Run started phases=2 reason="a critical worker failed" runId=run-1',
    ]);
  });

  it("colors the level label when enabled", () => {
    const lines: string[] = [];
    const transport = new ConsoleTransport({ colors: true, output: (l) => lines.push(l) });

    transport.log({ ...entry, level: "warn" });

    expect(lines).toEqual(["10:00:00 \u001b[33mWARN \u001b[39m Run started"]);
  });
});

describe("JsonTransport", () => {
  it("writes one flat JSON object per entry", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (l) => lines.push(l) });

    transport.log({
      level: "warn",
      message: "Loop exhausted",
      timestamp: new Date("2026-01-01T10:00:00.000Z"),
      bindings: { runId: "run-1", phaseId: "review" },
      fields: { iterations: 3, phaseId: "document" },
    });

    expect(lines).toEqual([
      '{"time":"2026-01-01T10:00:00.000Z","level":"warn","msg":"Loop exhausted","runId":"run-1","phaseId":"document","iterations":3}',
    ]);
  });

  it("keeps reserved keys out of reach of fields", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (l) => lines.push(l) });

    transport.log({
      level: "info",
      message: "real",
      timestamp: new Date("2026-01-01T10:00:00.000Z"),
      fields: { msg: "fake", level: "fatal", traceId: "t" },
    });

    expect(lines).toEqual(['{"time":"2026-01-01T10:00:00.000Z","level":"info","msg":"real"}']);
  });
});

describe("createLogger", () => {
  it("names the logger and forwards extra transports", () => {
    const transport = createMemoryTransport();
    const logger = createLogger({ level: "debug", console: false, transports: [transport] });

    logger.debug("hello");

    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]?.bindings).toEqual({ logger: "phaseflow" });
  });
});
