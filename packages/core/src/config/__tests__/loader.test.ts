import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CONFIG_DEFAULTS, DEFAULT_FOCUS_TAGS } from "../defaults.js";
import {
  deepMerge,
  findProjectConfig,
  getGlobalConfigPath,
  loadConfig,
  parseEnvConfig,
} from "../loader.js";

describe("parseEnvConfig", () => {
  it("maps and coerces PHASEFLOW_* variables", () => {
    expect(
      parseEnvConfig({
        PHASEFLOW_LOG_LEVEL: "debug",
        PHASEFLOW_LOG_JSON: "1",
        PHASEFLOW_MAX_ITERATIONS: "5",
        PHASEFLOW_MAX_PARALLEL: "",
        UNRELATED: "x",
      })
    ).toEqual({
      logging: { level: "debug", json: true },
      orchestrator: { defaultMaxIterations: 5 },
    });
  });

  it("keeps unparseable numbers as strings", () => {
    expect(parseEnvConfig({ PHASEFLOW_WORKER_TIMEOUT_MS: "soon" })).toEqual({
      orchestrator: { workerTimeoutMs: "soon" },
    });
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(
      deepMerge(
        { logging: { level: "info" }, focus: { security: ["a"] } },
        { logging: { json: true, level: undefined }, focus: { security: ["b"] } }
      )
    ).toEqual({ logging: { level: "info", json: true }, focus: { security: ["b"] } });
  });
});

describe("loadConfig", () => {
  let project: string;
  let home: string;

  beforeEach(() => {
    project = mkdtempSync(join(tmpdir(), "phaseflow-config-project-"));
    home = mkdtempSync(join(tmpdir(), "phaseflow-config-home-"));
  });

  afterEach(() => {
    rmSync(project, { recursive: true, force: true });
    rmSync(home, { recursive: true, force: true });
  });

  function writeGlobal(content: string): void {
    const path = getGlobalConfigPath(home);
    mkdirSync(join(home, ".config", "phaseflow"), { recursive: true });
    writeFileSync(path, content);
  }

  it("returns defaults when nothing is configured", () => {
    const result = loadConfig({ cwd: project, homeDir: home, env: {} });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      orchestrator: {
        defaultMaxIterations: CONFIG_DEFAULTS.orchestrator.defaultMaxIterations,
        maxParallelWorkers: CONFIG_DEFAULTS.orchestrator.maxParallelWorkers,
      },
      logging: { level: "info", json: false },
      workflows: { loadUser: true },
      focus: DEFAULT_FOCUS_TAGS,
      workers: {},
    });
  });

  it("layers global, project, env and overrides in that order", () => {
    writeGlobal(`[orchestrator]\ndefaultMaxIterations = 4\nmaxParallelWorkers = 2\n`);
    writeFileSync(
      join(project, "phaseflow.toml"),
      `[orchestrator]
defaultMaxIterations = 6

[focus]
docs = ["documentation"]

[workers.code-reviewer]
command = "node"
args = ["review.js"]
`
    );

    const result = loadConfig({
      cwd: project,
      homeDir: home,
      env: { PHASEFLOW_LOG_LEVEL: "warn" },
      overrides: { logging: { json: true } },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.orchestrator).toEqual({ defaultMaxIterations: 6, maxParallelWorkers: 2 });
    expect(result.value.logging).toEqual({ level: "warn", json: true });
    expect(result.value.focus).toEqual({ ...DEFAULT_FOCUS_TAGS, docs: ["documentation"] });
    expect(result.value.workers).toEqual({ "code-reviewer": { command: "node", args: ["review.js"] } });
  });

  it("finds the project file from a subdirectory", () => {
    writeFileSync(join(project, ".phaseflow.toml"), `[logging]\nlevel = "error"\n`);
    const nested = join(project, "src", "deep");
    mkdirSync(nested, { recursive: true });

    expect(findProjectConfig(nested)).toBe(join(project, ".phaseflow.toml"));

    const result = loadConfig({ cwd: nested, homeDir: home, env: {} });
    expect(result.ok && result.value.logging.level).toBe("error");
  });

  it("reports TOML syntax errors", () => {
    writeFileSync(join(project, "phaseflow.toml"), "[orchestrator\n");

    const result = loadConfig({ cwd: project, homeDir: home, env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("PARSE_ERROR");
    expect(result.error.path).toBe(join(project, "phaseflow.toml"));
  });

  it("reports schema violations", () => {
    const result = loadConfig({
      cwd: project,
      homeDir: home,
      env: { PHASEFLOW_MAX_ITERATIONS: "0" },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("VALIDATION_ERROR");
    expect(result.error.message).toContain("orchestrator.defaultMaxIterations");
  });

  it("skips sources on request", () => {
    writeGlobal(`[logging]\nlevel = "debug"\n`);

    const result = loadConfig({
      cwd: project,
      homeDir: home,
      env: { PHASEFLOW_LOG_JSON: "true" },
      skipGlobalFile: true,
      skipEnv: true,
    });

    expect(result.ok && result.value.logging).toEqual({ level: "info", json: false });
  });
});
