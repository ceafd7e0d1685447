import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@phaseflow/shared";
import { DEFAULT_FOCUS_TAGS } from "./defaults.js";
import { type Config, ConfigSchema, type PartialConfig } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Home directory used for the global config (default: os.homedir()) */
  homeDir?: string;
  /** Environment to read PHASEFLOW_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Config overrides (highest priority) */
  overrides?: PartialConfig;
  skipEnv?: boolean;
  skipGlobalFile?: boolean;
  skipProjectFile?: boolean;
}

// ============================================
// findProjectConfig
// ============================================

/** Config file names to search for in order */
const CONFIG_FILE_NAMES = ["phaseflow.toml", ".phaseflow.toml", ".config/phaseflow.toml"];

/**
 * Find the project configuration file by searching up from startDir to root.
 *
 * @returns Path to found config file, or undefined if not found
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// parseEnvConfig
// ============================================

type EnvValueKind = "string" | "number" | "boolean";

/**
 * Environment variable → config path and value kind
 */
const ENV_MAPPINGS: Record<string, { path: string[]; kind: EnvValueKind }> = {
  PHASEFLOW_LOG_LEVEL: { path: ["logging", "level"], kind: "string" },
  PHASEFLOW_LOG_JSON: { path: ["logging", "json"], kind: "boolean" },
  PHASEFLOW_MAX_ITERATIONS: { path: ["orchestrator", "defaultMaxIterations"], kind: "number" },
  PHASEFLOW_MAX_PARALLEL: { path: ["orchestrator", "maxParallelWorkers"], kind: "number" },
  PHASEFLOW_WORKER_TIMEOUT_MS: { path: ["orchestrator", "workerTimeoutMs"], kind: "number" },
};

/**
 * Numbers that do not parse are kept as strings so validation reports them.
 */
function coerceValue(value: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case "boolean":
      return value === "true" || value === "1";
    case "number": {
      const parsed = Number(value);
      return Number.isNaN(parsed) ? value : parsed;
    }
    default:
      return value;
  }
}

function setNestedValue(
  obj: Record<string, unknown>,
  keyPath: readonly string[],
  value: unknown
): void {
  const [head, ...rest] = keyPath;
  if (head === undefined) return;

  if (rest.length === 0) {
    obj[head] = value;
    return;
  }

  const existing = obj[head];
  const child: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  obj[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Parse PHASEFLOW_* environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * parseEnvConfig({ PHASEFLOW_MAX_ITERATIONS: "5" });
 * // { orchestrator: { defaultMaxIterations: 5 } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, mapping.path, coerceValue(value, mapping.kind));
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced, and undefined values don't overwrite existing values.
 *
 * @example
 * ```typescript
 * deepMerge({ logging: { level: "info" } }, { logging: { json: true } });
 * // { logging: { level: "info", json: true } }
 * ```
 */
export function deepMerge(...sources: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    if (!isPlainObject(source)) continue;

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];

      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

/**
 * Path of the global config file (~/.config/phaseflow/config.toml)
 */
export function getGlobalConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, ".config", "phaseflow", "config.toml");
}

function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  try {
    if (!fs.existsSync(filePath)) {
      return Err({
        code: "FILE_NOT_FOUND",
        message: `Config file not found: ${filePath}`,
        path: filePath,
      });
    }

    const content = fs.readFileSync(filePath, "utf-8");
    return Ok(TOML.parse(content));
  } catch (error) {
    if (error instanceof Error && error.name === "TomlError") {
      return Err({
        code: "PARSE_ERROR",
        message: `Failed to parse TOML: ${error.message}`,
        path: filePath,
        cause: error,
      });
    }
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults (plus the default focus map)
 * 2. Global config: ~/.config/phaseflow/config.toml
 * 3. Project config: findProjectConfig()
 * 4. Environment variables (unless skipEnv)
 * 5. CLI overrides (options.overrides)
 *
 * @example
 * ```typescript
 * const result = loadConfig({ cwd: "/my/project" });
 * if (result.ok) {
 *   console.log(result.value.orchestrator.defaultMaxIterations);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const { cwd, homeDir, env, overrides } = options;

  const layers: Record<string, unknown>[] = [{ focus: DEFAULT_FOCUS_TAGS }];

  if (!options.skipGlobalFile) {
    const globalResult = readTomlFile(getGlobalConfigPath(homeDir));
    if (globalResult.ok) {
      layers.push(globalResult.value);
    } else if (globalResult.error.code !== "FILE_NOT_FOUND") {
      return globalResult;
    }
  }

  if (!options.skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      layers.push(projectResult.value);
    }
  }

  if (!options.skipEnv) {
    const envConfig = parseEnvConfig(env);
    if (Object.keys(envConfig).length > 0) {
      layers.push(envConfig);
    }
  }

  if (overrides) {
    layers.push(overrides);
  }

  const parseResult = ConfigSchema.safeParse(deepMerge(...layers));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
