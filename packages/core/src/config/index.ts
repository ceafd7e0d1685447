// ============================================
// Config Module Barrel Export
// ============================================

export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  getGlobalConfigPath,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
} from "./loader.js";
export { CONFIG_DEFAULTS, DEFAULT_FOCUS_TAGS, PROJECT_DIR_NAME } from "./defaults.js";
export {
  type Config,
  ConfigSchema,
  LoggingConfigSchema,
  type OrchestratorConfig,
  OrchestratorConfigSchema,
  type PartialConfig,
  type WorkerBinding,
  WorkerBindingSchema,
  WorkflowsConfigSchema,
} from "./schema.js";
