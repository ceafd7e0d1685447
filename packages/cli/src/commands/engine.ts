/**
 * Wires configuration, loaders, registry and orchestrator together for
 * one command invocation.
 *
 * @module cli/commands/engine
 */

import {
  type Config,
  type ConfigError,
  createCommandInvoker,
  createLogger,
  EventBus,
  GlobalErrorHandler,
  type InvokerFactory,
  type Logger,
  type LogTransport,
  loadConfig,
  Orchestrator,
  type PartialConfig,
  registerLoadedWorkers,
  unboundInvoker,
  WorkerLoader,
  WorkerRegistry,
  WorkflowLoader,
} from "@phaseflow/core";
import { Ok, type Result } from "@phaseflow/shared";

export interface EngineOptions {
  cwd: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PartialConfig;
  /** Replaces the invokers built from `[workers.<id>]` bindings */
  invokerFor?: InvokerFactory;
  /** Write logs to stderr (default: true) */
  logToConsole?: boolean;
  logTransports?: LogTransport[];
}

export interface Engine {
  config: Config;
  logger: Logger;
  eventBus: EventBus;
  registry: WorkerRegistry;
  workflows: WorkflowLoader;
  orchestrator: Orchestrator;
}

/**
 * Binds each worker to the command configured for it, or to an invoker
 * that fails when the worker has none.
 */
export function bindingInvokers(config: Config, cwd: string): InvokerFactory {
  return (descriptor) => {
    const binding = config.workers[descriptor.id];
    return binding ? createCommandInvoker(binding, { cwd }) : unboundInvoker(descriptor.id);
  };
}

/**
 * @example
 * ```typescript
 * const engine = await createEngine({ cwd: process.cwd() });
 * if (!engine.ok) {
 *   console.error(engine.error.message);
 *   return;
 * }
 * const definition = await engine.value.workflows.load("quality-sprint");
 * ```
 */
export async function createEngine(options: EngineOptions): Promise<Result<Engine, ConfigError>> {
  const configResult = loadConfig({
    cwd: options.cwd,
    homeDir: options.homeDir,
    env: options.env,
    overrides: options.overrides,
  });
  if (!configResult.ok) {
    return configResult;
  }
  const config = configResult.value;

  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.json,
    console: options.logToConsole ?? true,
    transports: options.logTransports,
  });
  const loaderOptions = {
    cwd: options.cwd,
    homeDir: options.homeDir,
    loadUser: config.workflows.loadUser,
    logger,
  };

  const registry = new WorkerRegistry({ logger: logger.child({ component: "registry" }) });
  registerLoadedWorkers(
    registry,
    await new WorkerLoader(loaderOptions).loadAll(),
    options.invokerFor ?? bindingInvokers(config, options.cwd)
  );

  const busLogger = logger.child({ component: "events" });
  const eventBus = new EventBus({
    onHandlerError: (error, eventName) =>
      busLogger.error(`Handler for ${eventName} threw`, {
        error: error instanceof Error ? error.message : String(error),
      }),
  });
  if (busLogger.isLevelEnabled("trace")) {
    eventBus.onAny((eventName, payload) => busLogger.trace(eventName, { payload }));
  }
  const orchestrator = new Orchestrator(registry, {
    logger,
    eventBus,
    errorHandler: new GlobalErrorHandler({ logger, eventBus }),
    config: config.orchestrator,
    focusTags: config.focus,
  });

  return Ok({
    config,
    logger,
    eventBus,
    registry,
    workflows: new WorkflowLoader(loaderOptions),
    orchestrator,
  });
}
