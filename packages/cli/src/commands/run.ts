/**
 * `phaseflow run <workflow> [argument]`
 *
 * @module cli/commands/run
 */

import {
  type ApprovalGate,
  GlobalErrorHandler,
  type PartialConfig,
  toRunReport,
} from "@phaseflow/core";

import type { CliIO } from "../io.js";
import { renderReport } from "../output/report.js";
import { setShutdownCleanup } from "../shutdown.js";
import { createEngine, type Engine } from "./engine.js";
import { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";
import type { CliDeps, CommonOptions } from "./types.js";

export interface RunCommandOptions extends CommonOptions {
  focus?: string;
  interactive?: boolean;
  maxIterations?: number;
  /** Per-invocation deadline in milliseconds */
  timeout?: number;
}

export function commonOverrides(options: CommonOptions & { timeout?: number }): PartialConfig {
  const overrides: PartialConfig = {};
  if (options.verbose) {
    overrides.logging = { level: "debug" };
  }
  if (options.timeout !== undefined) {
    overrides.orchestrator = { workerTimeoutMs: options.timeout };
  }
  return overrides;
}

/**
 * Asks on the terminal before advancing past a phase or dispatching a
 * worker that needs confirmation.
 */
export function terminalApprovalGate(io: CliIO): ApprovalGate {
  return (request) => {
    if (request.kind === "phase") {
      return io.confirm(`Phase "${request.phaseId}" finished ${request.status}. Continue?`);
    }
    return io.confirm(`Run ${request.workerId} for this ${request.event.kind} event?`);
  };
}

export async function loadEngine(
  options: CommonOptions & { timeout?: number },
  deps: CliDeps
): Promise<Engine | undefined> {
  const { io, ...engineOptions } = deps;
  const engine = await createEngine({
    ...engineOptions,
    cwd: options.cwd ?? process.cwd(),
    overrides: commonOverrides(options),
  });
  if (!engine.ok) {
    io.writeError(`${engine.error.message}\n`);
    return undefined;
  }
  return engine.value;
}

/**
 * Runs a workflow and prints its report.
 *
 * @returns The exit code for the terminal run status, or USAGE_ERROR when
 * the run could not start
 */
export async function executeRun(
  workflowName: string,
  argument: string | undefined,
  options: RunCommandOptions,
  deps: CliDeps
): Promise<ExitCode> {
  const { io } = deps;
  const engine = await loadEngine(options, deps);
  if (!engine) {
    return EXIT_CODES.USAGE_ERROR;
  }

  const definition = await engine.workflows.load(workflowName);
  if (!definition) {
    io.writeError(`Unknown workflow "${workflowName}". Run "phaseflow list" to see what is available.\n`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const controller = new AbortController();
  setShutdownCleanup(() => controller.abort());

  try {
    const result = await engine.orchestrator.execute(definition, {
      argument,
      focus: options.focus,
      interactive: options.interactive,
      maxIterations: options.maxIterations,
      signal: controller.signal,
      approve: terminalApprovalGate(io),
    });

    const report = toRunReport(result);
    io.write(
      options.json ? `${JSON.stringify(report, null, 2)}\n` : renderReport(report, { colors: io.colors })
    );
    return ExitCodeMapper.fromResult(result);
  } catch (error) {
    const normalized = GlobalErrorHandler.normalize(error);
    engine.logger.debug("Run rejected before start", { code: normalized.code });
    io.writeError(`${normalized.message}\n`);
    return ExitCodeMapper.fromException(error);
  } finally {
    setShutdownCleanup(null);
  }
}
