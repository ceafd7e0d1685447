/**
 * `phaseflow trigger <kind> <value>`
 *
 * Feeds one observed event to the trigger evaluator and runs whatever it
 * selects.
 *
 * @module cli/commands/trigger
 */

import { aggregate, GlobalErrorHandler, toRunReport, type WorkflowEvent } from "@phaseflow/core";

import { renderReport } from "../output/report.js";
import { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";
import { loadEngine, terminalApprovalGate } from "./run.js";
import type { CliDeps, CommonOptions } from "./types.js";

export const TRIGGER_KINDS = ["file", "error", "command"] as const;

export type TriggerKind = (typeof TRIGGER_KINDS)[number];

export interface TriggerCommandOptions extends CommonOptions {
  /** Run workers that need confirmation without asking */
  yes?: boolean;
  timeout?: number;
}

export function toWorkflowEvent(kind: TriggerKind, value: string): WorkflowEvent {
  switch (kind) {
    case "file":
      return { kind: "FileChanged", payload: { path: value } };
    case "error":
      return { kind: "ErrorObserved", payload: { message: value } };
    case "command":
      return { kind: "ExplicitCommand", payload: { text: value } };
  }
}

export async function executeTrigger(
  kind: TriggerKind,
  value: string,
  options: TriggerCommandOptions,
  deps: CliDeps
): Promise<ExitCode> {
  const { io } = deps;
  const engine = await loadEngine(options, deps);
  if (!engine) {
    return EXIT_CODES.USAGE_ERROR;
  }

  try {
    const run = await engine.orchestrator.react(toWorkflowEvent(kind, value), {
      approve: options.yes ? () => true : terminalApprovalGate(io),
    });

    if (!run) {
      io.writeError("No worker selected.\n");
      return EXIT_CODES.Succeeded;
    }

    const result = aggregate(run);
    const report = toRunReport(result);
    io.write(
      options.json ? `${JSON.stringify(report, null, 2)}\n` : renderReport(report, { colors: io.colors })
    );
    return ExitCodeMapper.fromResult(result);
  } catch (error) {
    io.writeError(`${GlobalErrorHandler.normalize(error).message}\n`);
    return ExitCodeMapper.fromException(error);
  }
}
