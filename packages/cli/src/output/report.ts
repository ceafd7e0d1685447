/**
 * Plain-text rendering of run reports and catalogue listings.
 *
 * @module cli/output/report
 */

import type { LoadedWorkflow, PhaseStatus, RunReport, WorkerRecordStatus } from "@phaseflow/core";
import type { WorkerDescriptor } from "@phaseflow/shared";
import { Chalk, type ChalkInstance } from "chalk";

export interface RenderOptions {
  colors: boolean;
}

const PHASE_ICONS: Record<PhaseStatus, string> = {
  Succeeded: "✔",
  PartiallyFailed: "!",
  Failed: "✖",
  Skipped: "-",
};

function painter(options: RenderOptions): ChalkInstance {
  return new Chalk({ level: options.colors ? 1 : 0 });
}

function statusColor(
  chalk: ChalkInstance,
  status: PhaseStatus | WorkerRecordStatus | RunReport["status"]
): ChalkInstance {
  switch (status) {
    case "Succeeded":
    case "Success":
      return chalk.green;
    case "PartiallyFailed":
    case "NeedsFollowUp":
      return chalk.yellow;
    case "Failed":
    case "Failure":
      return chalk.red;
    case "Skipped":
      return chalk.gray;
  }
}

/**
 * @example
 * ```
 * Workflow quality-sprint (run-1)
 *   ✔ review: Succeeded after 2 iterations
 *       code-reviewer: Success
 *   ✖ refactor: Failed (a critical worker failed)
 *       refactoring-expert: Failure - tests broke
 * Diagnostics: 0 critical, 1 high, 0 medium, 0 low
 * Status: Failed (exit 1)
 * ```
 */
export function renderReport(report: RunReport, options: RenderOptions): string {
  const chalk = painter(options);
  const lines = [`Workflow ${chalk.bold(report.workflow)} (${report.runId})`];

  for (const phase of report.phases) {
    let line = `  ${statusColor(chalk, phase.status)(`${PHASE_ICONS[phase.status]} ${phase.id}: ${phase.status}`)}`;
    if (phase.iterations > 1) {
      line += ` after ${phase.iterations} iterations`;
    }
    if (phase.reason) {
      line += chalk.dim(` (${phase.reason})`);
    }
    lines.push(line);

    for (const worker of phase.workers) {
      const error = worker.error ? ` - ${worker.error}` : "";
      lines.push(`      ${worker.id}: ${statusColor(chalk, worker.status)(worker.status)}${error}`);
    }
  }

  const { critical, high, medium, low } = report.diagnostics;
  lines.push(`Diagnostics: ${critical} critical, ${high} high, ${medium} medium, ${low} low`);

  if (report.followUps.length > 0) {
    lines.push("Follow-ups:");
    for (const followUp of report.followUps) {
      lines.push(`  ${followUp.workerId} (${followUp.mode}) after ${followUp.after}`);
    }
  }

  const abort = report.abortReason ? `, ${report.abortReason}` : "";
  lines.push(
    `Status: ${statusColor(chalk, report.status)(report.status)} (exit ${report.exitCode}${abort})`
  );

  return `${lines.join("\n")}\n`;
}

export function renderCatalog(
  workflows: readonly LoadedWorkflow[],
  workers: readonly WorkerDescriptor[],
  options: RenderOptions
): string {
  const chalk = painter(options);
  const lines = ["Workflows:"];

  for (const workflow of workflows) {
    const description = workflow.value.description ? ` - ${workflow.value.description}` : "";
    lines.push(`  ${chalk.bold(workflow.name)} [${workflow.source}]${description}`);
  }

  lines.push("Workers:");
  for (const worker of workers) {
    lines.push(`  ${chalk.bold(worker.id)} (${worker.capabilities.join(", ")})`);
  }

  return `${lines.join("\n")}\n`;
}
