/**
 * `phaseflow list`
 *
 * @module cli/commands/list
 */

import { renderCatalog } from "../output/report.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";
import { loadEngine } from "./run.js";
import type { CliDeps, CommonOptions } from "./types.js";

/**
 * Prints the workflows and workers visible from the working directory.
 */
export async function executeList(options: CommonOptions, deps: CliDeps): Promise<ExitCode> {
  const engine = await loadEngine(options, deps);
  if (!engine) {
    return EXIT_CODES.USAGE_ERROR;
  }

  const workflows = await engine.workflows.loadAll();
  const workers = engine.registry.getAll();

  if (options.json) {
    const listing = {
      workflows: workflows.map((workflow) => ({
        name: workflow.name,
        source: workflow.source,
        description: workflow.value.description,
        phases: workflow.value.phases.map((phase) => phase.id),
      })),
      workers: workers.map((worker) => ({
        id: worker.id,
        capabilities: worker.capabilities,
        bound: worker.id in engine.config.workers,
      })),
    };
    deps.io.write(`${JSON.stringify(listing, null, 2)}\n`);
  } else {
    deps.io.write(renderCatalog(workflows, workers, { colors: deps.io.colors }));
  }

  return EXIT_CODES.Succeeded;
}
