// ============================================
// Workflow Loader
// ============================================

/**
 * Loads workflow definitions from `.phaseflow/workflows/*.md` files.
 *
 * A workflow file is YAML frontmatter (name, phases, ...) followed by a
 * free-form markdown body.
 */

import {
  Err,
  FrontmatterParser,
  Ok,
  type Result,
  workflowFrontmatterSchema,
} from "@phaseflow/shared";

import {
  type CatalogEntry,
  CatalogLoader,
  type CatalogLoaderOptions,
  type CatalogLoadError,
  frontmatterLoadError,
} from "../catalog/catalog-loader.js";
import type { CatalogSource } from "../catalog/sources.js";
import { validateWorkflow, type WorkflowDefinition } from "./definition.js";

export type LoadedWorkflow = CatalogEntry<WorkflowDefinition>;

const parser = new FrontmatterParser(workflowFrontmatterSchema);

/**
 * Parses one workflow file and checks its phase graph.
 *
 * @example
 * ```typescript
 * const result = parseWorkflowFile(content, "/repo/.phaseflow/workflows/review.md", "project");
 * if (result.ok) {
 *   console.log(result.value.phases.length);
 * }
 * ```
 */
export function parseWorkflowFile(
  content: string,
  filePath: string,
  source: CatalogSource
): Result<WorkflowDefinition, CatalogLoadError> {
  const parsed = parser.parse(content);

  if (!parsed.ok) {
    return Err(frontmatterLoadError("workflow", filePath, parsed.error));
  }

  const { name, description, version, phases } = parsed.value.data;
  const definition: WorkflowDefinition = {
    name,
    description,
    version,
    phases,
    source,
    body: parsed.value.body.trim(),
  };

  const issues = validateWorkflow(definition);
  if (issues.length > 0) {
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid workflow "${name}": ${issues.join("; ")}`,
      filePath,
    });
  }

  return Ok(definition);
}

/**
 * Loads workflow definitions from the built-in catalogue, the user's
 * `~/.phaseflow/workflows` and the project's `.phaseflow/workflows`.
 * Project files override user files, which override built-ins.
 *
 * @example
 * ```typescript
 * const loader = new WorkflowLoader({ cwd: "/path/to/project" });
 *
 * const workflows = await loader.loadAll();
 * const sprint = await loader.load("quality-sprint");
 * ```
 */
export class WorkflowLoader extends CatalogLoader<WorkflowDefinition> {
  protected readonly kind = "workflows";

  constructor(options: CatalogLoaderOptions) {
    super(options, "workflow-loader");
  }

  protected parse(
    content: string,
    filePath: string,
    source: CatalogSource
  ): Result<WorkflowDefinition, CatalogLoadError> {
    return parseWorkflowFile(content, filePath, source);
  }

  protected nameOf(definition: WorkflowDefinition): string {
    return definition.name;
  }
}
