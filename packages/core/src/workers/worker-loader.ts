// ============================================
// Worker Loader
// ============================================

import {
  Err,
  FrontmatterParser,
  Ok,
  type Result,
  type WorkerDescriptor,
  workerDescriptorSchema,
} from "@phaseflow/shared";

import {
  type CatalogEntry,
  CatalogLoader,
  type CatalogLoaderOptions,
  type CatalogLoadError,
  frontmatterLoadError,
} from "../catalog/catalog-loader.js";
import type { CatalogSource } from "../catalog/sources.js";
import type { WorkerRegistry } from "./registry.js";
import type { WorkerInvoker } from "./types.js";

export type LoadedWorker = CatalogEntry<WorkerDescriptor>;

/**
 * Picks the invoker for a loaded worker; undefined leaves it unbound.
 */
export type InvokerFactory = (descriptor: WorkerDescriptor) => WorkerInvoker | undefined;

const parser = new FrontmatterParser(workerDescriptorSchema);

/**
 * Parses a worker file. The markdown body becomes the description when
 * the frontmatter has none.
 *
 * @example
 * ```markdown
 * ---
 * id: security-auditor
 * capabilities: [security-review]
 * triggerPredicates:
 *   - on: FileChanged
 *     match: { type: file, pattern: "src/auth/**" }
 * ---
 * Audits authentication and authorization code.
 * ```
 */
export function parseWorkerFile(
  content: string,
  filePath: string
): Result<WorkerDescriptor, CatalogLoadError> {
  const parsed = parser.parse(content);

  if (!parsed.ok) {
    return Err(frontmatterLoadError("worker", filePath, parsed.error));
  }

  const body = parsed.value.body.trim();
  return Ok({
    ...parsed.value.data,
    description: parsed.value.data.description ?? (body.length > 0 ? body : undefined),
  });
}

/**
 * Loads worker descriptors from the built-in catalogue, the user's
 * `~/.phaseflow/workers` and the project's `.phaseflow/workers`.
 *
 * @example
 * ```typescript
 * const loader = new WorkerLoader({ cwd: process.cwd() });
 * const workers = await loader.loadAll();
 * registerLoadedWorkers(registry, workers, (d) => bindings.get(d.id));
 * ```
 */
export class WorkerLoader extends CatalogLoader<WorkerDescriptor> {
  protected readonly kind = "workers";

  constructor(options: CatalogLoaderOptions) {
    super(options, "worker-loader");
  }

  protected parse(
    content: string,
    filePath: string,
    _source: CatalogSource
  ): Result<WorkerDescriptor, CatalogLoadError> {
    return parseWorkerFile(content, filePath);
  }

  protected nameOf(descriptor: WorkerDescriptor): string {
    return descriptor.id;
  }
}

/**
 * Registers loaded workers in order, replacing earlier registrations of
 * the same id.
 */
export function registerLoadedWorkers(
  registry: WorkerRegistry,
  workers: readonly LoadedWorker[],
  invokerFor?: InvokerFactory
): WorkerDescriptor[] {
  return workers.map((worker) =>
    registry.register(worker.value, invokerFor?.(worker.value), { replace: true })
  );
}
