// ============================================
// Worker Registry
// ============================================

import { EventEmitter } from "node:events";

import {
  type WorkerDescriptor,
  type WorkerDescriptorInput,
  workerDescriptorSchema,
} from "@phaseflow/shared";

import { ErrorCode, PhaseflowError } from "../errors/types.js";
import { DuplicateWorkerError, UnknownWorkerError } from "../errors/workflow-errors.js";
import type { Logger } from "../logger/logger.js";
import type { WorkerInvoker } from "./types.js";

/** Prefix marking a worker reference as a capability lookup */
export const CAPABILITY_PREFIX = "capability:";

// ============================================
// Types
// ============================================

/**
 * Events emitted by WorkerRegistry.
 */
export interface RegistryEvents {
  "worker:registered": [descriptor: WorkerDescriptor];
  "worker:replaced": [descriptor: WorkerDescriptor, previous: WorkerDescriptor];
}

export interface RegistryOptions {
  logger?: Logger;
}

export interface RegisterOptions {
  /** Replace an existing worker with the same id instead of throwing */
  replace?: boolean;
}

interface RegistryEntry {
  descriptor: WorkerDescriptor;
  invoker?: WorkerInvoker;
}

function freezeDescriptor(descriptor: WorkerDescriptor): WorkerDescriptor {
  for (const value of Object.values(descriptor)) {
    if (typeof value === "object" && value !== null) {
      Object.freeze(value);
    }
  }
  return Object.freeze(descriptor);
}

// ============================================
// WorkerRegistry Class
// ============================================

/**
 * Holds every known worker descriptor together with its invoker.
 *
 * Descriptors are validated on registration and frozen afterwards.
 * Iteration order is registration order; a replaced worker keeps its slot.
 *
 * @example
 * ```typescript
 * const registry = new WorkerRegistry();
 *
 * registry.register(
 *   { id: "code-reviewer", capabilities: ["code-review"] },
 *   async ({ context }) => ({ status: "Success", producedFields: { reviewed: context.argument } })
 * );
 *
 * registry.lookup("code-reviewer");
 * registry.resolve("capability:code-review"); // same descriptor
 * ```
 */
export class WorkerRegistry extends EventEmitter<RegistryEvents> {
  private readonly workers: Map<string, RegistryEntry> = new Map();
  private readonly logger?: Logger;

  constructor(options: RegistryOptions = {}) {
    super();
    this.logger = options.logger;
  }

  get count(): number {
    return this.workers.size;
  }

  /**
   * Registers a worker.
   *
   * @throws PhaseflowError (WORKER_INVALID) if the descriptor fails validation
   * @throws DuplicateWorkerError if the id is taken and `replace` is not set
   */
  register(
    input: WorkerDescriptorInput,
    invoker?: WorkerInvoker,
    options: RegisterOptions = {}
  ): WorkerDescriptor {
    const parsed = workerDescriptorSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new PhaseflowError(
        `Invalid worker descriptor "${input.id}": ${issues.join("; ")}`,
        ErrorCode.WORKER_INVALID,
        { context: { workerId: input.id, issues }, cause: parsed.error }
      );
    }

    const descriptor = freezeDescriptor(parsed.data);
    const existing = this.workers.get(descriptor.id);

    if (existing && !options.replace) {
      throw new DuplicateWorkerError(descriptor.id);
    }

    this.workers.set(descriptor.id, { descriptor, invoker });

    if (existing) {
      this.logger?.debug(`Replaced worker: ${descriptor.id}`);
      this.emit("worker:replaced", descriptor, existing.descriptor);
    } else {
      this.logger?.debug(`Registered worker: ${descriptor.id}`);
      this.emit("worker:registered", descriptor);
    }

    return descriptor;
  }

  /**
   * @throws UnknownWorkerError if no worker has this id
   */
  lookup(id: string): WorkerDescriptor {
    const entry = this.workers.get(id);
    if (!entry) {
      throw new UnknownWorkerError(id);
    }
    return entry.descriptor;
  }

  has(id: string): boolean {
    return this.workers.has(id);
  }

  /**
   * Workers carrying the capability tag, in registration order.
   */
  findByCapability(tag: string): WorkerDescriptor[] {
    return this.getAll().filter((descriptor) => descriptor.capabilities.includes(tag));
  }

  /**
   * Resolves a workflow reference: a worker id, or `capability:<tag>`
   * which picks the first worker carrying the tag.
   *
   * @throws UnknownWorkerError if nothing matches
   */
  resolve(ref: string): WorkerDescriptor {
    if (!ref.startsWith(CAPABILITY_PREFIX)) {
      return this.lookup(ref);
    }

    const [first] = this.findByCapability(ref.slice(CAPABILITY_PREFIX.length));
    if (!first) {
      throw new UnknownWorkerError(ref);
    }
    return first;
  }

  /**
   * The invoker bound at registration, if any.
   *
   * @throws UnknownWorkerError if no worker has this id
   */
  getInvoker(id: string): WorkerInvoker | undefined {
    const entry = this.workers.get(id);
    if (!entry) {
      throw new UnknownWorkerError(id);
    }
    return entry.invoker;
  }

  getAll(): WorkerDescriptor[] {
    return Array.from(this.workers.values(), (entry) => entry.descriptor);
  }
}
