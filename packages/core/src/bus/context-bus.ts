// ============================================
// Context Bus
// ============================================

import type { InputField } from "@phaseflow/shared";

import { KeyCollisionError, MissingContextError } from "../errors/workflow-errors.js";

/** Phase key under which invocation arguments are seeded */
export const INVOCATION_PHASE = "invocation";

/** Writer id used for values the orchestrator seeds itself */
export const ORCHESTRATOR_WRITER = "orchestrator";

/**
 * Phase-iteration key, e.g. `review#2`. Each loop iteration writes under
 * its own key so nothing is overwritten.
 */
export function phaseIterationKey(phaseId: string, iteration: number): string {
  return `${phaseId}#${iteration}`;
}

export interface ContextEntry {
  phase: string;
  workerId: string;
  field: string;
  value: unknown;
  /** Write order, starting at 1 */
  sequence: number;
}

export interface ReadOptions {
  /** Returned when the field was never written */
  default?: unknown;
}

function slotKey(phase: string, workerId: string, field: string): string {
  return JSON.stringify([phase, workerId, field]);
}

/**
 * Append-only key/value store scoped to one run.
 *
 * Keys are `(phase, workerId, field)` and can be written once. Reads by
 * field return the most recent write under any phase and worker.
 *
 * @example
 * ```typescript
 * const bus = new ContextBus();
 * bus.seed("argument", "src/auth.ts");
 * bus.write("review#1", "code-reviewer", "findings", ["weak hash"]);
 *
 * bus.read("findings"); // ["weak hash"]
 * bus.read("coverage", { default: 0 }); // 0
 * ```
 */
export class ContextBus {
  private readonly slots: Map<string, ContextEntry> = new Map();
  private readonly latest: Map<string, ContextEntry> = new Map();
  private sequence = 0;

  get size(): number {
    return this.slots.size;
  }

  /**
   * @throws KeyCollisionError if the key already holds a value
   */
  write(phase: string, workerId: string, field: string, value: unknown): ContextEntry {
    const key = slotKey(phase, workerId, field);
    // Check and insert happen in one synchronous step
    if (this.slots.has(key)) {
      throw new KeyCollisionError({ phase, workerId, field });
    }

    this.sequence += 1;
    const entry: ContextEntry = { phase, workerId, field, value, sequence: this.sequence };
    this.slots.set(key, entry);
    this.latest.set(field, entry);
    return entry;
  }

  /**
   * Seeds an invocation value (e.g. the run argument) before any phase runs.
   */
  seed(field: string, value: unknown): ContextEntry {
    return this.write(INVOCATION_PHASE, ORCHESTRATOR_WRITER, field, value);
  }

  /**
   * Most recent value written for `field`.
   *
   * @throws MissingContextError if never written and no default was given
   */
  read(field: string, options?: ReadOptions): unknown {
    const entry = this.latest.get(field);
    if (entry) {
      return entry.value;
    }
    if (options && "default" in options) {
      return options.default;
    }
    throw new MissingContextError(field);
  }

  /**
   * Value stored under an exact key, if any.
   */
  get(phase: string, workerId: string, field: string): ContextEntry | undefined {
    return this.slots.get(slotKey(phase, workerId, field));
  }

  has(field: string): boolean {
    return this.latest.has(field);
  }

  /**
   * Builds a worker's input from its contract. Declared defaults fill in
   * unwritten fields; unwritten optional fields are left out.
   *
   * @throws MissingContextError for an unwritten required field without default
   */
  snapshot(contract: readonly InputField[], workerId?: string): Record<string, unknown> {
    const input: Record<string, unknown> = {};

    for (const { field, required, default: fallback } of contract) {
      const entry = this.latest.get(field);
      if (entry) {
        input[field] = entry.value;
      } else if (fallback !== undefined) {
        input[field] = fallback;
      } else if (required) {
        throw new MissingContextError(field, workerId ? { context: { workerId } } : undefined);
      }
    }

    return input;
  }

  /**
   * All entries in write order.
   */
  entries(): ContextEntry[] {
    return Array.from(this.slots.values());
  }
}
