// ============================================
// Trigger Evaluator
// ============================================
// Decides which workers an event selects, from the predicates the
// workers declare. Matching is deterministic; fuzzy matching can be
// plugged in through an external matcher.

import type {
  EventKind,
  TriggerMatch,
  TriggerMode,
  TriggerPredicate,
  WorkerDescriptor,
} from "@phaseflow/shared";
import picomatch from "picomatch";

import { UnknownWorkerError } from "../errors/workflow-errors.js";
import type { Logger } from "../logger/logger.js";
import type { WorkerRegistry } from "../workers/registry.js";

/** Pattern for explicit @worker-id invocation */
const EXPLICIT_INVOCATION_PATTERN = /^@([a-z][a-z0-9-]*)\b/i;

// ============================================
// Types
// ============================================

/**
 * An observed event. The payload is opaque; known keys are `path`, `text`,
 * `message`, `workerId`, `status`, `runId` and `phaseId`.
 */
export interface WorkflowEvent {
  kind: EventKind;
  payload: Record<string, unknown>;
}

/**
 * A worker selected by an event.
 */
export interface TriggeredWorker {
  workerId: string;
  mode: TriggerMode;
  /** How the worker was selected */
  source: "predicate" | "explicit" | "external";
  /** Index of the matching predicate; -1 unless `source` is "predicate" */
  predicateIndex: number;
}

/**
 * Hook for matching beyond declared predicates (e.g. a language model).
 * Consulted only for workers whose predicates did not match.
 */
export type ExternalMatcher = (
  event: WorkflowEvent,
  descriptor: WorkerDescriptor
) => boolean | Promise<boolean>;

export interface TriggerEvaluatorOptions {
  logger?: Logger;
  externalMatcher?: ExternalMatcher;
}

function stringField(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === "string" ? value : undefined;
}

// ============================================
// TriggerEvaluator Class
// ============================================

/**
 * Evaluates worker trigger predicates against events.
 *
 * - Workers are visited in registration order; predicates in declaration order.
 * - The first matching predicate of a worker decides its mode.
 * - Any number of workers may match the same event.
 * - `ExplicitCommand` events bypass predicates and name the worker directly.
 *
 * @example
 * ```typescript
 * const evaluator = new TriggerEvaluator();
 *
 * evaluator.evaluate({ kind: "FileChanged", payload: { path: "src/api.ts" } }, registry);
 * // ["code-reviewer", "typescript-pro"]
 *
 * evaluator.evaluate({ kind: "ExplicitCommand", payload: { text: "@debugger why?" } }, registry);
 * // ["debugger"]
 * ```
 */
export class TriggerEvaluator {
  private readonly logger?: Logger;
  private readonly externalMatcher?: ExternalMatcher;
  private readonly globCache: Map<string, (path: string) => boolean> = new Map();
  private readonly regexCache: Map<string, RegExp | null> = new Map();

  constructor(options: TriggerEvaluatorOptions = {}) {
    this.logger = options.logger;
    this.externalMatcher = options.externalMatcher;
  }

  /**
   * Ids of the workers the event selects, in registration order.
   *
   * @throws UnknownWorkerError for an explicit command naming no known worker
   */
  evaluate(event: WorkflowEvent, registry: WorkerRegistry): string[] {
    return this.evaluateDetailed(event, registry).map((match) => match.workerId);
  }

  /**
   * Like `evaluate`, but keeps the mode and matching predicate of each worker.
   */
  evaluateDetailed(event: WorkflowEvent, registry: WorkerRegistry): TriggeredWorker[] {
    if (event.kind === "ExplicitCommand") {
      return [this.resolveExplicit(event, registry)];
    }

    const matches: TriggeredWorker[] = [];
    for (const descriptor of registry.getAll()) {
      const match = this.matchDescriptor(event, descriptor);
      if (match) {
        matches.push(match);
      }
    }

    this.logger?.debug(`${event.kind} selected ${matches.length} worker(s)`, {
      workers: matches.map((m) => m.workerId),
    });

    return matches;
  }

  /**
   * Declared predicates first, then the external matcher for workers left over.
   * External matches always require confirmation.
   */
  async evaluateWithMatcher(
    event: WorkflowEvent,
    registry: WorkerRegistry
  ): Promise<TriggeredWorker[]> {
    if (event.kind === "ExplicitCommand" || !this.externalMatcher) {
      return this.evaluateDetailed(event, registry);
    }

    const matches: TriggeredWorker[] = [];
    for (const descriptor of registry.getAll()) {
      const match = this.matchDescriptor(event, descriptor);
      if (match) {
        matches.push(match);
      } else if (await this.externalMatcher(event, descriptor)) {
        matches.push({
          workerId: descriptor.id,
          mode: "confirm",
          source: "external",
          predicateIndex: -1,
        });
      }
    }
    return matches;
  }

  /**
   * Tests a single predicate against an event.
   */
  matches(event: WorkflowEvent, predicate: TriggerPredicate, selfId?: string): boolean {
    const kinds = Array.isArray(predicate.on) ? predicate.on : [predicate.on];
    if (!kinds.includes(event.kind)) {
      return false;
    }
    return this.matchPayload(event.payload, predicate.match, selfId);
  }

  // ============================================
  // Private Methods
  // ============================================

  private resolveExplicit(event: WorkflowEvent, registry: WorkerRegistry): TriggeredWorker {
    const named =
      stringField(event.payload, "workerId") ??
      stringField(event.payload, "text")?.trim().match(EXPLICIT_INVOCATION_PATTERN)?.[1];

    if (!named) {
      throw new UnknownWorkerError(stringField(event.payload, "text") ?? "", {
        context: { reason: "explicit command names no worker" },
      });
    }

    const descriptor = registry.lookup(named.toLowerCase());
    this.logger?.debug(`Explicit command for worker: ${descriptor.id}`);

    return { workerId: descriptor.id, mode: "auto", source: "explicit", predicateIndex: -1 };
  }

  private matchDescriptor(
    event: WorkflowEvent,
    descriptor: WorkerDescriptor
  ): TriggeredWorker | undefined {
    const index = descriptor.triggerPredicates.findIndex((predicate) =>
      this.matches(event, predicate, descriptor.id)
    );
    const predicate = descriptor.triggerPredicates[index];
    if (!predicate) {
      return undefined;
    }
    return { workerId: descriptor.id, mode: predicate.mode, source: "predicate", predicateIndex: index };
  }

  private matchPayload(
    payload: Record<string, unknown>,
    match: TriggerMatch,
    selfId: string | undefined
  ): boolean {
    switch (match.type) {
      case "always":
        return true;

      case "file": {
        const path = stringField(payload, "path");
        return path !== undefined && this.getGlob(match.pattern)(path.replace(/\\/g, "/"));
      }

      case "keyword": {
        const text = this.textOf(payload);
        if (text === undefined) return false;
        const haystack = text.toLowerCase();
        return match.pattern
          .split("|")
          .map((keyword) => keyword.trim().toLowerCase())
          .some((keyword) => keyword.length > 0 && haystack.includes(keyword));
      }

      case "regex": {
        const text = this.textOf(payload);
        const regex = this.getRegex(match.pattern, match.flags ?? "i");
        return text !== undefined && regex !== null && regex.test(text);
      }

      case "worker": {
        const completed = stringField(payload, "workerId");
        // A worker never triggers on its own completion
        if (completed === undefined || completed === selfId) return false;
        if (match.workerId !== undefined && match.workerId !== completed) return false;
        return match.status === undefined || match.status === payload.status;
      }
    }
  }

  private textOf(payload: Record<string, unknown>): string | undefined {
    return stringField(payload, "text") ?? stringField(payload, "message");
  }

  private getGlob(pattern: string): (path: string) => boolean {
    let matcher = this.globCache.get(pattern);
    if (!matcher) {
      matcher = picomatch(pattern, { dot: true });
      this.globCache.set(pattern, matcher);
    }
    return matcher;
  }

  private getRegex(pattern: string, flags: string): RegExp | null {
    const key = `${flags}/${pattern}`;
    const cached = this.regexCache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let regex: RegExp | null;
    try {
      // Stateful flags would make repeated tests alternate
      regex = new RegExp(pattern, flags.replace(/[gy]/g, ""));
    } catch (error) {
      this.logger?.warn(`Ignoring invalid trigger regex: ${pattern}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      regex = null;
    }
    this.regexCache.set(key, regex);
    return regex;
  }
}
