// ============================================
// Orchestrator
// ============================================
// Walks a workflow's phase graph, dispatches workers, threads their
// outputs through the context bus and evaluates validation loops.

import { formatZodIssues, type WorkerDescriptor } from "@phaseflow/shared";

import { phaseIterationKey } from "../bus/context-bus.js";
import { CONFIG_DEFAULTS, DEFAULT_FOCUS_TAGS } from "../config/defaults.js";
import { type OrchestratorConfig, OrchestratorConfigSchema } from "../config/schema.js";
import { GlobalErrorHandler } from "../errors/handler.js";
import { type RetryOptions, withDeadline, withRetry } from "../errors/retry.js";
import { ErrorCode, PhaseflowError } from "../errors/types.js";
import {
  InvalidWorkflowError,
  KeyCollisionError,
  MissingContextError,
  WorkerInvocationError,
} from "../errors/workflow-errors.js";
import type { EventBus, EventDefinition } from "../events/bus.js";
import { Events } from "../events/definitions.js";
import type { Logger } from "../logger/logger.js";
import { TriggerEvaluator, type TriggeredWorker, type WorkflowEvent } from "../triggers/evaluator.js";
import { outputContractViolations } from "../workers/contract.js";
import { type AggregatedDiagnostics, aggregateDiagnostics } from "../workers/diagnostics.js";
import type { WorkerRegistry } from "../workers/registry.js";
import { type WorkerOutcome, workerOutcomeSchema } from "../workers/types.js";
import {
  assertValidWorkflow,
  normalizePhases,
  readyPhases,
  type WorkflowDefinition,
} from "../workflows/definition.js";
import {
  compileLoopPredicate,
  type LoopPredicate,
  noFollowUpRequested,
} from "../workflows/loop-predicate.js";
import { aggregate, type FinalResult } from "./aggregator.js";
import { mapWithConcurrency } from "./concurrency.js";
import type { TerminalRunStatus } from "./state-machine.js";
import {
  type AbortReason,
  type IterationRecord,
  type PhaseState,
  type PhaseStatus,
  type WorkerRecord,
  WorkflowRun,
} from "./run.js";

// ============================================
// Types
// ============================================

/**
 * Question put to the approval gate: whether to advance past a finished
 * phase, or whether to dispatch a worker whose trigger needs confirmation.
 */
export type ApprovalRequest =
  | {
      kind: "phase";
      runId: string;
      workflow: string;
      phaseId: string;
      status: PhaseStatus;
      diagnostics: AggregatedDiagnostics;
    }
  | {
      kind: "trigger";
      workerId: string;
      event: WorkflowEvent;
      source: TriggeredWorker["source"];
    };

export type ApprovalGate = (request: ApprovalRequest) => boolean | Promise<boolean>;

export interface OrchestratorOptions {
  logger?: Logger;
  eventBus?: EventBus;
  evaluator?: TriggerEvaluator;
  /** Handles errors that escape a run; they become the run's fatal error */
  errorHandler?: GlobalErrorHandler;
  config?: Partial<OrchestratorConfig>;
  /** Focus name → capability tags */
  focusTags?: Record<string, string[]>;
}

export interface RunOptions {
  /** Free-form invocation argument, seeded into the bus as `argument` */
  argument?: string;
  /** Extra fields seeded into the bus before the first phase */
  context?: Record<string, unknown>;
  /** Dispatch only workers whose capabilities intersect the focus tags */
  focus?: string;
  /** Ask `approve` before advancing past each phase */
  interactive?: boolean;
  /** Replaces the cap of every looping phase */
  maxIterations?: number;
  signal?: AbortSignal;
  approve?: ApprovalGate;
  runId?: string;
  /** Receives this run's events in place of the orchestrator's bus */
  eventBus?: EventBus;
}

export type ReactOptions = Omit<RunOptions, "focus" | "interactive" | "maxIterations">;

interface ResolvedWorker {
  descriptor: WorkerDescriptor;
  advisory: boolean;
}

interface ResolvedPhase {
  id: string;
  workers: ResolvedWorker[];
  parallel: boolean;
  dependsOn: string[];
  /** Absent for phases that run once */
  predicate?: LoopPredicate;
  maxIterations: number;
  timeoutMs?: number;
}

interface RunContext {
  run: WorkflowRun;
  options: RunOptions;
  eventBus?: EventBus;
  logger?: Logger;
  /** Undefined when no focus was given */
  focusTags?: string[];
}

const REACTION_PHASE = "reaction";

const SKIP_REASONS: Record<AbortReason, string> = {
  cancelled: "run cancelled",
  "approval-denied": "approval denied",
  "phase-failed": "an earlier phase failed",
  "fatal-error": "run hit a fatal error",
};

function failureOutcome(error: PhaseflowError): WorkerOutcome {
  return {
    status: "Failure",
    producedFields: {},
    diagnostics: { error: { name: error.name, message: error.message, code: error.code } },
  };
}

function skippedRecord(worker: ResolvedWorker): WorkerRecord {
  return {
    workerId: worker.descriptor.id,
    advisory: worker.advisory,
    status: "Skipped",
    durationMs: 0,
    attempts: 0,
  };
}

// ============================================
// Orchestrator Class
// ============================================

/**
 * Executes workflow definitions against a worker registry.
 *
 * - Phases run one at a time, in dependency then declaration order.
 * - Parallel phases dispatch their workers concurrently; every worker
 *   finishes before the phase is judged.
 * - Sequential phases stop at the first failure; the rest are skipped.
 * - Looping phases re-run until their predicate holds or the cap is hit.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator(registry, { logger, eventBus });
 * const run = await orchestrator.run(qualitySprint, { argument: "src/auth.ts" });
 *
 * run.status; // "Succeeded"
 * ```
 */
export class Orchestrator {
  private readonly registry: WorkerRegistry;
  private readonly logger?: Logger;
  private readonly eventBus?: EventBus;
  private readonly evaluator: TriggerEvaluator;
  private readonly errorHandler?: GlobalErrorHandler;
  private readonly config: OrchestratorConfig;
  private readonly focusTags: Record<string, string[]>;

  constructor(registry: WorkerRegistry, options: OrchestratorOptions = {}) {
    this.registry = registry;
    this.logger = options.logger;
    this.eventBus = options.eventBus;
    this.evaluator = options.evaluator ?? new TriggerEvaluator({ logger: options.logger });
    this.errorHandler = options.errorHandler;
    this.config = OrchestratorConfigSchema.parse(options.config ?? {});
    this.focusTags = options.focusTags ?? DEFAULT_FOCUS_TAGS;
  }

  /**
   * Runs a workflow to a terminal status.
   *
   * Worker failures, timeouts, cancellation and context violations end up
   * in the returned run rather than being thrown.
   *
   * @throws InvalidWorkflowError if the definition is structurally invalid
   * @throws UnknownWorkerError if a worker reference does not resolve
   * @throws PhaseflowError (CONFIG_INVALID) for unusable run options
   */
  async run(definition: WorkflowDefinition, options: RunOptions = {}): Promise<WorkflowRun> {
    const phases = this.prepare(definition, options);

    const run = new WorkflowRun(definition, { id: options.runId });
    if (options.argument !== undefined) {
      run.contextBus.seed("argument", options.argument);
    }
    for (const [field, value] of Object.entries(options.context ?? {})) {
      run.contextBus.seed(field, value);
    }

    const ctx: RunContext = {
      run,
      options,
      eventBus: options.eventBus ?? this.eventBus,
      logger: this.logger?.child({ runId: run.id, workflow: definition.name }),
      focusTags: options.focus !== undefined ? this.focusTagsFor(options.focus) : undefined,
    };

    run.transition("Running");
    this.emit(ctx, Events.runStart, { runId: run.id, workflow: definition.name });
    ctx.logger?.info(`Starting workflow ${definition.name}`, { phases: phases.length });

    try {
      await this.schedule(ctx, phases);
    } catch (error) {
      run.fatalError = this.errorHandler?.handle(error) ?? GlobalErrorHandler.normalize(error);
      run.abortReason = "fatal-error";
    }

    this.finish(ctx);
    return run;
  }

  /**
   * Runs a workflow and aggregates the terminal run.
   */
  async execute(definition: WorkflowDefinition, options: RunOptions = {}): Promise<FinalResult> {
    return aggregate(await this.run(definition, options));
  }

  /**
   * Evaluates triggers for an external event and runs the selected workers
   * as one parallel phase named `reaction`.
   *
   * `auto` matches always run; `confirm` matches run only when `approve`
   * says yes. The event is seeded as `event`, and its text or path as
   * `argument` unless one is given.
   *
   * @returns The terminal run, or `null` when no worker was selected
   * @throws UnknownWorkerError for an explicit command naming no known worker
   */
  async react(event: WorkflowEvent, options: ReactOptions = {}): Promise<WorkflowRun | null> {
    const matches = await this.evaluator.evaluateWithMatcher(event, this.registry);
    const eventBus = options.eventBus ?? this.eventBus;
    const selected: string[] = [];

    for (const match of matches) {
      eventBus?.emit(Events.triggerMatched, {
        eventKind: event.kind,
        workerId: match.workerId,
        mode: match.mode,
      });

      if (match.mode === "auto") {
        selected.push(match.workerId);
        continue;
      }
      const approved = options.approve
        ? await options.approve({ kind: "trigger", workerId: match.workerId, event, source: match.source })
        : false;
      if (approved) {
        selected.push(match.workerId);
      } else {
        this.logger?.info(`Trigger for ${match.workerId} not confirmed`);
      }
    }

    if (selected.length === 0) {
      this.logger?.debug(`No worker selected for ${event.kind}`);
      return null;
    }

    const definition: WorkflowDefinition = {
      name: REACTION_PHASE,
      description: `Workers selected by a ${event.kind} event`,
      phases: [{ id: REACTION_PHASE, workers: selected, parallel: true }],
      source: "inline",
    };

    return this.run(definition, {
      ...options,
      argument: options.argument ?? this.argumentOf(event),
      context: { ...options.context, event: { kind: event.kind, payload: event.payload } },
    });
  }

  // ============================================
  // Setup
  // ============================================

  /**
   * Validates the definition and options and resolves every worker
   * reference, before anything runs.
   */
  private prepare(definition: WorkflowDefinition, options: RunOptions): ResolvedPhase[] {
    if (
      options.maxIterations !== undefined &&
      (!Number.isInteger(options.maxIterations) || options.maxIterations < 1)
    ) {
      throw new PhaseflowError(
        `maxIterations must be an integer >= 1, got ${options.maxIterations}`,
        ErrorCode.CONFIG_INVALID
      );
    }
    if (options.interactive && !options.approve) {
      throw new PhaseflowError("Interactive runs need an approval gate", ErrorCode.CONFIG_INVALID);
    }

    assertValidWorkflow(definition);

    return normalizePhases(definition).map((phase) => {
      const workers = phase.workers.map((worker) => ({
        descriptor: this.registry.resolve(worker.ref),
        advisory: worker.advisory,
      }));

      const ids = workers.map((worker) => worker.descriptor.id);
      const repeated = ids.find((id, index) => ids.indexOf(id) !== index);
      if (repeated) {
        throw new InvalidWorkflowError(definition.name, [
          `phase "${phase.id}" dispatches worker "${repeated}" more than once`,
        ]);
      }

      // A phase loops when it declares a predicate or a cap above one
      const loops = phase.loopUntil !== undefined || (phase.maxIterations ?? 1) > 1;
      let predicate: LoopPredicate | undefined;
      if (phase.loopUntil !== undefined) {
        predicate = compileLoopPredicate(phase.loopUntil);
      } else if (loops) {
        predicate = noFollowUpRequested;
      }

      return {
        id: phase.id,
        workers,
        parallel: phase.parallel,
        dependsOn: phase.dependsOn,
        predicate,
        maxIterations: loops
          ? (options.maxIterations ?? phase.maxIterations ?? this.config.defaultMaxIterations)
          : 1,
        timeoutMs: phase.timeoutMs,
      };
    });
  }

  private focusTagsFor(focus: string): string[] {
    return this.focusTags[focus] ?? [focus];
  }

  // ============================================
  // Scheduling
  // ============================================

  private async schedule(ctx: RunContext, phases: readonly ResolvedPhase[]): Promise<void> {
    const { run, options } = ctx;
    const finished = new Set<string>();

    while (true) {
      const ready = readyPhases(phases, finished);
      run.phaseCursor = ready.map((phase) => phase.id);

      const next = ready[0];
      if (!next) break;

      if (options.signal?.aborted) {
        run.abortReason = "cancelled";
        break;
      }

      const state = await this.executePhase(ctx, next);
      finished.add(next.id);

      if (run.fatalError) {
        run.abortReason = "fatal-error";
        break;
      }
      if (options.signal?.aborted) {
        run.abortReason = "cancelled";
        break;
      }
      if (state.status === "Failed") {
        run.abortReason = "phase-failed";
        break;
      }

      const remaining = phases.some((phase) => !finished.has(phase.id));
      if (options.interactive && remaining && !(await this.requestApproval(ctx, state))) {
        run.abortReason = "approval-denied";
        break;
      }
    }

    run.phaseCursor = [];
  }

  private async requestApproval(ctx: RunContext, state: PhaseState): Promise<boolean> {
    const { run, options } = ctx;
    const status = state.status ?? "Succeeded";
    const last = state.iterations.at(-1);

    this.emit(ctx, Events.approvalRequested, { runId: run.id, phaseId: state.id, status });

    const approved = options.approve
      ? await options.approve({
          kind: "phase",
          runId: run.id,
          workflow: run.definition.name,
          phaseId: state.id,
          status,
          diagnostics: last?.diagnostics ?? aggregateDiagnostics([]),
        })
      : true;

    if (!approved) {
      ctx.logger?.warn(`Approval denied after phase ${state.id}`);
    }
    return approved;
  }

  private finish(ctx: RunContext): void {
    const { run } = ctx;

    for (const state of run.phases.values()) {
      if (state.status === undefined) {
        state.status = "Skipped";
        state.reason = run.abortReason ? SKIP_REASONS[run.abortReason] : "not reached";
      }
    }

    const status = this.finalStatus(run);
    run.transition(status);

    this.emit(ctx, Events.runEnd, {
      runId: run.id,
      workflow: run.definition.name,
      status,
      durationMs: run.durationMs,
    });

    const message = `Workflow ${run.definition.name} finished: ${status}`;
    if (status === "Succeeded") {
      ctx.logger?.info(message, { durationMs: run.durationMs });
    } else {
      ctx.logger?.warn(message, { abortReason: run.abortReason, durationMs: run.durationMs });
    }
  }

  private finalStatus(run: WorkflowRun): TerminalRunStatus {
    if (run.abortReason) {
      return "Failed";
    }
    const statuses = Array.from(run.phases.values(), (state) => state.status);
    if (statuses.includes("Failed")) return "Failed";
    if (statuses.includes("PartiallyFailed")) return "PartiallyFailed";
    return "Succeeded";
  }

  // ============================================
  // Phases
  // ============================================

  private async executePhase(ctx: RunContext, phase: ResolvedPhase): Promise<PhaseState> {
    const { run, options } = ctx;
    const state = run.phase(phase.id);
    state.startedAt = new Date();

    const workers = ctx.focusTags ? this.applyFocus(phase.workers, ctx.focusTags) : phase.workers;
    if (workers.length === 0) {
      state.status = "Skipped";
      state.reason = `no worker matches focus "${options.focus ?? ""}"`;
      state.endedAt = new Date();
      ctx.logger?.info(`Skipping phase ${phase.id}: ${state.reason}`);
      return state;
    }

    for (let iteration = 1; iteration <= phase.maxIterations; iteration++) {
      const record = await this.executeIteration(ctx, phase, workers, iteration);
      state.iterations.push(record);

      const fatal = record.workers.find((worker) => worker.fatalError)?.fatalError;
      const status = this.iterationStatus(record);

      if (fatal) {
        run.fatalError ??= fatal;
        state.status = "Failed";
        state.reason = fatal.message;
      } else if (status === "Failed") {
        state.status = "Failed";
        state.reason = "a critical worker failed";
      } else if (!phase.predicate) {
        state.status = status;
      } else {
        record.loopSatisfied = phase.predicate(record.diagnostics);
        if (record.loopSatisfied) {
          state.status = status;
        } else if (iteration === phase.maxIterations) {
          state.status = "PartiallyFailed";
          state.reason = `loop condition unmet after ${iteration} iteration(s)`;
        } else if (options.signal?.aborted) {
          state.status = "Failed";
          state.reason = "run cancelled";
        }
      }

      if (status === "PartiallyFailed" && state.status === "PartiallyFailed") {
        state.reason ??= "an advisory worker failed";
      }

      this.emit(ctx, Events.phaseEnd, {
        runId: run.id,
        phaseId: phase.id,
        iteration,
        status: state.status ?? status,
      });

      if (state.status !== undefined) break;
      ctx.logger?.info(`Phase ${phase.id} loop condition unmet, starting iteration ${iteration + 1}`);
    }

    state.endedAt = new Date();
    ctx.logger?.info(`Phase ${phase.id} finished: ${state.status ?? "Succeeded"}`, {
      iterations: state.iterations.length,
    });
    return state;
  }

  private applyFocus(workers: readonly ResolvedWorker[], tags: readonly string[]): ResolvedWorker[] {
    return workers.filter((worker) =>
      worker.descriptor.capabilities.some((capability) => tags.includes(capability))
    );
  }

  /**
   * Critical failure → Failed; advisory failure only → PartiallyFailed.
   */
  private iterationStatus(record: IterationRecord): Exclude<PhaseStatus, "Skipped"> {
    const failures = record.workers.filter((worker) => worker.status === "Failure");
    if (failures.some((worker) => !worker.advisory)) return "Failed";
    if (failures.length > 0) return "PartiallyFailed";
    return "Succeeded";
  }

  private async executeIteration(
    ctx: RunContext,
    phase: ResolvedPhase,
    workers: readonly ResolvedWorker[],
    iteration: number
  ): Promise<IterationRecord> {
    const { run } = ctx;
    const key = phaseIterationKey(phase.id, iteration);
    this.emit(ctx, Events.phaseStart, { runId: run.id, phaseId: phase.id, iteration });

    let records: WorkerRecord[];
    if (phase.parallel) {
      records = await mapWithConcurrency(workers, this.config.maxParallelWorkers, (worker) =>
        this.invokeWorker(ctx, phase, worker, iteration)
      );
      // Committed in declaration order so reads do not depend on timing
      for (const record of records) {
        this.commitOutputs(run, key, record);
      }
    } else {
      records = [];
      for (const worker of workers) {
        if (records.some((record) => record.status === "Failure")) {
          records.push(skippedRecord(worker));
          continue;
        }
        const record = await this.invokeWorker(ctx, phase, worker, iteration);
        this.commitOutputs(run, key, record);
        records.push(record);
      }
    }

    const diagnostics = aggregateDiagnostics(
      records.flatMap((record) =>
        record.outcome ? [{ workerId: record.workerId, phase: key, outcome: record.outcome }] : []
      )
    );

    for (const record of records) {
      this.recordFollowUps(ctx, phase.id, iteration, record);
    }

    return { iteration, key, workers: records, diagnostics };
  }

  // ============================================
  // Workers
  // ============================================

  private async invokeWorker(
    ctx: RunContext,
    phase: ResolvedPhase,
    worker: ResolvedWorker,
    iteration: number
  ): Promise<WorkerRecord> {
    const { run } = ctx;
    const { descriptor } = worker;
    const started = Date.now();
    const where = { runId: run.id, phaseId: phase.id, iteration, workerId: descriptor.id };

    this.emit(ctx, Events.workerStart, where);

    let context: Record<string, unknown>;
    try {
      context = run.contextBus.snapshot(descriptor.inputContract, descriptor.id);
    } catch (error) {
      if (!(error instanceof MissingContextError)) throw error;
      return this.completeWorker(ctx, worker, where, {
        outcome: failureOutcome(error),
        started,
        attempts: 0,
        fatalError: error,
      });
    }

    const input = context;
    let attempts = 0;
    let outcome: WorkerOutcome;
    try {
      outcome = await withRetry((attempt) => {
        attempts = attempt;
        return this.callInvoker(ctx, phase, descriptor, iteration, input);
      }, this.retryOptions(ctx, descriptor));
    } catch (error) {
      outcome = failureOutcome(this.toInvocationError(descriptor.id, error));
    }

    return this.completeWorker(ctx, worker, where, { outcome, started, attempts });
  }

  private completeWorker(
    ctx: RunContext,
    worker: ResolvedWorker,
    where: { runId: string; phaseId: string; iteration: number; workerId: string },
    result: { outcome: WorkerOutcome; started: number; attempts: number; fatalError?: PhaseflowError }
  ): WorkerRecord {
    const { outcome } = result;
    const durationMs = Date.now() - result.started;
    this.emit(ctx, Events.workerEnd, { ...where, status: outcome.status, durationMs });

    if (outcome.status === "Failure") {
      ctx.logger?.warn(`Worker ${where.workerId} failed`, {
        phase: where.phaseId,
        iteration: where.iteration,
        error: outcome.diagnostics.error?.message,
      });
    } else {
      ctx.logger?.debug(`Worker ${where.workerId}: ${outcome.status}`, {
        phase: where.phaseId,
        durationMs,
      });
    }

    return {
      workerId: where.workerId,
      advisory: worker.advisory,
      status: outcome.status,
      outcome,
      durationMs,
      attempts: result.attempts,
      fatalError: result.fatalError,
    };
  }

  private async callInvoker(
    ctx: RunContext,
    phase: ResolvedPhase,
    descriptor: WorkerDescriptor,
    iteration: number,
    context: Record<string, unknown>
  ): Promise<WorkerOutcome> {
    const invoker = this.registry.getInvoker(descriptor.id);
    if (!invoker) {
      throw new WorkerInvocationError(descriptor.id, `No invoker bound to worker "${descriptor.id}"`);
    }

    const timeoutMs = descriptor.timeoutMs ?? phase.timeoutMs ?? this.config.workerTimeoutMs;
    const raw = await withDeadline(
      (signal) =>
        invoker({
          runId: ctx.run.id,
          workflow: ctx.run.definition.name,
          phaseId: phase.id,
          iteration,
          workerId: descriptor.id,
          context: { ...context },
          declaredInputFields: descriptor.inputContract.map((input) => input.field),
          signal,
        }),
      { timeoutMs, signal: ctx.options.signal, context: { workerId: descriptor.id } }
    );

    const parsed = workerOutcomeSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      throw new WorkerInvocationError(
        descriptor.id,
        `Worker "${descriptor.id}" returned an invalid outcome: ${issues}`
      );
    }
    const violations = outputContractViolations(descriptor.outputContract, parsed.data);
    if (violations.length > 0) {
      throw new WorkerInvocationError(
        descriptor.id,
        `Worker "${descriptor.id}" broke its output contract: ${violations.join("; ")}`
      );
    }
    return parsed.data;
  }

  private retryOptions(ctx: RunContext, descriptor: WorkerDescriptor): RetryOptions {
    return {
      maxRetries: descriptor.retry?.maxRetries ?? 0,
      baseDelayMs: descriptor.retry?.baseDelayMs ?? CONFIG_DEFAULTS.retry.baseDelayMs,
      maxDelayMs: CONFIG_DEFAULTS.retry.maxDelayMs,
      signal: ctx.options.signal,
      shouldRetry: (error) => error instanceof WorkerInvocationError && error.isRetryable,
      onRetry: ({ error, nextAttempt, delayMs }) => {
        ctx.logger?.warn(`Retrying worker ${descriptor.id} (attempt ${nextAttempt}) in ${delayMs}ms`, {
          error: error instanceof Error ? error.message : String(error),
        });
      },
    };
  }

  /**
   * Timeouts and aborts keep their own type; anything else becomes a
   * WorkerInvocationError.
   */
  private toInvocationError(workerId: string, error: unknown): PhaseflowError {
    if (error instanceof PhaseflowError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new WorkerInvocationError(workerId, `Worker "${workerId}" threw: ${message}`, {
      cause: error,
    });
  }

  /**
   * Writes a worker's produced fields under the phase-iteration key. A
   * collision is recorded on the worker as a fatal error.
   */
  private commitOutputs(run: WorkflowRun, key: string, record: WorkerRecord): void {
    if (!record.outcome) return;

    for (const [field, value] of Object.entries(record.outcome.producedFields)) {
      try {
        run.contextBus.write(key, record.workerId, field, value);
      } catch (error) {
        if (!(error instanceof KeyCollisionError)) throw error;
        record.fatalError ??= error;
      }
    }
  }

  private recordFollowUps(
    ctx: RunContext,
    phaseId: string,
    iteration: number,
    record: WorkerRecord
  ): void {
    const { run } = ctx;
    const status = record.outcome?.status;
    if (!status) return;

    const event: WorkflowEvent = {
      kind: "WorkerCompleted",
      payload: { workerId: record.workerId, status, runId: run.id, phaseId, iteration },
    };

    for (const match of this.evaluator.evaluateDetailed(event, this.registry)) {
      this.emit(ctx, Events.triggerMatched, {
        runId: run.id,
        eventKind: event.kind,
        workerId: match.workerId,
        mode: match.mode,
      });
      run.followUps.push({
        workerId: match.workerId,
        mode: match.mode,
        eventKind: event.kind,
        triggeredBy: { workerId: record.workerId, phaseId, iteration, status },
      });
    }
  }

  // ============================================
  // Helpers
  // ============================================

  private argumentOf(event: WorkflowEvent): string | undefined {
    for (const key of ["text", "message", "path"]) {
      const value = event.payload[key];
      if (typeof value === "string") return value;
    }
    return undefined;
  }

  private emit<T>(ctx: RunContext, event: EventDefinition<T>, payload: T): void {
    ctx.eventBus?.emit(event, payload);
  }
}
