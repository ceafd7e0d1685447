// ============================================
// Workflow Engine Error Classes
// ============================================

import { ErrorCode, PhaseflowError, type PhaseflowErrorOptions } from "./types.js";

/**
 * Identifies one slot on the context bus.
 */
export interface ContextKeyRef {
  phase: string;
  workerId: string;
  field: string;
}

// ============================================
// Registry Errors
// ============================================

/**
 * Thrown when a worker id or capability reference cannot be resolved.
 *
 * @example
 * ```typescript
 * registry.lookup("unknown-worker"); // throws UnknownWorkerError
 * ```
 */
export class UnknownWorkerError extends PhaseflowError {
  public readonly workerId: string;

  constructor(workerId: string, options?: PhaseflowErrorOptions) {
    super(`Unknown worker: "${workerId}"`, ErrorCode.WORKER_UNKNOWN, {
      ...options,
      context: { ...options?.context, workerId },
    });
    this.name = "UnknownWorkerError";
    this.workerId = workerId;
  }
}

/**
 * Thrown when a worker id is registered twice without `replace`.
 */
export class DuplicateWorkerError extends PhaseflowError {
  public readonly workerId: string;

  constructor(workerId: string, options?: PhaseflowErrorOptions) {
    super(`Worker already registered: "${workerId}"`, ErrorCode.WORKER_DUPLICATE, {
      ...options,
      context: { ...options?.context, workerId },
    });
    this.name = "DuplicateWorkerError";
    this.workerId = workerId;
  }
}

/**
 * Thrown when a workflow definition fails structural validation.
 * Every problem found is listed in `issues`.
 */
export class InvalidWorkflowError extends PhaseflowError {
  public readonly workflow: string;
  public readonly issues: string[];

  constructor(workflow: string, issues: string[], options?: PhaseflowErrorOptions) {
    super(`Invalid workflow "${workflow}": ${issues.join("; ")}`, ErrorCode.WORKFLOW_INVALID, {
      ...options,
      context: { ...options?.context, workflow, issues },
    });
    this.name = "InvalidWorkflowError";
    this.workflow = workflow;
    this.issues = issues;
  }
}

// ============================================
// Context Bus Errors
// ============================================

/**
 * Thrown when a context bus key already holds a value.
 */
export class KeyCollisionError extends PhaseflowError {
  public readonly key: ContextKeyRef;

  constructor(key: ContextKeyRef, options?: PhaseflowErrorOptions) {
    super(
      `Context key already written: ${key.phase}/${key.workerId}/${key.field}`,
      ErrorCode.CONTEXT_KEY_COLLISION,
      { ...options, context: { ...options?.context, ...key } }
    );
    this.name = "KeyCollisionError";
    this.key = key;
  }
}

/**
 * Thrown when a field was never written and no default was declared.
 */
export class MissingContextError extends PhaseflowError {
  public readonly field: string;

  constructor(field: string, options?: PhaseflowErrorOptions) {
    super(`Missing context field: "${field}"`, ErrorCode.CONTEXT_MISSING, {
      ...options,
      context: { ...options?.context, field },
    });
    this.name = "MissingContextError";
    this.field = field;
  }
}

// ============================================
// Execution Errors
// ============================================

/**
 * Raised when an operation exceeds its deadline.
 */
export class TimeoutError extends PhaseflowError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: PhaseflowErrorOptions) {
    super(`Operation timed out after ${timeoutMs}ms`, ErrorCode.WORKER_TIMEOUT, {
      ...options,
      context: { ...options?.context, timeoutMs },
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wraps any failure surfaced by an external worker capability.
 */
export class WorkerInvocationError extends PhaseflowError {
  public readonly workerId: string;

  constructor(workerId: string, message: string, options?: PhaseflowErrorOptions) {
    super(message, ErrorCode.WORKER_INVOCATION_FAILED, {
      ...options,
      context: { ...options?.context, workerId },
    });
    this.name = "WorkerInvocationError";
    this.workerId = workerId;
  }
}

/**
 * Thrown when a result is requested from a run that is still in flight.
 */
export class RunNotTerminalError extends PhaseflowError {
  public readonly runId: string;
  public readonly status: string;

  constructor(runId: string, status: string, options?: PhaseflowErrorOptions) {
    super(`Run ${runId} is not terminal (status: ${status})`, ErrorCode.RUN_NOT_TERMINAL, {
      ...options,
      context: { ...options?.context, runId, status },
    });
    this.name = "RunNotTerminalError";
    this.runId = runId;
    this.status = status;
  }
}

/**
 * Thrown when a run state change is not allowed from its current state.
 */
export class InvalidTransitionError extends PhaseflowError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string, options?: PhaseflowErrorOptions) {
    super(`Invalid run transition: ${from} -> ${to}`, ErrorCode.RUN_INVALID_TRANSITION, {
      ...options,
      context: { ...options?.context, from, to },
    });
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}
