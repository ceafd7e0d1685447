// ============================================
// Errors - Barrel Export
// ============================================

export {
  GlobalErrorHandler,
  type GlobalErrorHandlerOptions,
} from "./handler.js";
export {
  AbortError,
  backoffDelay,
  type DeadlineOptions,
  DEFAULT_RETRY_POLICY,
  type RetryEvent,
  type RetryOptions,
  type RetryPolicy,
  sleep,
  withDeadline,
  withRetry,
} from "./retry.js";
export {
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  isFatalError,
  isRetryableError,
  PhaseflowError,
  type PhaseflowErrorOptions,
} from "./types.js";
export {
  type ContextKeyRef,
  DuplicateWorkerError,
  InvalidTransitionError,
  InvalidWorkflowError,
  KeyCollisionError,
  MissingContextError,
  RunNotTerminalError,
  TimeoutError,
  UnknownWorkerError,
  WorkerInvocationError,
} from "./workflow-errors.js";
