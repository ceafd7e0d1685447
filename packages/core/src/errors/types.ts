// ============================================
// Phaseflow Error Types
// ============================================

/**
 * Categorized error codes for the Phaseflow engine.
 *
 * Categories:
 * - 1xxx: Configuration errors
 * - 2xxx: Registry / workflow definition errors
 * - 3xxx: Context bus errors
 * - 4xxx: Execution errors
 * - 5xxx: System errors
 */
export enum ErrorCode {
  // 1xxx - Configuration errors
  CONFIG_INVALID = 1001,
  CONFIG_PARSE_ERROR = 1003,

  // 2xxx - Registry / definition errors
  WORKER_UNKNOWN = 2001,
  WORKER_DUPLICATE = 2002,
  WORKER_INVALID = 2003,
  WORKFLOW_INVALID = 2004,

  // 3xxx - Context bus errors
  CONTEXT_KEY_COLLISION = 3001,
  CONTEXT_MISSING = 3002,

  // 4xxx - Execution errors
  WORKER_TIMEOUT = 4001,
  WORKER_INVOCATION_FAILED = 4002,
  RUN_NOT_TERMINAL = 4003,
  RUN_INVALID_TRANSITION = 4004,
  RUN_ABORTED = 4005,

  // 5xxx - System errors
  SYSTEM_IO_ERROR = 5001,
  SYSTEM_UNKNOWN = 5999,
}

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Can retry automatically */
  RECOVERABLE = "recoverable",
  /** User needs to fix something */
  USER_ACTION = "user_action",
  /** Cannot continue */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 *
 * - Timeouts and I/O errors → RECOVERABLE
 * - Configuration, registry and definition errors → USER_ACTION
 * - Context contract violations, state machine misuse, unknown errors → FATAL
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.WORKER_TIMEOUT:
    case ErrorCode.SYSTEM_IO_ERROR:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.WORKER_UNKNOWN:
    case ErrorCode.WORKER_DUPLICATE:
    case ErrorCode.WORKER_INVALID:
    case ErrorCode.WORKFLOW_INVALID:
    case ErrorCode.WORKER_INVOCATION_FAILED:
    case ErrorCode.RUN_NOT_TERMINAL:
    case ErrorCode.RUN_ABORTED:
      return ErrorSeverity.USER_ACTION;
    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating a PhaseflowError.
 */
export interface PhaseflowErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
  /** Whether this error can be retried */
  isRetryable?: boolean;
  /** Suggested delay before retry in milliseconds */
  retryDelay?: number;
}

/**
 * Base error class for all Phaseflow errors.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Retry configuration
 * - Error cause chaining
 */
export class PhaseflowError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  private readonly _isRetryable?: boolean;
  private readonly _retryDelay?: number;

  constructor(message: string, code: ErrorCode, options?: PhaseflowErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "PhaseflowError";
    this.code = code;
    this.context = options?.context;
    this._isRetryable = options?.isRetryable;
    this._retryDelay = options?.retryDelay;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Whether this error can be retried.
   * If not explicitly set, defaults to true for RECOVERABLE severity.
   */
  get isRetryable(): boolean {
    if (this._isRetryable !== undefined) {
      return this._isRetryable;
    }
    return this.severity === ErrorSeverity.RECOVERABLE;
  }

  /**
   * The suggested delay before retry in milliseconds.
   * Returns undefined if not retryable or not set.
   */
  get retryDelay(): number | undefined {
    if (!this.isRetryable) {
      return undefined;
    }
    return this._retryDelay;
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      isRetryable: this.isRetryable,
      retryDelay: this.retryDelay,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Type guard to check if an error is a PhaseflowError with FATAL severity.
 */
export function isFatalError(error: unknown): error is PhaseflowError {
  return error instanceof PhaseflowError && error.severity === ErrorSeverity.FATAL;
}

/**
 * Checks if an error is retryable.
 * Returns true if error is a PhaseflowError with isRetryable=true.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof PhaseflowError && error.isRetryable;
}
