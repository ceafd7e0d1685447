// ============================================
// Retries, Deadlines and Cancellation
// ============================================

import { ErrorCode, isRetryableError, PhaseflowError } from "./types.js";
import { TimeoutError } from "./workflow-errors.js";

export class AbortError extends PhaseflowError {
  constructor(message = "Operation aborted") {
    super(message, ErrorCode.RUN_ABORTED);
    this.name = "AbortError";
  }
}

/**
 * Resolves after `ms`, or rejects with AbortError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface RetryPolicy {
  /** Extra attempts after the first one */
  maxRetries: number;
  /** Delay before the first retry; doubles for each one after */
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

export interface RetryEvent {
  error: unknown;
  /** Number of the attempt about to start, counting from 1 */
  nextAttempt: number;
  delayMs: number;
}

export interface RetryOptions extends Partial<RetryPolicy> {
  /** Defaults to isRetryableError */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (event: RetryEvent) => void;
  signal?: AbortSignal;
}

/**
 * Delay before retry number `retry` (1-based). An error carrying its own
 * `retryDelay` wins over the exponential schedule; both are capped.
 */
export function backoffDelay(policy: RetryPolicy, retry: number, error?: unknown): number {
  const requested =
    error instanceof PhaseflowError && error.retryDelay !== undefined
      ? error.retryDelay
      : policy.baseDelayMs * 2 ** (retry - 1);
  return Math.min(requested, policy.maxDelayMs);
}

/**
 * Calls `fn` until it resolves, a rejection is not retryable, or the
 * retries run out; the last error is rethrown.
 *
 * @example
 * ```typescript
 * const outcome = await withRetry((attempt) => invoke({ ...request, attempt }), {
 *   maxRetries: descriptor.retry?.maxRetries ?? 0,
 *   signal: run.signal,
 * });
 * ```
 *
 * @throws AbortError when `signal` aborts before or between attempts
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { shouldRetry = isRetryableError, onRetry, signal } = options;
  const policy: RetryPolicy = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
  };

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new AbortError();
    }
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt > policy.maxRetries || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(policy, attempt, error);
      onRetry?.({ error, nextAttempt: attempt + 1, delayMs });
      await sleep(delayMs, signal);
    }
  }
}

export interface DeadlineOptions {
  /** Omitted: no deadline */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Attached to the TimeoutError */
  context?: Record<string, unknown>;
}

/**
 * Runs `fn` with a signal that aborts when the deadline passes or the
 * outer signal aborts. Settles on the first of those, whether or not
 * `fn` honours its signal.
 *
 * @throws TimeoutError when the deadline passes first
 * @throws AbortError when the outer signal aborts first
 */
export function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions = {}
): Promise<T> {
  const { timeoutMs, signal, context } = options;
  if (signal?.aborted) {
    return Promise.reject(new AbortError());
  }

  const inner = new AbortController();
  const cleanups: Array<() => void> = [() => inner.abort()];

  // A synchronous throw must still reach the race so the cleanups run.
  let work: Promise<T>;
  try {
    work = fn(inner.signal);
  } catch (error) {
    work = Promise.reject(error);
  }

  const interrupted = new Promise<never>((_, reject) => {
    if (signal) {
      const onAbort = (): void => reject(new AbortError());
      signal.addEventListener("abort", onAbort, { once: true });
      cleanups.push(() => signal.removeEventListener("abort", onAbort));
    }
    if (timeoutMs !== undefined) {
      const timer = setTimeout(() => reject(new TimeoutError(timeoutMs, { context })), timeoutMs);
      cleanups.push(() => clearTimeout(timer));
    }
  });

  return Promise.race([work, interrupted]).finally(() => {
    for (const cleanup of cleanups) cleanup();
  });
}
