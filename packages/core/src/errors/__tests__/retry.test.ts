import { afterEach, describe, expect, it, vi } from "vitest";
import { AbortError, backoffDelay, sleep, withDeadline, withRetry } from "../retry.js";
import { TimeoutError, WorkerInvocationError } from "../workflow-errors.js";

function retryable(): WorkerInvocationError {
  return new WorkerInvocationError("debugger", "exit code 1", { isRetryable: true });
}

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    await expect(withRetry(fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries retryable errors with backoff", async () => {
    const retries: Array<[number, number]> = [];
    const fn = vi
      .fn()
      .mockRejectedValueOnce(retryable())
      .mockRejectedValueOnce(retryable())
      .mockResolvedValue("ok");

    const result = await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 1,
      onRetry: ({ nextAttempt, delayMs }) => retries.push([nextAttempt, delayMs]),
    });

    expect(result).toBe("ok");
    expect(fn.mock.calls).toEqual([[1], [2], [3]]);
    expect(retries).toEqual([
      [2, 1],
      [3, 2],
    ]);
  });

  it("stops after maxRetries", async () => {
    const error = retryable();
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry non-retryable errors", async () => {
    const error = new WorkerInvocationError("debugger", "invalid output");
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("throws AbortError when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(withRetry(async () => "ok", { signal: controller.signal })).rejects.toBeInstanceOf(
      AbortError
    );
  });
});

describe("backoffDelay", () => {
  const policy = { maxRetries: 5, baseDelayMs: 100, maxDelayMs: 350 };

  it("doubles per retry up to the cap", () => {
    expect([1, 2, 3, 4].map((retry) => backoffDelay(policy, retry))).toEqual([100, 200, 350, 350]);
  });

  it("prefers the delay an error asks for", () => {
    const error = new WorkerInvocationError("debugger", "busy", { isRetryable: true, retryDelay: 250 });

    expect(backoffDelay(policy, 1, error)).toBe(250);
  });
});

describe("sleep", () => {
  it("rejects with AbortError when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);
  });
});

describe("withDeadline", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves when the function finishes in time", async () => {
    await expect(withDeadline(async () => 7, { timeoutMs: 1000 })).resolves.toBe(7);
  });

  it("rejects with TimeoutError and aborts the inner signal", async () => {
    vi.useFakeTimers();
    let innerSignal: AbortSignal | undefined;

    const promise = withDeadline(
      (signal) => {
        innerSignal = signal;
        return new Promise<never>(() => {});
      },
      { timeoutMs: 50, context: { workerId: "slow" } }
    );
    const assertion = expect(promise).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(innerSignal?.aborted).toBe(true);
  });

  it("rejects with AbortError when the outer signal aborts", async () => {
    const controller = new AbortController();
    const promise = withDeadline(() => new Promise<never>(() => {}), {
      signal: controller.signal,
    });
    const assertion = expect(promise).rejects.toBeInstanceOf(AbortError);

    controller.abort();
    await assertion;
  });

  it("passes through errors thrown by the function", async () => {
    const error = new Error("boom");

    await expect(
      withDeadline(async () => {
        throw error;
      })
    ).rejects.toBe(error);
  });

  it("rejects with a synchronous throw and clears its deadline", async () => {
    vi.useFakeTimers();
    const error = new Error("bad arguments");
    const controller = new AbortController();
    let innerSignal: AbortSignal | undefined;

    await expect(
      withDeadline(
        (signal) => {
          innerSignal = signal;
          throw error;
        },
        { timeoutMs: 50, signal: controller.signal }
      )
    ).rejects.toBe(error);

    expect(vi.getTimerCount()).toBe(0);
    expect(innerSignal?.aborted).toBe(true);
  });
});
