// ============================================
// Command Invoker
// ============================================
// Binds a worker to an external command. The command reads the worker
// request as JSON on stdin and prints its outcome as JSON on stdout.

import { type ChildProcess, spawn } from "node:child_process";
import { formatZodIssues } from "@phaseflow/shared";

import type { WorkerBinding } from "../config/schema.js";
import { WorkerInvocationError } from "../errors/workflow-errors.js";
import {
  type WorkerInvoker,
  type WorkerOutcome,
  type WorkerRequest,
  workerOutcomeSchema,
} from "./types.js";

/** Exit status (EX_TEMPFAIL) a command uses to ask for a retry */
export const RETRYABLE_EXIT_CODE = 75;

const STDERR_TAIL_CHARS = 500;
const KILL_GRACE_MS = 5000;

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** Set when the process could not be started */
  spawnError?: Error;
}

export interface CommandInvokerOptions {
  /** Working directory of the command (default: process.cwd()) */
  cwd?: string;
}

/**
 * What the command receives on stdin. The abort signal stays behind.
 */
export function serializeRequest(request: WorkerRequest): string {
  const { runId, workflow, phaseId, iteration, workerId, context, declaredInputFields } = request;
  return JSON.stringify({ runId, workflow, phaseId, iteration, workerId, context, declaredInputFields });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Turns a finished command into an outcome.
 *
 * The whole of stdout must be JSON, or else its last non-empty line, so a
 * command may print progress before the outcome.
 *
 * @throws WorkerInvocationError if the command failed or printed no valid outcome
 */
export function parseCommandOutput(workerId: string, result: CommandResult): WorkerOutcome {
  if (result.spawnError) {
    throw new WorkerInvocationError(
      workerId,
      `Worker "${workerId}" could not start: ${result.spawnError.message}`,
      { cause: result.spawnError }
    );
  }

  if (result.exitCode !== 0) {
    const how = result.exitCode === null ? `signal ${result.signal ?? "unknown"}` : `code ${result.exitCode}`;
    const stderr = result.stderr.trim().slice(-STDERR_TAIL_CHARS);
    throw new WorkerInvocationError(
      workerId,
      `Worker "${workerId}" exited with ${how}${stderr ? `: ${stderr}` : ""}`,
      {
        isRetryable: result.exitCode === RETRYABLE_EXIT_CODE,
        context: { exitCode: result.exitCode, signal: result.signal },
      }
    );
  }

  const trimmed = result.stdout.trim();
  const lastLine = trimmed.split(/\r?\n/).filter((line) => line.trim() !== "").at(-1);
  const json = parseJson(trimmed) ?? (lastLine !== undefined ? parseJson(lastLine) : undefined);

  if (json === undefined) {
    throw new WorkerInvocationError(workerId, `Worker "${workerId}" printed no JSON outcome`);
  }

  const parsed = workerOutcomeSchema.safeParse(json);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new WorkerInvocationError(workerId, `Worker "${workerId}" printed an invalid outcome: ${issues}`);
  }
  return parsed.data;
}

/**
 * Runs a bound command to completion, feeding `input` on stdin. Never
 * rejects; failures are described in the result.
 */
export function runCommand(
  binding: WorkerBinding,
  input: string,
  options: { signal?: AbortSignal; cwd?: string } = {}
): Promise<CommandResult> {
  const startTime = Date.now();

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    let child: ChildProcess;

    const kill = (): void => {
      if (!child.killed) {
        child.kill("SIGTERM");
        setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill("SIGKILL");
          }
        }, KILL_GRACE_MS).unref();
      }
    };

    const cleanup = (): void => {
      if (timeoutId) clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", kill);
    };

    try {
      child = spawn(binding.command, binding.args, {
        cwd: options.cwd,
        env: { ...process.env, ...binding.env },
        stdio: ["pipe", "pipe", "pipe"],
      });
    } catch (error) {
      resolve({
        exitCode: null,
        signal: null,
        stdout,
        stderr,
        durationMs: Date.now() - startTime,
        spawnError: error instanceof Error ? error : new Error(String(error)),
      });
      return;
    }

    options.signal?.addEventListener("abort", kill, { once: true });
    if (binding.timeoutMs !== undefined) {
      timeoutId = setTimeout(kill, binding.timeoutMs);
    }

    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });
    // A command that exits without reading stdin closes the pipe early
    child.stdin?.on("error", (error) => {
      stderr += `stdin: ${error.message}\n`;
    });
    child.stdin?.end(input);

    child.on("close", (exitCode, signal) => {
      cleanup();
      resolve({ exitCode, signal, stdout, stderr, durationMs: Date.now() - startTime });
    });

    child.on("error", (error) => {
      cleanup();
      resolve({
        exitCode: null,
        signal: null,
        stdout,
        stderr,
        durationMs: Date.now() - startTime,
        spawnError: error,
      });
    });
  });
}

/**
 * @example
 * ```typescript
 * const invoker = createCommandInvoker({ command: "node", args: ["scripts/review.js"] });
 * registry.register(descriptor, invoker);
 * ```
 */
export function createCommandInvoker(
  binding: WorkerBinding,
  options: CommandInvokerOptions = {}
): WorkerInvoker {
  return async (request) => {
    const result = await runCommand(binding, serializeRequest(request), {
      signal: request.signal,
      cwd: options.cwd,
    });
    return parseCommandOutput(request.workerId, result);
  };
}

/**
 * Invoker for workers with no command bound: every call fails.
 */
export function unboundInvoker(workerId: string): WorkerInvoker {
  return async () => {
    throw new WorkerInvocationError(
      workerId,
      `No command bound to worker "${workerId}"; add [workers.${workerId}] to phaseflow.toml`
    );
  };
}
