import { describe, expect, it } from "vitest";
import { RunNotTerminalError } from "../../errors/workflow-errors.js";
import { aggregateDiagnostics } from "../../workers/diagnostics.js";
import { aggregate } from "../aggregator.js";
import { WorkflowRun } from "../run.js";

function finishedRun(): WorkflowRun {
  const run = new WorkflowRun(
    {
      name: "sprint",
      phases: [
        { id: "review", workers: ["code-reviewer"], loopUntil: "criticalCount == 0", maxIterations: 2 },
        { id: "document", workers: ["doc-writer"] },
      ],
    },
    { id: "run-test" }
  );
  run.transition("Running");

  const review = run.phase("review");
  for (const [iteration, count] of [
    [1, 2],
    [2, 1],
  ] as const) {
    const outcome = {
      status: "NeedsFollowUp" as const,
      producedFields: {},
      diagnostics: { severityCounts: { critical: count, high: 0, medium: 0, low: 0 } },
    };
    review.iterations.push({
      iteration,
      key: `review#${iteration}`,
      workers: [{ workerId: "code-reviewer", advisory: false, status: "NeedsFollowUp", outcome, durationMs: 3, attempts: 1 }],
      diagnostics: aggregateDiagnostics([{ workerId: "code-reviewer", phase: `review#${iteration}`, outcome }]),
      loopSatisfied: false,
    });
  }
  review.status = "PartiallyFailed";
  review.reason = "loop condition unmet after 2 iteration(s)";

  const failure = {
    status: "Failure" as const,
    producedFields: {},
    diagnostics: { error: { name: "DocsError", message: "no README" } },
  };
  run.phase("document").iterations.push({
    iteration: 1,
    key: "document#1",
    workers: [{ workerId: "doc-writer", advisory: true, status: "Failure", outcome: failure, durationMs: 1, attempts: 1 }],
    diagnostics: aggregateDiagnostics([{ workerId: "doc-writer", phase: "document#1", outcome: failure }]),
  });
  run.phase("document").status = "PartiallyFailed";

  run.transition("PartiallyFailed");
  return run;
}

describe("aggregate", () => {
  it("refuses a run that is not terminal", () => {
    const run = new WorkflowRun({ name: "x", phases: [{ id: "p", workers: ["w"] }] }, { id: "run-1" });

    expect(() => aggregate(run)).toThrow(RunNotTerminalError);
    run.transition("Running");
    expect(() => aggregate(run)).toThrow("Run run-1 is not terminal (status: Running)");
  });

  it("summarizes phases in declaration order", () => {
    const result = aggregate(finishedRun());

    expect(result.runId).toBe("run-test");
    expect(result.workflow).toBe("sprint");
    expect(result.status).toBe("PartiallyFailed");
    expect(result.perPhaseSummaries.map((phase) => [phase.id, phase.status, phase.iterations])).toEqual([
      ["review", "PartiallyFailed", 2],
      ["document", "PartiallyFailed", 1],
    ]);
    expect(result.perPhaseSummaries[0]?.reason).toBe("loop condition unmet after 2 iteration(s)");
  });

  it("concatenates diagnostics across iterations and phases", () => {
    const result = aggregate(finishedRun());

    expect(result.perPhaseSummaries[0]?.diagnostics.criticalCount).toBe(3);
    expect(result.mergedDiagnostics.criticalCount).toBe(3);
    expect(result.mergedDiagnostics.followUpCount).toBe(2);
    expect(result.mergedDiagnostics.failureCount).toBe(1);
    expect(result.mergedDiagnostics.errors).toEqual([
      { name: "DocsError", message: "no README", workerId: "doc-writer", phase: "document#1" },
    ]);
  });

  it("lists failures with their worker error", () => {
    expect(aggregate(finishedRun()).failures).toEqual([
      {
        workerId: "doc-writer",
        phaseId: "document",
        iteration: 1,
        advisory: true,
        fatal: false,
        error: { name: "DocsError", message: "no README" },
      },
    ]);
  });

  it("returns equal results on repeated calls without sharing state", () => {
    const run = finishedRun();

    const first = aggregate(run);
    const second = aggregate(run);

    expect(second).toEqual(first);
    first.failures.pop();
    first.mergedDiagnostics.issues.push({ severity: "low", message: "x", workerId: "w", phase: "p" });
    expect(aggregate(run)).toEqual(second);
  });
});
