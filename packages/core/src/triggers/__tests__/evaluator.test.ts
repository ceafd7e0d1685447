import type { WorkerDescriptor } from "@phaseflow/shared";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { UnknownWorkerError } from "../../errors/workflow-errors.js";
import { WorkerRegistry } from "../../workers/registry.js";
import { TriggerEvaluator, type WorkflowEvent } from "../evaluator.js";

function buildRegistry(): WorkerRegistry {
  const registry = new WorkerRegistry();
  registry.register({
    id: "code-reviewer",
    triggerPredicates: [
      { on: "FileChanged", match: { type: "file", pattern: "src/**/*.ts" }, mode: "confirm" },
    ],
  });
  registry.register({
    id: "security-auditor",
    triggerPredicates: [
      { on: "FileChanged", match: { type: "file", pattern: "src/auth/**" } },
      { on: ["ErrorObserved"], match: { type: "keyword", pattern: "injection | XSS" } },
    ],
  });
  registry.register({
    id: "debugger",
    triggerPredicates: [{ on: "ErrorObserved", match: { type: "regex", pattern: "\\bTypeError\\b" } }],
  });
  registry.register({
    id: "test-engineer",
    triggerPredicates: [
      {
        on: "WorkerCompleted",
        match: { type: "worker", workerId: "refactoring-expert", status: "Success" },
      },
    ],
  });
  registry.register({ id: "refactoring-expert" });
  return registry;
}

describe("TriggerEvaluator", () => {
  let registry: WorkerRegistry;
  let evaluator: TriggerEvaluator;

  beforeEach(() => {
    registry = buildRegistry();
    evaluator = new TriggerEvaluator();
  });

  it("selects every matching worker in registration order", () => {
    const selected = evaluator.evaluate(
      { kind: "FileChanged", payload: { path: "src/auth/login.ts" } },
      registry
    );

    expect(selected).toEqual(["code-reviewer", "security-auditor"]);
  });

  it("normalizes backslashes in paths", () => {
    const selected = evaluator.evaluate(
      { kind: "FileChanged", payload: { path: "src\\auth\\token.ts" } },
      registry
    );

    expect(selected).toEqual(["code-reviewer", "security-auditor"]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(evaluator.evaluate({ kind: "FileChanged", payload: { path: "README.md" } }, registry)).toEqual(
      []
    );
    expect(evaluator.evaluate({ kind: "FileChanged", payload: {} }, registry)).toEqual([]);
  });

  it("uses the first matching predicate for mode and index", () => {
    const detailed = evaluator.evaluateDetailed(
      { kind: "ErrorObserved", payload: { message: "possible SQL Injection in query" } },
      registry
    );

    expect(detailed).toEqual([
      { workerId: "security-auditor", mode: "auto", source: "predicate", predicateIndex: 1 },
    ]);
  });

  it("matches regex predicates case-insensitively by default", () => {
    const selected = evaluator.evaluate(
      { kind: "ErrorObserved", payload: { text: "typeerror: x is undefined" } },
      registry
    );

    expect(selected).toEqual(["debugger"]);
  });

  it("matches worker completion by id and status", () => {
    const success = evaluator.evaluate(
      { kind: "WorkerCompleted", payload: { workerId: "refactoring-expert", status: "Success" } },
      registry
    );
    const failure = evaluator.evaluate(
      { kind: "WorkerCompleted", payload: { workerId: "refactoring-expert", status: "Failure" } },
      registry
    );

    expect(success).toEqual(["test-engineer"]);
    expect(failure).toEqual([]);
  });

  it("never triggers a worker on its own completion", () => {
    registry.register({
      id: "doc-writer",
      triggerPredicates: [{ on: "WorkerCompleted", match: { type: "worker" } }],
    });

    expect(
      evaluator.evaluate({ kind: "WorkerCompleted", payload: { workerId: "doc-writer" } }, registry)
    ).toEqual([]);
    expect(
      evaluator.evaluate({ kind: "WorkerCompleted", payload: { workerId: "debugger" } }, registry)
    ).toEqual(["doc-writer"]);
  });

  it("ignores invalid regex patterns", () => {
    registry.register({
      id: "broken",
      triggerPredicates: [{ on: "ErrorObserved", match: { type: "regex", pattern: "([" } }],
    });

    expect(
      evaluator.evaluate({ kind: "ErrorObserved", payload: { text: "([" } }, registry)
    ).toEqual([]);
  });

  describe("explicit commands", () => {
    it("selects the worker named with @", () => {
      const detailed = evaluator.evaluateDetailed(
        { kind: "ExplicitCommand", payload: { text: "@Debugger why does login fail?" } },
        registry
      );

      expect(detailed).toEqual([
        { workerId: "debugger", mode: "auto", source: "explicit", predicateIndex: -1 },
      ]);
    });

    it("selects the worker given by workerId", () => {
      expect(
        evaluator.evaluate({ kind: "ExplicitCommand", payload: { workerId: "test-engineer" } }, registry)
      ).toEqual(["test-engineer"]);
    });

    it("throws for an unknown or missing worker", () => {
      expect(() =>
        evaluator.evaluate({ kind: "ExplicitCommand", payload: { text: "@ghost hi" } }, registry)
      ).toThrow(UnknownWorkerError);
      expect(() =>
        evaluator.evaluate({ kind: "ExplicitCommand", payload: { text: "no mention" } }, registry)
      ).toThrow(UnknownWorkerError);
    });
  });

  describe("evaluateWithMatcher", () => {
    it("asks the external matcher only about unmatched workers", async () => {
      const externalMatcher = vi.fn(
        (_event: WorkflowEvent, descriptor: WorkerDescriptor) => descriptor.id === "refactoring-expert"
      );
      const withMatcher = new TriggerEvaluator({ externalMatcher });

      const matches = await withMatcher.evaluateWithMatcher(
        { kind: "FileChanged", payload: { path: "src/app.ts" } },
        registry
      );

      expect(matches).toEqual([
        { workerId: "code-reviewer", mode: "confirm", source: "predicate", predicateIndex: 0 },
        { workerId: "refactoring-expert", mode: "confirm", source: "external", predicateIndex: -1 },
      ]);
      expect(externalMatcher.mock.calls.map(([, descriptor]) => descriptor.id)).toEqual([
        "security-auditor",
        "debugger",
        "test-engineer",
        "refactoring-expert",
      ]);
    });

    it("falls back to declared predicates without a matcher", async () => {
      const matches = await evaluator.evaluateWithMatcher(
        { kind: "FileChanged", payload: { path: "src/app.ts" } },
        registry
      );

      expect(matches.map((m) => m.workerId)).toEqual(["code-reviewer"]);
    });
  });
});
