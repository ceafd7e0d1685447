import { describe, expect, it } from "vitest";
import { workerDescriptorSchema } from "../schemas/worker.js";
import { loopUntilSchema, phaseSchema } from "../schemas/workflow.js";

describe("workerDescriptorSchema", () => {
  it("applies defaults to a minimal descriptor", () => {
    const descriptor = workerDescriptorSchema.parse({
      id: "code-reviewer",
      inputContract: [{ field: "argument" }],
      triggerPredicates: [{ on: "FileChanged", match: { type: "file", pattern: "**/*.ts" } }],
    });

    expect(descriptor.capabilities).toEqual([]);
    expect(descriptor.outputContract).toEqual([]);
    expect(descriptor.inputContract).toEqual([{ field: "argument", required: true }]);
    expect(descriptor.triggerPredicates[0]?.mode).toBe("auto");
  });

  it("rejects ids that are not kebab-case", () => {
    expect(workerDescriptorSchema.safeParse({ id: "CodeReviewer" }).success).toBe(false);
  });

  it("rejects unknown trigger match types", () => {
    const result = workerDescriptorSchema.safeParse({
      id: "debugger",
      triggerPredicates: [{ on: "ErrorObserved", match: { type: "fuzzy", pattern: "x" } }],
    });

    expect(result.success).toBe(false);
  });
});

describe("workflow schemas", () => {
  it("accepts every loopUntil form", () => {
    expect(loopUntilSchema.safeParse("criticalCount == 0").success).toBe(true);
    expect(loopUntilSchema.safeParse({ metric: "highCount", op: "<=", value: 2 }).success).toBe(
      true
    );
    expect(
      loopUntilSchema.safeParse([{ metric: "criticalCount", op: "==", value: 0 }]).success
    ).toBe(true);
    expect(loopUntilSchema.safeParse({ metric: "unknown", op: "==", value: 0 }).success).toBe(
      false
    );
  });

  it("requires at least one worker per phase", () => {
    expect(phaseSchema.safeParse({ id: "review", workers: [] }).success).toBe(false);
  });
});
