import { describe, expect, it, vi } from "vitest";
import { ErrorCode, PhaseflowError } from "../../errors/types.js";
import { DuplicateWorkerError, UnknownWorkerError } from "../../errors/workflow-errors.js";
import { WorkerRegistry } from "../registry.js";
import type { WorkerInvoker } from "../types.js";

const succeed: WorkerInvoker = async () => ({ status: "Success" });

describe("WorkerRegistry", () => {
  describe("register", () => {
    it("applies descriptor defaults", () => {
      const registry = new WorkerRegistry();

      const descriptor = registry.register({ id: "code-reviewer" });

      expect(descriptor).toEqual({
        id: "code-reviewer",
        capabilities: [],
        triggerPredicates: [],
        inputContract: [],
        outputContract: [],
      });
      expect(registry.count).toBe(1);
    });

    it("freezes registered descriptors", () => {
      const registry = new WorkerRegistry();
      const descriptor = registry.register({ id: "code-reviewer", capabilities: ["code-review"] });

      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.capabilities)).toBe(true);
    });

    it("rejects a duplicate id", () => {
      const registry = new WorkerRegistry();
      registry.register({ id: "debugger" });

      expect(() => registry.register({ id: "debugger" })).toThrow(DuplicateWorkerError);
      expect(registry.count).toBe(1);
    });

    it("replaces in place when asked", () => {
      const registry = new WorkerRegistry();
      const replaced = vi.fn();
      registry.on("worker:replaced", replaced);

      registry.register({ id: "a" });
      registry.register({ id: "b" });
      registry.register({ id: "a", capabilities: ["x"] }, succeed, { replace: true });

      expect(registry.getAll().map((d) => d.id)).toEqual(["a", "b"]);
      expect(registry.lookup("a").capabilities).toEqual(["x"]);
      expect(registry.getInvoker("a")).toBe(succeed);
      expect(replaced).toHaveBeenCalledTimes(1);
    });

    it("rejects an invalid descriptor with WORKER_INVALID", () => {
      const registry = new WorkerRegistry();

      try {
        registry.register({ id: "Not Valid" });
        expect.unreachable("register should throw");
      } catch (error) {
        expect(error).toBeInstanceOf(PhaseflowError);
        if (error instanceof PhaseflowError) {
          expect(error.code).toBe(ErrorCode.WORKER_INVALID);
        }
      }
      expect(registry.has("Not Valid")).toBe(false);
    });

    it("emits worker:registered", () => {
      const registry = new WorkerRegistry();
      const listener = vi.fn();
      registry.on("worker:registered", listener);

      const descriptor = registry.register({ id: "doc-writer" });

      expect(listener).toHaveBeenCalledWith(descriptor);
    });
  });

  describe("lookup", () => {
    it("throws UnknownWorkerError for an unknown id", () => {
      const registry = new WorkerRegistry();

      expect(() => registry.lookup("ghost")).toThrow(UnknownWorkerError);
      expect(() => registry.getInvoker("ghost")).toThrow(UnknownWorkerError);
      expect(registry.has("ghost")).toBe(false);
    });

    it("returns undefined for a worker registered without an invoker", () => {
      const registry = new WorkerRegistry();
      registry.register({ id: "doc-writer" });

      expect(registry.getInvoker("doc-writer")).toBeUndefined();
    });
  });

  describe("resolve", () => {
    it("resolves capability references to the first worker with the tag", () => {
      const registry = new WorkerRegistry();
      registry.register({ id: "typescript-pro", capabilities: ["implementation"] });
      registry.register({ id: "python-pro", capabilities: ["implementation"] });

      expect(registry.resolve("capability:implementation").id).toBe("typescript-pro");
      expect(registry.resolve("python-pro").id).toBe("python-pro");
      expect(registry.findByCapability("implementation").map((d) => d.id)).toEqual([
        "typescript-pro",
        "python-pro",
      ]);
    });

    it("throws when no worker carries the capability", () => {
      const registry = new WorkerRegistry();
      registry.register({ id: "debugger", capabilities: ["debugging"] });

      expect(() => registry.resolve("capability:design")).toThrow(UnknownWorkerError);
    });
  });
});
