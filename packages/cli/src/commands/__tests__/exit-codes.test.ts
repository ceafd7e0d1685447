/**
 * Exit Code Tests
 *
 * @module cli/commands/__tests__/exit-codes.test
 */

import { AbortError, UnknownWorkerError } from "@phaseflow/core";
import { describe, expect, it } from "vitest";

import { EXIT_CODES, ExitCodeMapper } from "../exit-codes.js";

// =============================================================================
// EXIT_CODES Constants Tests
// =============================================================================

describe("EXIT_CODES", () => {
  it("maps terminal run statuses to 0, 1 and 2", () => {
    expect(EXIT_CODES.Succeeded).toBe(0);
    expect(EXIT_CODES.Failed).toBe(1);
    expect(EXIT_CODES.PartiallyFailed).toBe(2);
  });

  it("keeps usage errors and interruptions outside the run range", () => {
    expect(EXIT_CODES.USAGE_ERROR).toBe(64);
    expect(EXIT_CODES.INTERRUPTED).toBe(130);
  });
});

// =============================================================================
// ExitCodeMapper Tests
// =============================================================================

describe("ExitCodeMapper", () => {
  describe("fromResult", () => {
    it("uses the run status", () => {
      expect(ExitCodeMapper.fromResult({ status: "Succeeded" })).toBe(0);
      expect(ExitCodeMapper.fromResult({ status: "PartiallyFailed" })).toBe(2);
      expect(ExitCodeMapper.fromResult({ status: "Failed" })).toBe(1);
    });
  });

  describe("fromException", () => {
    it("treats aborts and closed prompts as interruptions", () => {
      expect(ExitCodeMapper.fromException(new AbortError())).toBe(130);

      const closed = new Error("User force closed the prompt");
      closed.name = "ExitPromptError";
      expect(ExitCodeMapper.fromException(closed)).toBe(130);
    });

    it("treats everything else as a usage error", () => {
      expect(ExitCodeMapper.fromException(new UnknownWorkerError("ghost"))).toBe(64);
      expect(ExitCodeMapper.fromException("boom")).toBe(64);
    });
  });

  describe("describe", () => {
    it("names every code", () => {
      expect(ExitCodeMapper.describe(EXIT_CODES.Succeeded)).toBe("Succeeded");
      expect(ExitCodeMapper.describe(EXIT_CODES.PartiallyFailed)).toBe("Partially failed");
      expect(ExitCodeMapper.describe(EXIT_CODES.USAGE_ERROR)).toBe("Usage error");
      expect(ExitCodeMapper.describe(EXIT_CODES.INTERRUPTED)).toBe("Interrupted");
    });
  });
});
