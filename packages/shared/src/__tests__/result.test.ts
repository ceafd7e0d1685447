import { describe, expect, it } from "vitest";
import { Err, Ok, type Result } from "../types/result.js";
import { createId } from "../utils/id.js";

describe("Result", () => {
  it("builds both sides of the union", () => {
    const passed: Result<number, string> = Ok(42);
    const failed: Result<number, string> = Err("boom");

    expect(passed).toEqual({ ok: true, value: 42 });
    expect(failed).toEqual({ ok: false, error: "boom" });
  });
});

describe("createId", () => {
  it("creates unique ids", () => {
    expect(createId()).not.toBe(createId());
  });

  it("applies a prefix", () => {
    expect(createId("run")).toMatch(/^run-[0-9a-f-]{36}$/);
  });
});
