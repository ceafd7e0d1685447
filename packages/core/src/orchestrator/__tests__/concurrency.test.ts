import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "../concurrency.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("keeps input order regardless of completion order", async () => {
    const results = await mapWithConcurrency([30, 1, 10], 3, async (ms, index) => {
      await sleep(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:1", "2:10"]);
  });

  it("never exceeds the concurrency limit", async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(5);
      active -= 1;
    });

    expect(peak).toBe(2);
  });

  it("returns an empty list for no items", async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
