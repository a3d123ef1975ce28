import { describe, it, expect } from "vitest";
import { ValidationError } from "@tablelens/errors";
import { ConcurrentPool } from "./concurrent-pool.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("ConcurrentPool", () => {
  it("processes every item exactly once and keeps input order", async () => {
    const items = Array.from({ length: 10 }, (_, i) => i);
    const seen = new Map<number, number>();

    const results = await ConcurrentPool.run(items, 3, async (item) => {
      seen.set(item, (seen.get(item) ?? 0) + 1);
      await delay(5 * ((item % 3) + 1));
      return item * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80, 90]);
    expect([...seen.values()]).toEqual(Array.from({ length: 10 }, () => 1));
  });

  it("never exceeds the concurrency bound", async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await ConcurrentPool.run(Array.from({ length: 8 }, (_, i) => i), 3, async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(item % 2 === 0 ? 10 : 3);
      inFlight--;
    });

    expect(maxInFlight).toBe(3);
  });

  it("reports each completion", async () => {
    const completed: number[] = [];

    await ConcurrentPool.run(
      ["a", "b", "c"],
      2,
      async (item) => item.toUpperCase(),
      (_, index) => completed.push(index),
    );

    expect(completed.sort()).toEqual([0, 1, 2]);
  });

  it("returns an empty array without calling processFn", async () => {
    let calls = 0;
    const results = await ConcurrentPool.run([], 4, async () => {
      calls++;
    });

    expect(results).toEqual([]);
    expect(calls).toBe(0);
  });

  it("rejects a non-positive concurrency", async () => {
    await expect(ConcurrentPool.run([1], 0, async (item) => item)).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});
