import { describe, it, expect } from "vitest";
import { mapPool } from "./pool.js";

const tick = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("mapPool", () => {
  it("should keep input order regardless of completion order", async () => {
    const result = await mapPool([30, 10, 20], 3, async (ms) => {
      await tick(ms);
      return ms * 2;
    });

    expect(result).toEqual([60, 20, 40]);
  });

  it("should never run more than the given number at once", async () => {
    let active = 0;
    let peak = 0;

    await mapPool([1, 2, 3, 4, 5, 6, 7], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it("should treat a concurrency below one as one", async () => {
    const seen: number[] = [];
    await mapPool([1, 2, 3], 0, async (n) => {
      seen.push(n);
    });
    expect(seen).toEqual([1, 2, 3]);
  });

  it("should return an empty array for no items", async () => {
    expect(await mapPool([], 4, async () => 1)).toEqual([]);
  });

  it("should wait for running workers before rejecting", async () => {
    const finished: number[] = [];

    const run = mapPool([1, 2], 2, async (n) => {
      if (n === 1) {
        throw new Error("boom");
      }
      await tick(20);
      finished.push(n);
    });

    await expect(run).rejects.toThrow("boom");
    expect(finished).toEqual([2]);
  });
});
