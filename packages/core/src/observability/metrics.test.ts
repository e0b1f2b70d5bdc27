import { describe, it, expect } from "vitest";
import { BuildMetrics } from "./metrics.js";

describe("BuildMetrics", () => {
  it("should rank slowest documents first", () => {
    const metrics = new BuildMetrics();
    metrics.recordDocument("a", 5);
    metrics.recordDocument("b", 50);
    metrics.recordDocument("c", 20);

    expect(metrics.slowest(2)).toEqual([
      { id: "b", ms: 50 },
      { id: "c", ms: 20 },
    ]);
  });

  it("should compute p95 over document times", () => {
    const metrics = new BuildMetrics();
    expect(metrics.p95()).toBe(0);

    for (let i = 1; i <= 20; i++) {
      metrics.recordDocument(`d${i}`, i);
    }
    expect(metrics.p95()).toBe(19);
  });

  it("should accumulate phase durations", async () => {
    const metrics = new BuildMetrics();

    const value = await metrics.phase("scan", async () => 42);
    metrics.phaseSync("index", () => undefined);
    const timings = metrics.timings();

    expect(value).toBe(42);
    expect(timings.scan).toBeGreaterThanOrEqual(0);
    expect(timings.documents).toBe(0);
    expect(timings.total).toBeGreaterThanOrEqual(timings.scan);
  });

  it("should record a phase that throws", () => {
    const metrics = new BuildMetrics();
    expect(() =>
      metrics.phaseSync("index", () => {
        throw new Error("fail");
      })
    ).toThrow("fail");
  });
});
