/**
 * Timing metrics for a single build
 */

import type { BuildTimings } from "../types.js";

export type BuildPhase = "scan" | "documents" | "index";

export interface DocumentTiming {
  id: string;
  ms: number;
}

/**
 * Collects phase durations and per-document build times
 *
 * One instance per build; nothing is shared between runs.
 */
export class BuildMetrics {
  #started = performance.now();
  #phases: Record<BuildPhase, number> = { scan: 0, documents: 0, index: 0 };
  #documents: DocumentTiming[] = [];

  /**
   * Time an async phase and add its duration
   */
  async phase<T>(name: BuildPhase, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.#phases[name] += performance.now() - start;
    }
  }

  /**
   * Time a synchronous phase and add its duration
   */
  phaseSync<T>(name: BuildPhase, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.#phases[name] += performance.now() - start;
    }
  }

  /**
   * Record how long one document took end-to-end
   */
  recordDocument(id: string, ms: number): void {
    this.#documents.push({ id, ms });
  }

  /**
   * Slowest documents first
   */
  slowest(limit = 5): DocumentTiming[] {
    return [...this.#documents].sort((a, b) => b.ms - a.ms).slice(0, limit);
  }

  /**
   * Calculate p95 of per-document build time
   */
  p95(): number {
    if (this.#documents.length === 0) return 0;

    const sorted = this.#documents.map((d) => d.ms).sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)];
  }

  /**
   * Snapshot of phase timings, rounded to 0.01ms
   */
  timings(): BuildTimings {
    const round = (ms: number): number => Math.round(ms * 100) / 100;
    return {
      scan: round(this.#phases.scan),
      documents: round(this.#phases.documents),
      index: round(this.#phases.index),
      total: round(performance.now() - this.#started),
    };
  }
}
