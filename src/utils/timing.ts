import { performance } from "node:perf_hooks";

export class Timer {
  private readonly startedAt = performance.now();

  /** Whole milliseconds since construction. */
  elapsedMs(): number {
    return Math.max(0, Math.round(performance.now() - this.startedAt));
  }
}
