/**
 * Clock sources for elapsed-time measurement
 */

import { performance } from "perf_hooks";
import type { Clock } from "../../types/config.js";

/**
 * Monotonic high-resolution clock backed by `performance.now()`.
 * Readings are unaffected by wall-clock adjustments.
 */
export const monotonicClock: Clock = {
  now(): number {
    return performance.now() / 1000;
  },
  elapsed(start: number, end: number): number {
    return Math.max(0, end - start);
  },
};

/**
 * Clock that only moves when told to. Lets code under measurement declare
 * its own cost, which makes timing-dependent behaviour reproducible.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  elapsed(start: number, end: number): number {
    return Math.max(0, end - start);
  }

  advance(seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new RangeError(`Cannot advance clock by ${seconds} seconds`);
    }
    this.current += seconds;
  }
}
