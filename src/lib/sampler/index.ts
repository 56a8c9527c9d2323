/**
 * Adaptive sampler - per-call time estimates at fixed input sizes
 */

import type { Clock, ReclamationControl } from "../../types/config.js";
import type {
  Operation,
  SizableArgument,
  SizeSchedule,
} from "../../types/timing.js";
import { resizeArguments } from "../resizer/index.js";
import { logger } from "../../utils/logger.js";
import { ReclamationGuard } from "./reclamation.js";

export * from "./reclamation.js";

export interface SamplerOptions {
  minDurationSeconds: number;
  maxLoops: number;
}

export interface SeriesRuntime {
  clock: Clock;
  reclamation: ReclamationControl;
}

/**
 * Estimate the duration of one call by timing batches of doubling size until
 * a batch lasts at least `minDurationSeconds` or `maxLoops` is reached.
 */
export function measurePerCall(
  operation: Operation,
  args: readonly unknown[],
  options: SamplerOptions,
  clock: Clock,
): number {
  let loops = 1;

  for (;;) {
    const start = clock.now();
    for (let i = 0; i < loops; i++) {
      operation.invoke(...args);
    }
    const total = clock.elapsed(start, clock.now());

    if (total < options.minDurationSeconds && loops < options.maxLoops) {
      loops = Math.min(loops * 2, options.maxLoops);
      continue;
    }

    return total / loops;
  }
}

/**
 * Untimed call that primes caches and lazy state. Its failures do not matter.
 */
function warmUp(operation: Operation, args: readonly unknown[]): void {
  try {
    operation.invoke(...args);
  } catch (error) {
    logger.debug("Warm-up invocation failed; continuing", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Measure per-call time at every scheduled size.
 *
 * Reclamation stays suspended for the whole sweep and is restored on every
 * exit path. Errors from the operation propagate unchanged and discard the
 * partial series.
 */
export function sampleSeries(
  operation: Operation,
  args: readonly unknown[],
  located: SizableArgument,
  schedule: SizeSchedule,
  options: SamplerOptions,
  runtime: SeriesRuntime,
): number[] {
  const smallest = schedule[0] ?? located.size;
  warmUp(operation, resizeArguments(args, located, smallest));

  const guard = ReclamationGuard.acquire(runtime.reclamation);
  try {
    return schedule.map((size) =>
      measurePerCall(
        operation,
        resizeArguments(args, located, size),
        options,
        runtime.clock,
      ),
    );
  } finally {
    guard.release();
  }
}
