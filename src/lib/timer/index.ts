/**
 * Timing facade - scoped stopwatch and function wrapper
 */

import type {
  Clock,
  ReclamationControl,
  TimerOptions,
  TimerOptionsInput,
  TimerRuntime,
} from "../../types/config.js";
import {
  NOT_ANALYZED,
  type ComplexityAnalysis,
  type Operation,
  type TimingResult,
} from "../../types/timing.js";
import { monotonicClock } from "../clock/index.js";
import { heapReclamation } from "../sampler/index.js";
import { analyzeComplexity } from "../analyzer/index.js";
import { formatReportLine, formatScopeLine } from "../reporter/index.js";
import { resolveTimerOptions } from "../../utils/config-loader.js";
import { TimerStateError } from "../../utils/errors.js";

export type TimerState = "idle" | "running" | "completed" | "failed";

interface ResolvedRuntime {
  clock: Clock;
  reclamation: ReclamationControl;
  write: (line: string) => void;
}

function writeLine(line: string): void {
  process.stdout.write(`${line}\n`);
}

function resolveRuntime(runtime: TimerRuntime): ResolvedRuntime {
  return {
    clock: runtime.clock ?? monotonicClock,
    reclamation: runtime.reclamation ?? heapReclamation,
    write: runtime.write ?? writeLine,
  };
}

/**
 * Stopwatch over a block of code.
 *
 * idle -> running on `enter()`; running -> completed or failed on `exit()`.
 * A finished scope can be entered again.
 */
export class TimerScope {
  private readonly options: TimerOptions;
  private readonly runtime: ResolvedRuntime;
  private currentState: TimerState = "idle";
  private startedAt = 0;
  private lastElapsed: number | undefined;

  constructor(options: TimerOptionsInput = {}, runtime: TimerRuntime = {}) {
    this.options = resolveTimerOptions(options);
    this.runtime = resolveRuntime(runtime);
  }

  get state(): TimerState {
    return this.currentState;
  }

  /** Seconds measured by the most recent exit */
  get elapsedSeconds(): number | undefined {
    return this.lastElapsed;
  }

  enter(): this {
    if (this.currentState === "running") {
      throw new TimerStateError(`Timer "${this.options.label}" is already running`);
    }
    this.currentState = "running";
    this.startedAt = this.runtime.clock.now();
    return this;
  }

  /**
   * Stop the stopwatch. Passing the error that ended the block marks the
   * scope as failed; the elapsed time is recorded either way.
   */
  exit(error?: unknown): number {
    return this.finish(error !== undefined);
  }

  /**
   * Time `block`. Its return value or error passes through unchanged.
   */
  measure<T>(block: () => T): T {
    this.enter();
    let result: T;
    try {
      result = block();
    } catch (error) {
      this.finish(true);
      throw error;
    }
    this.finish(false);
    return result;
  }

  private finish(failed: boolean): number {
    if (this.currentState !== "running") {
      throw new TimerStateError(`Timer "${this.options.label}" is not running`, {
        state: this.currentState,
      });
    }

    const { clock, write } = this.runtime;
    const elapsed = clock.elapsed(this.startedAt, clock.now());
    this.lastElapsed = elapsed;
    this.currentState = failed ? "failed" : "completed";

    if (this.options.printResult) {
      write(formatScopeLine(this.options.label, elapsed, this.options.name));
    }

    return elapsed;
  }
}

export function createTimer(
  options: TimerOptionsInput = {},
  runtime: TimerRuntime = {},
): TimerScope {
  return new TimerScope(options, runtime);
}

/**
 * Wrap `fn` so each call is timed and, optionally, complexity-analyzed.
 *
 * Every call runs `fn` once for real; that value becomes `returnValue`.
 * Errors from `fn` propagate unchanged and no result is produced.
 *
 * @example
 * const timedSum = wrap(sum, { analyzeComplexity: true, printResult: false });
 * const { returnValue, complexityLabel } = timedSum(values);
 */
export function wrap<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: TimerOptionsInput = {},
  runtime: TimerRuntime = {},
): (...args: A) => TimingResult<R> {
  const config = resolveTimerOptions(options);
  const { clock, reclamation, write } = resolveRuntime(runtime);
  const operationName = config.name ?? (fn.name || "anonymous");
  const operation: Operation<R> = { invoke: fn };

  return (...args: A): TimingResult<R> => {
    const start = clock.now();
    const returnValue = fn(...args);
    const singleShotSeconds = clock.elapsed(start, clock.now());

    const analysis: ComplexityAnalysis = config.analyzeComplexity
      ? analyzeComplexity(operation, args, config, { clock, reclamation })
      : { complexityLabel: NOT_ANALYZED };

    const result: TimingResult<R> = {
      returnValue,
      singleShotSeconds,
      ...analysis,
    };

    if (config.printResult) {
      write(formatReportLine(config.label, operationName, result));
    }

    return result;
  };
}
