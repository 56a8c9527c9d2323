/**
 * Complexity analyzer - sized sampling pipeline behind `wrap`
 */

import type {
  Clock,
  ReclamationControl,
  TimerOptions,
} from "../../types/config.js";
import {
  UNKNOWN_COMPLEXITY,
  type ComplexityAnalysis,
  type Operation,
} from "../../types/timing.js";
import { locateSizableArgument } from "../locator/index.js";
import { generateSizeSchedule } from "../schedule/index.js";
import { sampleSeries } from "../sampler/index.js";
import { fitModels } from "../fitter/index.js";
import { selectModel } from "../selector/index.js";
import { logger } from "../../utils/logger.js";

export type AnalyzerOptions = Pick<
  TimerOptions,
  "sampleCount" | "minSampleDuration" | "maxLoopsPerSize" | "sizeArgument"
>;

export interface AnalyzerRuntime {
  clock: Clock;
  reclamation: ReclamationControl;
}

/**
 * Time `operation` across a geometric range of input sizes derived from
 * `args` and pick the growth model that fits best.
 *
 * Degrades to `"unknown"` when no argument carries a usable size. Errors
 * thrown by the operation propagate unchanged.
 */
export function analyzeComplexity(
  operation: Operation,
  args: readonly unknown[],
  options: AnalyzerOptions,
  runtime: AnalyzerRuntime,
): ComplexityAnalysis {
  const located = locateSizableArgument(
    args,
    options.sampleCount,
    options.sizeArgument,
  );

  if (!located) {
    logger.debug("No usable size argument; skipping complexity analysis", {
      argumentCount: args.length,
      sampleCount: options.sampleCount,
    });
    return { complexityLabel: UNKNOWN_COMPLEXITY };
  }

  const schedule = generateSizeSchedule(located.size, options.sampleCount);
  logger.debug("Sampling schedule generated", {
    argumentIndex: located.index,
    kind: located.kind,
    schedule: [...schedule],
  });

  const perCallTimes = sampleSeries(
    operation,
    args,
    located,
    schedule,
    {
      minDurationSeconds: options.minSampleDuration,
      maxLoops: options.maxLoopsPerSize,
    },
    runtime,
  );

  const sampledSizes = [...schedule];
  const modelErrors = fitModels(sampledSizes, perCallTimes);
  const complexityLabel = selectModel(modelErrors);

  logger.debug("Complexity model selected", {
    complexityLabel,
    modelErrors: Object.fromEntries(modelErrors),
  });

  return { complexityLabel, sampledSizes, perCallTimes, modelErrors };
}
