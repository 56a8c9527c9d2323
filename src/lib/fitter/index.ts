/**
 * Model fitter - least-squares fit of per-call time against each candidate
 */

import type {
  CandidateModel,
  ComplexityLabel,
  LinearFit,
  ModelErrors,
  ModelFit,
} from "../../types/timing.js";
import { ValidationError } from "../../utils/errors.js";
import { CANDIDATE_MODELS } from "./models.js";

export * from "./models.js";

/** Features are undefined for sizes below 2 (log of 0 or 1) */
const MIN_FEATURE_SIZE = 2;

function mean(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Ordinary least squares with intercept. A zero denominator (all x equal)
 * gives slope 0 and the mean of y as intercept.
 */
export function fitLinear(
  xs: readonly number[],
  ys: readonly number[],
): LinearFit {
  const meanX = mean(xs);
  const meanY = mean(ys);

  let numerator = 0;
  let denominator = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = (xs[i] ?? meanX) - meanX;
    numerator += dx * ((ys[i] ?? meanY) - meanY);
    denominator += dx * dx;
  }

  const slope = denominator === 0 ? 0 : numerator / denominator;
  return { intercept: meanY - slope * meanX, slope };
}

export function rootMeanSquareError(
  xs: readonly number[],
  ys: readonly number[],
  fit: LinearFit,
): number {
  let sumSquared = 0;
  for (let i = 0; i < xs.length; i++) {
    const residual =
      (ys[i] ?? 0) - (fit.intercept + fit.slope * (xs[i] ?? 0));
    sumSquared += residual * residual;
  }
  return Math.sqrt(sumSquared / xs.length);
}

function assertSeries(
  sizes: readonly number[],
  perCallTimes: readonly number[],
): void {
  if (sizes.length === 0) {
    throw new ValidationError("Cannot fit an empty series");
  }
  if (sizes.length !== perCallTimes.length) {
    throw new ValidationError("Sizes and per-call times differ in length", {
      sizes: sizes.length,
      perCallTimes: perCallTimes.length,
    });
  }
}

export function fitModel(
  model: CandidateModel,
  sizes: readonly number[],
  perCallTimes: readonly number[],
): ModelFit {
  assertSeries(sizes, perCallTimes);
  const xs = sizes.map((size) =>
    model.feature(Math.max(MIN_FEATURE_SIZE, size)),
  );
  const fit = fitLinear(xs, perCallTimes);
  return {
    label: model.label,
    fit,
    rmse: rootMeanSquareError(xs, perCallTimes, fit),
  };
}

/**
 * Fit every candidate, in catalogue order
 */
export function fitAllModels(
  sizes: readonly number[],
  perCallTimes: readonly number[],
): ModelFit[] {
  return CANDIDATE_MODELS.map((model) =>
    fitModel(model, sizes, perCallTimes),
  );
}

/**
 * RMSE per candidate label. Deterministic for identical input.
 */
export function fitModels(
  sizes: readonly number[],
  perCallTimes: readonly number[],
): ModelErrors {
  const errors = new Map<ComplexityLabel, number>();
  for (const { label, rmse } of fitAllModels(sizes, perCallTimes)) {
    errors.set(label, rmse);
  }
  return errors;
}
