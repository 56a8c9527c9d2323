/**
 * Reporter - human-readable report lines and JSON reports
 */

import {
  NOT_ANALYZED,
  UNKNOWN_COMPLEXITY,
  type ComplexityLabel,
  type ComplexityOutcome,
  type ModelFit,
  type TimingResult,
} from "../../types/timing.js";

const SECONDS_DECIMALS = 6;

function complexitySuffix(label: ComplexityOutcome): string {
  if (label === NOT_ANALYZED) return "";
  if (label === UNKNOWN_COMPLEXITY) return ", ~ (size unknown)";
  return `, ~ ${label}`;
}

/**
 * Report line for a wrapped call
 *
 * @example
 * formatReportLine("Elapsed", "sum", result);
 * // "Elapsed (sum): 0.001234 seconds, ~ O(n)"
 */
export function formatReportLine<R>(
  label: string,
  operationName: string,
  result: TimingResult<R>,
): string {
  return (
    `${label} (${operationName}): ` +
    `${result.singleShotSeconds.toFixed(SECONDS_DECIMALS)} seconds` +
    complexitySuffix(result.complexityLabel)
  );
}

/**
 * Report line for a scoped block
 */
export function formatScopeLine(
  label: string,
  seconds: number,
  name?: string,
): string {
  const tag = name ? `${label} (${name})` : label;
  return `${tag}: ${seconds.toFixed(SECONDS_DECIMALS)} seconds`;
}

export interface JSONTimingReport {
  label: string;
  operation: string;
  singleShotSeconds: number;
  complexityLabel: ComplexityOutcome;
  samples?: Array<{ size: number; perCallSeconds: number }>;
  modelErrors?: Partial<Record<ComplexityLabel, number>>;
}

/**
 * Serializable view of a timing result. The return value is left out since
 * the profiler treats it as opaque.
 */
export function toJSONReport<R>(
  label: string,
  operationName: string,
  result: TimingResult<R>,
): JSONTimingReport {
  const report: JSONTimingReport = {
    label,
    operation: operationName,
    singleShotSeconds: result.singleShotSeconds,
    complexityLabel: result.complexityLabel,
  };

  const { sampledSizes, perCallTimes, modelErrors } = result;
  if (sampledSizes && perCallTimes) {
    report.samples = sampledSizes.map((size, i) => ({
      size,
      perCallSeconds: perCallTimes[i] ?? 0,
    }));
  }
  if (modelErrors) {
    report.modelErrors = Object.fromEntries(modelErrors);
  }

  return report;
}

export interface JSONFitReport {
  complexityLabel: ComplexityOutcome;
  sampleCount: number;
  fits: Array<{
    label: ComplexityLabel;
    intercept: number;
    slope: number;
    rmse: number;
  }>;
}

export function toJSONFitReport(
  complexityLabel: ComplexityOutcome,
  sampleCount: number,
  fits: readonly ModelFit[],
): JSONFitReport {
  return {
    complexityLabel,
    sampleCount,
    fits: fits.map(({ label, fit, rmse }) => ({
      label,
      intercept: fit.intercept,
      slope: fit.slope,
      rmse,
    })),
  };
}
