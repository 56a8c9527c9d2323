/**
 * Core data model for timing and complexity analysis
 */

/**
 * Growth models the fitter knows about, in catalogue order
 */
export const COMPLEXITY_LABELS = [
  "O(1)",
  "O(log n)",
  "O(n)",
  "O(n log n)",
  "O(n^2)",
  "O(n^3)",
  "O(n^4)",
  "O(n^5)",
] as const;

export type ComplexityLabel = (typeof COMPLEXITY_LABELS)[number];

/** Analysis was requested but no usable size argument was found */
export const UNKNOWN_COMPLEXITY = "unknown" as const;

/** Analysis was disabled for this call */
export const NOT_ANALYZED = "not analyzed" as const;

export type ComplexityOutcome =
  | ComplexityLabel
  | typeof UNKNOWN_COMPLEXITY
  | typeof NOT_ANALYZED;

/**
 * Root-mean-square fit error per candidate, in catalogue order
 */
export type ModelErrors = ReadonlyMap<ComplexityLabel, number>;

export interface LinearFit {
  intercept: number;
  slope: number;
}

export interface ModelFit {
  label: ComplexityLabel;
  fit: LinearFit;
  rmse: number;
}

/**
 * A named feature function of the input size
 */
export interface CandidateModel {
  readonly label: ComplexityLabel;
  readonly feature: (size: number) => number;
}

/**
 * Ordered sample sizes for one analysis; always ends with the natural size
 */
export type SizeSchedule = readonly number[];

/**
 * Outcome of the sized sampling pipeline
 */
export interface ComplexityAnalysis {
  complexityLabel: ComplexityOutcome;
  sampledSizes?: number[];
  perCallTimes?: number[];
  modelErrors?: ModelErrors;
}

/**
 * Result of one wrapped call
 */
export interface TimingResult<R> extends ComplexityAnalysis {
  returnValue: R;
  singleShotSeconds: number;
}

/**
 * Anything with a length that can be cut down to a prefix
 */
export interface Sliceable {
  readonly length: number;
  slice(start?: number, end?: number): unknown;
}

export type SizableArgument =
  | { kind: "sequence"; index: number; size: number; value: Sliceable }
  | { kind: "rawSize"; index: number; size: number };

export type ArgumentShape =
  | { kind: "sequence"; size: number; value: Sliceable }
  | { kind: "rawSize"; size: number }
  | { kind: "opaque" };

/**
 * Loosely-typed view of a measured function. Declared with method syntax so
 * that any `(...args: A) => R` can be assigned to it; the analyzer calls it
 * with resized copies of the caller's own arguments.
 */
export interface Operation<R = unknown> {
  invoke(...args: unknown[]): R;
}
