/**
 * Configuration types for growthprobe
 */

/**
 * TimerOptions - plain, serializable timer configuration
 */
export interface TimerOptions {
  label: string; // Report tag
  analyzeComplexity: boolean;
  sampleCount: number; // >= 3
  minSampleDuration: number; // Seconds; target floor per sampled size
  maxLoopsPerSize: number; // Cap on repeat doubling for one size
  printResult: boolean;
  name?: string; // Operation name override for the report line
  sizeArgument?: number; // Explicit index of the size argument
}

export type TimerOptionsInput = Partial<TimerOptions>;

/**
 * Monotonic time source, in seconds
 */
export interface Clock {
  now(): number;
  elapsed(start: number, end: number): number;
}

/**
 * Process-wide switch for background memory reclamation
 */
export interface ReclamationControl {
  isSuspended(): boolean;
  suspend(): void;
  resume(): void;
}

/**
 * Injectable collaborators; not part of the validated options
 */
export interface TimerRuntime {
  clock?: Clock;
  reclamation?: ReclamationControl;
  write?: (line: string) => void;
}

export type InputKind = "array" | "string" | "size";
