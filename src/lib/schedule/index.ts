/**
 * Geometric sample-size schedule
 */

import type { SizeSchedule } from "../../types/timing.js";
import { ValidationError } from "../../utils/errors.js";

export const DEFAULT_SAMPLE_COUNT = 7;

const MIN_SAMPLE_SIZE = 2;

/**
 * Generate `sampleCount` sizes spaced geometrically from 2 up to `maxSize`.
 *
 * The last entry is always `maxSize`. Rounding can make neighbours collide;
 * duplicates collapse and the tail is padded with `maxSize`.
 *
 * @example
 * generateSizeSchedule(128); // [2, 4, 8, 16, 32, 64, 128]
 */
export function generateSizeSchedule(
  maxSize: number,
  sampleCount: number = DEFAULT_SAMPLE_COUNT,
): SizeSchedule {
  if (!Number.isInteger(sampleCount) || sampleCount < 3) {
    throw new ValidationError(
      `sampleCount must be an integer >= 3, got ${sampleCount}`,
    );
  }
  if (!Number.isInteger(maxSize) || maxSize < MIN_SAMPLE_SIZE) {
    throw new ValidationError(
      `maxSize must be an integer >= ${MIN_SAMPLE_SIZE}, got ${maxSize}`,
    );
  }

  const factor = Math.pow(maxSize / MIN_SAMPLE_SIZE, 1 / (sampleCount - 1));

  const raw: number[] = [];
  for (let step = 0; step < sampleCount - 1; step++) {
    const size = Math.round(MIN_SAMPLE_SIZE * Math.pow(factor, step));
    raw.push(Math.min(maxSize, Math.max(MIN_SAMPLE_SIZE, size)));
  }
  raw.push(maxSize);

  const schedule = Array.from(new Set(raw));
  while (schedule.length < sampleCount) {
    schedule.push(maxSize);
  }

  return Object.freeze(schedule);
}
