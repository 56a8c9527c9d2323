/**
 * Model selector
 */

import {
  UNKNOWN_COMPLEXITY,
  type ComplexityLabel,
  type ModelErrors,
} from "../../types/timing.js";

/**
 * Label with the lowest fit error. Ties go to the entry met first, which for
 * `fitModels` output is catalogue order (simplest model first).
 */
export function selectModel(
  errors: ModelErrors,
): ComplexityLabel | typeof UNKNOWN_COMPLEXITY {
  let best: ComplexityLabel | undefined;
  let bestError = Infinity;

  for (const [label, error] of errors) {
    if (Number.isNaN(error)) continue;
    if (best === undefined || error < bestError) {
      best = label;
      bestError = error;
    }
  }

  return best ?? UNKNOWN_COMPLEXITY;
}
