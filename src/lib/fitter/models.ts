/**
 * Candidate growth models
 */

import type { CandidateModel } from "../../types/timing.js";

const MODELS: CandidateModel[] = [
  { label: "O(1)", feature: () => 1 },
  { label: "O(log n)", feature: (n) => Math.log(n) },
  { label: "O(n)", feature: (n) => n },
  { label: "O(n log n)", feature: (n) => n * Math.log(n) },
  { label: "O(n^2)", feature: (n) => n ** 2 },
  { label: "O(n^3)", feature: (n) => n ** 3 },
  { label: "O(n^4)", feature: (n) => n ** 4 },
  { label: "O(n^5)", feature: (n) => n ** 5 },
];

export const CANDIDATE_MODELS: readonly CandidateModel[] = Object.freeze(
  MODELS.map((model) => Object.freeze(model)),
);
