/**
 * Input generation for CLI profiling runs
 */

import { faker } from "@faker-js/faker";
import type { InputKind } from "../../types/config.js";
import { hashStringToSeed } from "../../utils/seed-manager.js";
import { ValidationError } from "../../utils/errors.js";

export * from "./module-loader.js";

export const INPUT_KINDS: readonly InputKind[] = ["array", "string", "size"];

export function isInputKind(value: unknown): value is InputKind {
  return INPUT_KINDS.some((kind) => kind === value);
}

const MAX_ARRAY_VALUE = 1_000_000;

/**
 * Build a deterministic input of the given size.
 *
 * - `array`: integers in [0, 1e6]
 * - `string`: alphabetic characters
 * - `size`: the size itself, for functions that take `n`
 */
export function buildInput(
  kind: InputKind,
  size: number,
  seed: string,
): number[] | string | number {
  if (!Number.isSafeInteger(size) || size < 1) {
    throw new ValidationError(`Input size must be a positive integer, got ${size}`);
  }

  faker.seed(hashStringToSeed(seed));

  switch (kind) {
    case "array":
      return faker.helpers.multiple(
        () => faker.number.int({ min: 0, max: MAX_ARRAY_VALUE }),
        { count: size },
      );
    case "string":
      return faker.string.alpha({ length: size });
    case "size":
      return size;
  }
}
