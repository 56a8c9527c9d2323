/**
 * Sizable-argument locator
 * Finds the call argument that carries the problem size
 */

import type {
  ArgumentShape,
  SizableArgument,
  Sliceable,
} from "../../types/timing.js";

function isSliceable(value: unknown): value is Sliceable {
  if (typeof value === "string") return true;
  if (typeof value !== "object" || value === null) return false;
  return (
    "length" in value &&
    typeof value.length === "number" &&
    Number.isSafeInteger(value.length) &&
    value.length >= 0 &&
    "slice" in value &&
    typeof value.slice === "function"
  );
}

/**
 * Classify a single argument into one of the accepted shapes
 */
export function classifyArgument(value: unknown): ArgumentShape {
  if (isSliceable(value)) {
    return { kind: "sequence", size: value.length, value };
  }

  if (
    typeof value === "number" &&
    Number.isSafeInteger(value) &&
    value > 0
  ) {
    return { kind: "rawSize", size: value };
  }

  return { kind: "opaque" };
}

/**
 * Locate the size argument of a call.
 *
 * Sequences win over bare integers regardless of position. Returns undefined
 * when nothing qualifies or the size is too small to yield `sampleCount`
 * distinct samples. `preferredIndex` limits the search to one position.
 */
export function locateSizableArgument(
  args: readonly unknown[],
  sampleCount: number,
  preferredIndex?: number,
): SizableArgument | undefined {
  const candidates =
    preferredIndex === undefined
      ? args.map((value, index) => ({ value, index }))
      : preferredIndex < args.length
        ? [{ value: args[preferredIndex], index: preferredIndex }]
        : [];

  let located: SizableArgument | undefined;

  for (const { value, index } of candidates) {
    const shape = classifyArgument(value);
    if (shape.kind === "sequence") {
      located = { kind: "sequence", index, size: shape.size, value: shape.value };
      break;
    }
    if (shape.kind === "rawSize" && !located) {
      located = { kind: "rawSize", index, size: shape.size };
    }
  }

  if (!located || located.size < sampleCount) {
    return undefined;
  }

  return located;
}
