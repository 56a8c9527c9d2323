/**
 * Argument resizer - builds a call at a smaller problem size
 */

import type { SizableArgument } from "../../types/timing.js";
import { logger } from "../../utils/logger.js";

/**
 * Copy `args` with the size argument cut down to `targetSize`.
 *
 * Sequences are replaced by `slice(0, targetSize)`; when slicing throws, the
 * original value is kept. A bare size is replaced by `targetSize` itself.
 * Neither `args` nor its elements are modified.
 */
export function resizeArguments(
  args: readonly unknown[],
  located: SizableArgument,
  targetSize: number,
): unknown[] {
  const resized = [...args];

  if (located.kind === "rawSize") {
    resized[located.index] = targetSize;
    return resized;
  }

  try {
    resized[located.index] = located.value.slice(0, targetSize);
  } catch (error) {
    logger.debug("Slicing size argument failed; passing it through", {
      index: located.index,
      targetSize,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  return resized;
}
