/**
 * Shared CLI output helpers
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { FileIOError } from "../../utils/errors.js";

export interface SuccessResponse<T> {
  status: "success";
  phase: string;
  report: T;
}

/**
 * Write a JSON response to stdout or to `outputPath`
 */
export async function emitResponse(
  response: object,
  outputPath: string | undefined,
): Promise<void> {
  const json = JSON.stringify(response, null, 2);

  if (!outputPath || outputPath === "stdout" || outputPath === "-") {
    process.stdout.write(`${json}\n`);
    return;
  }

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, `${json}\n`, "utf8");
  } catch (error) {
    throw new FileIOError(`Failed to write report to ${outputPath}`, undefined, {
      cause: error,
    });
  }
}

export function parseInteger(value: string): number {
  return parseInt(value, 10);
}

export function parseNumber(value: string): number {
  return parseFloat(value);
}
