/**
 * Timer option loading and validation
 */

import AjvModule, { type JSONSchemaType } from "ajv";
import type { TimerOptions, TimerOptionsInput } from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

// ajv is CommonJS; under Node's ESM interop the class sits on `default`
const Ajv = AjvModule.default;

export const DEFAULT_TIMER_OPTIONS: Readonly<TimerOptions> = Object.freeze({
  label: "Elapsed",
  analyzeComplexity: false,
  sampleCount: 7,
  minSampleDuration: 0.05,
  maxLoopsPerSize: 256,
  printResult: true,
});

export const timerOptionsSchema: JSONSchemaType<TimerOptions> = {
  type: "object",
  properties: {
    label: { type: "string", minLength: 1 },
    analyzeComplexity: { type: "boolean" },
    sampleCount: { type: "integer", minimum: 3 },
    minSampleDuration: { type: "number", minimum: 0 },
    maxLoopsPerSize: { type: "integer", minimum: 1 },
    printResult: { type: "boolean" },
    name: { type: "string", nullable: true },
    sizeArgument: { type: "integer", minimum: 0, nullable: true },
  },
  required: [
    "label",
    "analyzeComplexity",
    "sampleCount",
    "minSampleDuration",
    "maxLoopsPerSize",
    "printResult",
  ],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateTimerOptions = ajv.compile(timerOptionsSchema);

/**
 * Merge timer options over the defaults and validate the result
 *
 * @throws ConfigError listing every violation
 *
 * @example
 * resolveTimerOptions({ analyzeComplexity: true, sampleCount: 5 });
 * // { label: "Elapsed", analyzeComplexity: true, sampleCount: 5, ... }
 */
export function resolveTimerOptions(
  input: TimerOptionsInput = {},
): TimerOptions {
  // Explicit undefined means "use the default"
  const provided = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined),
  );
  const candidate: unknown = { ...DEFAULT_TIMER_OPTIONS, ...provided };

  if (!validateTimerOptions(candidate)) {
    const violations = (validateTimerOptions.errors ?? []).map((error) => ({
      path: error.instancePath || "/",
      message: error.message ?? error.keyword,
    }));
    throw new ConfigError("Invalid timer options", violations);
  }

  logger.debug("Timer options resolved", {
    label: candidate.label,
    analyzeComplexity: candidate.analyzeComplexity,
    sampleCount: candidate.sampleCount,
  });

  return candidate;
}
