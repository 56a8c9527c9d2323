/**
 * Profile CLI command - time an exported function against generated input
 */

import { Command } from "commander";
import { buildInput, isInputKind, loadOperation } from "../../lib/inputs/index.js";
import { wrap } from "../../lib/timer/index.js";
import { toJSONReport, type JSONTimingReport } from "../../lib/reporter/index.js";
import { resolveTimerOptions } from "../../utils/config-loader.js";
import { generateRandomSeed } from "../../utils/seed-manager.js";
import { ConfigError, toErrorResponse } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type {
  InputKind,
  TimerOptionsInput,
  TimerRuntime,
} from "../../types/config.js";
import { parseConfigFile } from "../config/parser.js";
import type { ProfileCommandOptions, ProfileConfig } from "../config/types.js";
import {
  emitResponse,
  parseInteger,
  parseNumber,
  type SuccessResponse,
} from "./output.js";

const DEFAULT_INPUT_SIZE = 1000;

export interface ProfileRunConfig {
  module: string;
  exportName: string;
  input: InputKind;
  size: number;
  seed: string;
  outputPath?: string;
  timer: TimerOptionsInput;
}

export interface ProfileReport extends JSONTimingReport {
  module: string;
  export: string;
  input: { kind: InputKind; size: number; seed: string };
}

/**
 * Merge CLI options with config file (CLI options take precedence)
 */
export function mergeProfileConfig(
  modulePath: string | undefined,
  options: ProfileCommandOptions,
  configFile: ProfileConfig = {},
): ProfileRunConfig {
  const module = modulePath ?? configFile.module;
  if (!module) {
    throw new ConfigError("A module path is required (argument or profile.module)");
  }

  const input = options.input ?? configFile.input ?? "array";
  if (!isInputKind(input)) {
    throw new ConfigError(
      `Unsupported input kind: ${input}. Must be array, string, or size`,
    );
  }

  const exportName = options.export ?? configFile.export ?? "default";

  const timer: TimerOptionsInput = {
    ...configFile.timer,
    name: configFile.timer?.name ?? exportName,
  };
  if (options.label !== undefined) timer.label = options.label;
  if (options.analyze !== undefined) timer.analyzeComplexity = options.analyze;
  if (options.sampleCount !== undefined) timer.sampleCount = options.sampleCount;
  if (options.minSampleDuration !== undefined) {
    timer.minSampleDuration = options.minSampleDuration;
  }
  if (options.maxLoops !== undefined) timer.maxLoopsPerSize = options.maxLoops;

  return {
    module,
    exportName,
    input,
    size: options.size ?? configFile.size ?? DEFAULT_INPUT_SIZE,
    seed: options.seed ?? configFile.seed ?? generateRandomSeed(),
    outputPath: options.outputPath ?? configFile.outputPath,
    timer,
  };
}

/**
 * Load the target function, build its input, and time it
 */
export async function runProfile(
  config: ProfileRunConfig,
  runtime: TimerRuntime = {},
): Promise<SuccessResponse<ProfileReport>> {
  const timerOptions = resolveTimerOptions(config.timer);
  const fn = await loadOperation(config.module, config.exportName);
  const input = buildInput(config.input, config.size, config.seed);

  logger.info("Profiling function", {
    module: config.module,
    export: config.exportName,
    input: config.input,
    size: config.size,
    analyzeComplexity: timerOptions.analyzeComplexity,
  });

  const timed = wrap(fn, timerOptions, {
    write: (line) => process.stderr.write(`${line}\n`),
    ...runtime,
  });
  const result = timed(input);

  logger.info("Profiling complete", {
    singleShotSeconds: result.singleShotSeconds,
    complexityLabel: result.complexityLabel,
  });

  return {
    status: "success",
    phase: "profile",
    report: {
      ...toJSONReport(
        timerOptions.label,
        timerOptions.name ?? config.exportName,
        result,
      ),
      module: config.module,
      export: config.exportName,
      input: { kind: config.input, size: config.size, seed: config.seed },
    },
  };
}

export function createProfileCommand(): Command {
  return new Command("profile")
    .description("Time an exported function and infer its growth model")
    .argument("[module]", "Path to the JavaScript module to load")
    .option("--export <name>", 'Export to call (default: "default")')
    .option("--input <kind>", "Generated input: array, string, or size")
    .option("--size <number>", "Input size (default: 1000)", parseInteger)
    .option("--seed <seed>", "Seed for deterministic input generation")
    .option("--analyze", "Sample across sizes and infer complexity")
    .option("--sample-count <number>", "Number of sampled sizes (>= 3)", parseInteger)
    .option(
      "--min-sample-duration <seconds>",
      "Minimum batch duration per sampled size",
      parseNumber,
    )
    .option("--max-loops <number>", "Cap on repeats per sampled size", parseInteger)
    .option("--label <label>", "Tag for the report line")
    .option("--output-path <path>", 'Path for the JSON report (or "stdout")')
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (modulePath: string | undefined, opts: ProfileCommandOptions) => {
      try {
        const configFile = opts.config
          ? parseConfigFile(opts.config).profile
          : undefined;
        const config = mergeProfileConfig(modulePath, opts, configFile);
        const response = await runProfile(config);
        await emitResponse(response, config.outputPath);
      } catch (error) {
        logger.error("Profiling failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        console.error(JSON.stringify(toErrorResponse(error, "profile"), null, 2));
        process.exit(1);
      }
    });
}
