/**
 * Fit CLI command - classify recorded (size, seconds) samples
 */

import { Command } from "commander";
import { createReadStream } from "fs";
import { access } from "fs/promises";
import * as readline from "readline";
import AjvModule, { type JSONSchemaType } from "ajv";
import { fitAllModels } from "../../lib/fitter/index.js";
import { selectModel } from "../../lib/selector/index.js";
import { toJSONFitReport, type JSONFitReport } from "../../lib/reporter/index.js";
import type { ComplexityLabel } from "../../types/timing.js";
import {
  ErrorCode,
  FileIOError,
  GrowthProbeError,
  ValidationError,
  toErrorResponse,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseConfigFile } from "../config/parser.js";
import type { FitCommandOptions } from "../config/types.js";
import { emitResponse, type SuccessResponse } from "./output.js";

// ajv is CommonJS; under Node's ESM interop the class sits on `default`
const Ajv = AjvModule.default;

const MIN_SAMPLES = 3;

/** Keeps n^5 and its squares finite in the fitter */
export const MAX_SAMPLE_SIZE = Number.MAX_SAFE_INTEGER;

export interface TimingSample {
  size: number;
  seconds: number;
}

const sampleSchema: JSONSchemaType<TimingSample> = {
  type: "object",
  properties: {
    size: { type: "number", exclusiveMinimum: 0, maximum: MAX_SAMPLE_SIZE },
    seconds: { type: "number", minimum: 0 },
  },
  required: ["size", "seconds"],
};

const validateSample = new Ajv({ allErrors: true }).compile(sampleSchema);

/**
 * Read NDJSON timing samples from a file or stdin, one object per line
 */
async function* streamSamples(
  inputPath: string,
): AsyncIterableIterator<TimingSample> {
  const fileStream =
    inputPath === "stdin" || inputPath === "-"
      ? undefined
      : createReadStream(inputPath, { encoding: "utf8" });

  const rl = readline.createInterface({
    input: fileStream ?? process.stdin,
    crlfDelay: Infinity,
  });

  try {
    yield* readSampleLines(rl);
  } finally {
    fileStream?.destroy();
  }
}

async function* readSampleLines(
  rl: readline.Interface,
): AsyncIterableIterator<TimingSample> {
  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    const trimmed = line.trim();
    if (trimmed === "") continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      throw new GrowthProbeError(
        ErrorCode.INPUT_READ_ERROR,
        `Failed to parse NDJSON line ${lineNumber}: ${trimmed.substring(0, 100)}`,
        undefined,
        { cause: err },
      );
    }

    if (!validateSample(parsed)) {
      throw new ValidationError(`Invalid timing sample on line ${lineNumber}`, {
        line: lineNumber,
        errors: (validateSample.errors ?? []).map(
          (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
        ),
      });
    }

    yield parsed;
  }
}

export interface FitReport extends JSONFitReport {
  samples: string;
}

/**
 * Fit every candidate model to the samples in `samplesPath`
 */
export async function runFit(
  samplesPath: string,
): Promise<SuccessResponse<FitReport>> {
  if (samplesPath !== "-" && samplesPath !== "stdin") {
    try {
      await access(samplesPath);
    } catch (error) {
      throw new FileIOError(`Samples file not found at: ${samplesPath}`, undefined, {
        cause: error,
      });
    }
  }

  const sizes: number[] = [];
  const seconds: number[] = [];

  try {
    for await (const sample of streamSamples(samplesPath)) {
      sizes.push(sample.size);
      seconds.push(sample.seconds);
    }
  } catch (error) {
    if (error instanceof GrowthProbeError) throw error;
    throw new GrowthProbeError(
      ErrorCode.INPUT_READ_ERROR,
      `Failed to read samples from ${samplesPath}`,
      undefined,
      { cause: error },
    );
  }

  if (sizes.length < MIN_SAMPLES) {
    throw new ValidationError(
      `At least ${MIN_SAMPLES} samples are required, got ${sizes.length}`,
    );
  }

  const fits = fitAllModels(sizes, seconds);
  const complexityLabel = selectModel(
    new Map<ComplexityLabel, number>(fits.map((fit) => [fit.label, fit.rmse])),
  );

  logger.info("Samples fitted", {
    samples: sizes.length,
    complexityLabel,
  });

  return {
    status: "success",
    phase: "fit",
    report: {
      samples: samplesPath,
      ...toJSONFitReport(complexityLabel, sizes.length, fits),
    },
  };
}

export function createFitCommand(): Command {
  return new Command("fit")
    .description("Fit recorded timing samples (NDJSON of {size, seconds})")
    .argument("[samples]", 'Path to NDJSON samples (or "-" for stdin)')
    .option("--output-path <path>", 'Path for the JSON report (or "stdout")')
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (samplesArg: string | undefined, opts: FitCommandOptions) => {
      try {
        const configFile = opts.config
          ? parseConfigFile(opts.config).fit
          : undefined;
        const samplesPath = samplesArg ?? configFile?.samples ?? "-";
        const response = await runFit(samplesPath);
        await emitResponse(
          response,
          opts.outputPath ?? configFile?.outputPath,
        );
      } catch (error) {
        logger.error("Fitting failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        console.error(JSON.stringify(toErrorResponse(error, "fit"), null, 2));
        process.exit(1);
      }
    });
}
