/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import AjvModule, { type SchemaObject } from "ajv";
import type { GrowthProbeConfig } from "./types.js";
import { INPUT_KINDS } from "../../lib/inputs/index.js";
import { timerOptionsSchema } from "../../utils/config-loader.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

// ajv is CommonJS; under Node's ESM interop the class sits on `default`
const Ajv = AjvModule.default;

const configFileSchema: SchemaObject = {
  type: "object",
  properties: {
    profile: {
      type: "object",
      properties: {
        module: { type: "string" },
        export: { type: "string" },
        input: { type: "string", enum: [...INPUT_KINDS] },
        size: { type: "integer", minimum: 1 },
        seed: { type: "string" },
        outputPath: { type: "string" },
        timer: { ...timerOptionsSchema, required: [] },
      },
      additionalProperties: false,
    },
    fit: {
      type: "object",
      properties: {
        samples: { type: "string" },
        outputPath: { type: "string" },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

const validateConfigFile = new Ajv({ allErrors: true }).compile<GrowthProbeConfig>(
  configFileSchema,
);

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): GrowthProbeConfig {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // An empty YAML document parses to null
  const config: unknown = raw ?? {};
  if (!validateConfigFile(config)) {
    const violations = (validateConfigFile.errors ?? []).map((error) => ({
      path: error.instancePath || "/",
      message: error.message ?? error.keyword,
    }));
    throw new ConfigError(`Invalid config file: ${filePath}`, violations);
  }

  logger.info("Configuration file parsed successfully", {
    hasProfileConfig: !!config.profile,
    hasFitConfig: !!config.fit,
  });

  return config;
}
