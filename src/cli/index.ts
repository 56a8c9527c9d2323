#!/usr/bin/env node

/**
 * growthprobe CLI - empirical runtime-complexity profiling
 */

import { Command } from "commander";
import { createProfileCommand } from "./commands/profile.js";
import { createFitCommand } from "./commands/fit.js";
import { isLogLevel, logger } from "../utils/logger.js";
import { toErrorResponse } from "../utils/errors.js";

const pkg = {
  name: "growthprobe",
  version: "0.1.0",
  description:
    "Time a function across input sizes and infer its growth model",
};

function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option(
      "--log-level <level>",
      "Logging verbosity: error, warn, info, debug",
      "info",
    )
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createProfileCommand());
  program.addCommand(createFitCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", {
    error: error instanceof Error ? error.message : String(error),
  });
  console.error(JSON.stringify(toErrorResponse(error, "cli"), null, 2));
  process.exit(1);
});
