/**
 * growthprobe: empirical runtime-complexity profiling
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/clock/index.js";
export * from "./lib/locator/index.js";
export * from "./lib/schedule/index.js";
export * from "./lib/resizer/index.js";
export * from "./lib/sampler/index.js";
export * from "./lib/fitter/index.js";
export * from "./lib/selector/index.js";
export * from "./lib/analyzer/index.js";
export * from "./lib/timer/index.js";
export * from "./lib/reporter/index.js";
export * from "./lib/inputs/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
export * from "./utils/seed-manager.js";
