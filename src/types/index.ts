/**
 * Central type exports for growthprobe
 */

export * from "./timing.js";
export * from "./config.js";
