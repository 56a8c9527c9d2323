/**
 * CLI configuration types
 */

import type { InputKind, TimerOptionsInput } from "../../types/config.js";

/**
 * `profile` section of a config file
 */
export interface ProfileConfig {
  module?: string;
  export?: string;
  input?: InputKind;
  size?: number;
  seed?: string;
  outputPath?: string;
  timer?: TimerOptionsInput;
}

/**
 * `fit` section of a config file
 */
export interface FitConfig {
  samples?: string;
  outputPath?: string;
}

/**
 * Complete config file structure
 */
export interface GrowthProbeConfig {
  profile?: ProfileConfig;
  fit?: FitConfig;
}

/**
 * Raw options as commander hands them to the profile action
 */
export interface ProfileCommandOptions {
  export?: string;
  input?: string;
  size?: number;
  seed?: string;
  analyze?: boolean;
  sampleCount?: number;
  minSampleDuration?: number;
  maxLoops?: number;
  label?: string;
  outputPath?: string;
  config?: string;
}

export interface FitCommandOptions {
  outputPath?: string;
  config?: string;
}
