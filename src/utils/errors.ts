/**
 * Standard error classes for growthprobe
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  MODULE_LOAD_ERROR = "MODULE_LOAD_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  TIMER_STATE_ERROR = "TIMER_STATE_ERROR",
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class GrowthProbeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "GrowthProbeError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined ? { details: this.details } : {}),
        ...(this.cause !== undefined ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends GrowthProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends GrowthProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class ValidationError extends GrowthProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

export class ModuleLoadError extends GrowthProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.MODULE_LOAD_ERROR, message, details, options);
    this.name = "ModuleLoadError";
  }
}

export class TimerStateError extends GrowthProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.TIMER_STATE_ERROR, message, details, options);
    this.name = "TimerStateError";
  }
}

/**
 * Wrap any thrown value into an error response for the given CLI phase
 */
export function toErrorResponse(error: unknown, phase: string): ErrorResponse {
  if (error instanceof GrowthProbeError) {
    return error.toResponse(phase);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GrowthProbeError(ErrorCode.GENERAL_ERROR, message).toResponse(
    phase,
  );
}
