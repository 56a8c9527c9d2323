/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export type LogMeta = Record<string, unknown>;

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: levelFromEnv() }) {
    this.level = config.level;
    this.prefix = config.prefix || "GrowthProbe";
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog("error")) {
      console.error(`[${this.prefix}] ERROR:`, message, meta || "");
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog("warn")) {
      console.warn(`[${this.prefix}] WARN:`, message, meta || "");
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog("info")) {
      // stderr keeps stdout free for JSON responses and report lines
      process.stderr.write(
        `[${this.prefix}] INFO: ${message} ${meta ? JSON.stringify(meta) : ""}\n`,
      );
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog("debug")) {
      process.stderr.write(
        `[${this.prefix}] DEBUG: ${message} ${meta ? JSON.stringify(meta) : ""}\n`,
      );
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// Default logger instance
export const logger = new Logger();

export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
