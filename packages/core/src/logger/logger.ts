import { loadConfig } from "../config";
import type { LogLevel } from "../config";

export type { LogLevel };

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.level === "silent") {
      return false;
    }
    return LEVEL_ORDER.indexOf(this.level) <= LEVEL_ORDER.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Creates a prefixed logger. Without an explicit level the configured one is used
 * (LOG_LEVEL, silenced when NODE_ENV is "test").
 */
export function createLogger(prefix: string = "", level?: LogLevel): ConsoleLogger {
  return new ConsoleLogger(prefix, level ?? loadConfig().logLevel);
}
