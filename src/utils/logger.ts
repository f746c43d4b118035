/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LoggingConfig } from "../types/config";

type LogLevel = LoggingConfig["level"];

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(private level: LogLevel = "info") {}

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    console.error(`[ERROR] ${message}`);
    if (error) {
      console.error(error);
    }
  }
}
