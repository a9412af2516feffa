/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(private level: LogLevel = "info") {}

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string, error?: unknown): void {
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error) {
      console.error(error);
    }
  }
}
