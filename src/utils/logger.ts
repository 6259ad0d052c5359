/**
 * Logger Utility
 * Handles console output with different log levels
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { LogLevel } from "../types/config";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  scope?: string;
  // Every emitted line is also appended here, with a timestamp
  file?: string | null;
}

export class Logger {
  private readonly scope?: string;
  private readonly file: string | null;

  constructor(
    private level: LogLevel = "info",
    options: LoggerOptions = {},
  ) {
    this.scope = options.scope;
    this.file = options.file ?? null;
    if (this.file) {
      mkdirSync(dirname(this.file), { recursive: true });
    }
  }

  /**
   * Logger sharing level and file, with its own scope prefix
   */
  child(scope: string): Logger {
    return new Logger(this.level, {
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      file: this.file,
    });
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.write("DEBUG", message, console.log);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.write("INFO", message, console.log);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.write("WARN", message, console.warn);
    }
  }

  error(message: string, error?: unknown): void {
    this.write("ERROR", message, console.error);
    if (error !== undefined) {
      console.error(error);
      if (this.file && error instanceof Error && error.stack) {
        this.append(error.stack);
      }
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  private write(
    tag: string,
    message: string,
    sink: (line: string) => void,
  ): void {
    const line = this.scope
      ? `[${tag}] [${this.scope}] ${message}`
      : `[${tag}] ${message}`;
    sink(line);
    this.append(line);
  }

  private append(line: string): void {
    if (!this.file) return;
    appendFileSync(this.file, `${new Date().toISOString()} ${line}\n`, "utf-8");
  }
}
