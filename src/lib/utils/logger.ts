/**
 * Logging utilities with structured output and log levels
 */

import { getConfig } from "../../config.js";
import type { PipelineConfig } from "../../types.js";

type LogLevel = PipelineConfig["logLevel"];

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

interface LogContext {
  [key: string]: unknown;
}

class Logger {
  private level: LogLevel | null = null;

  /**
   * Get the current log level, reading from config if not yet set
   */
  private getLevel(): LogLevel {
    if (this.level === null) {
      try {
        this.level = getConfig().logLevel;
      } catch {
        // Config not loaded yet, use default
        this.level = "info";
      }
    }
    return this.level;
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.getLevel());
  }

  /**
   * Format log message with context
   */
  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: LogContext): void {
    if (this.shouldLog("debug")) {
      console.debug(this.formatMessage("debug", message, context));
    }
  }

  /**
   * Log an info message
   */
  info(message: string, context?: LogContext): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", message, context));
    }
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: LogContext): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message, context));
    }
  }

  /**
   * Log an error message
   */
  error(message: string, context?: LogContext): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message, context));
    }
  }

  /**
   * Log the start or end of a pipeline stage
   */
  logStage(stage: string, event: "start" | "done", context?: LogContext): void {
    this.info(`Stage ${stage} ${event}`, {
      stage,
      event,
      ...context,
    });
  }

  /**
   * Log batch progress; emitted once every `every` items
   */
  logProgress(stage: string, count: number, every: number, context?: LogContext): void {
    if (count > 0 && count % every === 0) {
      this.info(`${stage}: ${count} processed`, {
        stage,
        count,
        ...context,
      });
    }
  }

  /**
   * Log parsing operation
   */
  logParsing(operation: string, context?: LogContext): void {
    this.debug(`Parsing: ${operation}`, {
      operation,
      ...context,
    });
  }

  /**
   * Update log level (useful for testing or runtime changes)
   * This overrides the config-based level until resetLevel() is called
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Reset log level to read from config again
   */
  resetLevel(): void {
    this.level = null;
  }

  /**
   * Get current log level (for inspection)
   */
  getCurrentLevel(): LogLevel {
    return this.getLevel();
  }
}

/**
 * Singleton logger instance
 */
export const logger = new Logger();

