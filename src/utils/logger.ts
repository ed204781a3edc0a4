/**
 * Centralized diagnostic logging
 *
 * NOTE: This logger is NOT for the primed output. Primed context goes to
 * stdout; everything written here goes to stderr so it never mixes with
 * what a hook or a pipe consumes.
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 99,
}

export interface LoggerConfig {
  level: LogLevel;
  useTimestamps: boolean;
  useColors: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  useTimestamps: false, // Disabled by default for cleaner output
  useColors: true,
};

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Parse a level name such as "debug" or "warn" (case-insensitive)
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Debug/diagnostic logger that writes to stderr
 */
export class Logger {
  private config: LoggerConfig;
  private sink: LogSink;

  constructor(config: Partial<LoggerConfig> = {}, sink: LogSink = stderrSink) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.sink = sink;
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Check if a given log level would be printed
   */
  shouldLog(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  private write(message: string, level: LogLevel): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.config.useTimestamps
      ? this.format(`[${new Date().toISOString()}] `, chalk.dim)
      : '';

    this.sink(timestamp + message + '\n');
  }

  private format(message: string, colorFn: (str: string) => string): string {
    if (this.config.useColors) {
      return colorFn(message);
    }
    return message;
  }

  debug(message: string): void {
    this.write(this.format(message, chalk.gray), LogLevel.DEBUG);
  }

  info(message: string): void {
    this.write(this.format(message, chalk.white), LogLevel.INFO);
  }

  success(message: string): void {
    this.write(this.format(message, chalk.green), LogLevel.INFO);
  }

  warn(message: string): void {
    this.write(this.format(message, chalk.yellow), LogLevel.WARN);
  }

  error(message: string): void {
    this.write(this.format(message, chalk.red), LogLevel.ERROR);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger({
  level: parseLogLevel(process.env.CONTEXT_PRIME_LOG_LEVEL) ?? DEFAULT_LOGGER_CONFIG.level,
});

/**
 * Convenience functions for direct import
 */
export const log = {
  debug: (message: string) => logger.debug(message),
  info: (message: string) => logger.info(message),
  success: (message: string) => logger.success(message),
  warn: (message: string) => logger.warn(message),
  error: (message: string) => logger.error(message),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
