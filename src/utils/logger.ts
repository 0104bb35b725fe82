/**
 * Centralized logging utility for diagnostics
 *
 * NOTE: This logger is NOT for command output. Handlers print results to
 * stdout through `print`; everything here goes to stderr so that output
 * can be piped while diagnostics stay visible.
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
  level: LogLevel.WARN,
  useTimestamps: false,
  useColors: true,
};

/**
 * Map a `LOG_LEVEL` value onto a LogLevel.
 * Accepts the usual spellings (WARNING, CRITICAL) so existing CI variables keep working.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = DEFAULT_LOGGER_CONFIG.level): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
    case 'CRITICAL':
      return LogLevel.ERROR;
    case 'SILENT':
    case 'NONE':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

/**
 * Debug/diagnostic logger that writes to stderr
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
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
      ? chalk.dim(`[${new Date().toISOString()}] `)
      : '';

    process.stderr.write(timestamp + message + '\n');
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

  warn(message: string): void {
    this.write(this.format(message, chalk.yellow), LogLevel.WARN);
  }

  error(message: string): void {
    this.write(this.format(message, chalk.red), LogLevel.ERROR);
  }
}

/**
 * Global logger instance, level taken from `LOG_LEVEL`
 */
export const logger = new Logger({ level: parseLogLevel(process.env.LOG_LEVEL) });

/**
 * Convenience functions for direct import
 */
export const log = {
  debug: (message: string) => logger.debug(message),
  info: (message: string) => logger.info(message),
  warn: (message: string) => logger.warn(message),
  error: (message: string) => logger.error(message),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};

/**
 * Keep enough of a bearer token to tell two tokens apart in a log line.
 */
export function maskToken(value: string, visible: number = 10): string {
  if (value.length <= visible) {
    return '***';
  }
  return value.slice(0, visible) + '...';
}
