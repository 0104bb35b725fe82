/**
 * Centralized error handler for the CLI boundary
 * Every command failure ends up here, is printed to stderr and turned into an exit code
 */

import chalk from 'chalk';
import { ApiError } from '../api/errors.js';
import { AuthError } from '../auth/errors.js';
import { LogLevel, logger } from './logger.js';

export interface ErrorHandlingOptions {
  /** Whether to include full stack trace */
  includeStack?: boolean;
  /** Custom context message */
  context?: string;
  /** Whether to exit the process (default: false) */
  exitProcess?: boolean;
  /** Exit code (default: 1) */
  exitCode?: number;
  /** Whether to suppress output */
  silent?: boolean;
}

/**
 * Error raised by command handlers for bad input that never reached the API
 */
export class HandledError extends Error {
  constructor(
    message: string,
    public readonly context?: string,
    public readonly originalError?: unknown
  ) {
    super(message, { cause: originalError });
    this.name = 'HandledError';
  }
}

export class ErrorHandler {
  /**
   * Short label naming what went wrong: the AuthError reason, the ApiError kind and status.
   */
  static describe(error: unknown): string | undefined {
    if (error instanceof AuthError) {
      return `Authentication failed (${error.reason})`;
    }
    if (error instanceof ApiError) {
      return error.status !== undefined
        ? `API request failed (${error.kind}, HTTP ${error.status})`
        : `API request failed (${error.kind})`;
    }
    return undefined;
  }

  static formatError(error: unknown, options: ErrorHandlingOptions = {}): string {
    const output: string[] = [];

    if (options.context) {
      output.push(chalk.red.bold(`Error in ${options.context}:`));
    }

    const label = this.describe(error);
    const message = this.getErrorMessage(error);
    output.push(chalk.red(label ? `${label}: ${message}` : message));

    const stackTrace = this.getStackTrace(error);
    if (options.includeStack && stackTrace) {
      output.push('');
      output.push(chalk.dim('Stack trace:'));
      output.push(chalk.gray(stackTrace));
    }

    output.push('');
    return output.join('\n');
  }

  /**
   * Print an error to stderr and optionally exit
   */
  static handle(error: unknown, options: ErrorHandlingOptions = {}): void {
    const {
      includeStack = isDebugEnabled(),
      exitProcess = false,
      exitCode = 1,
      silent = false,
    } = options;

    if (!silent) {
      process.stderr.write(this.formatError(error, { ...options, includeStack }));
      if (logger.shouldLog(LogLevel.DEBUG) && error instanceof Error && error.cause !== undefined) {
        logger.debug(`Caused by: ${this.getErrorMessage(error.cause)}`);
      }
    }

    if (exitProcess) {
      process.exit(exitCode);
    }
  }

  /**
   * Extract error message safely
   */
  static getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  /**
   * Extract stack trace safely
   */
  static getStackTrace(error: unknown): string | undefined {
    if (error instanceof Error) {
      return error.stack;
    }
    return undefined;
  }
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === 'development' || !!env.DEBUG || logger.getLevel() === LogLevel.DEBUG;
}

/**
 * Convenience function for quick error handling
 */
export function handleError(error: unknown, options?: ErrorHandlingOptions): void {
  ErrorHandler.handle(error, options);
}
