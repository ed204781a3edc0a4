/**
 * Centralized error handling for the CLI entry point and commands
 */

import chalk from 'chalk';
import { z } from 'zod';

export interface ErrorHandlingOptions {
  /** Whether to include full stack trace */
  includeStack?: boolean;
  /** Custom context message */
  context?: string;
  /** Whether to exit the process (default: false) */
  exitProcess?: boolean;
  /** Exit code (default: 1) */
  exitCode?: number;
}

/**
 * Enhanced Error class with additional context
 */
export class HandledError extends Error {
  constructor(
    message: string,
    public readonly context?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'HandledError';
  }
}

/**
 * Caller input that can never produce a meaningful result (threshold outside
 * [0, 1], negative budget, ...). Not recoverable at runtime.
 */
export class ValidationError extends HandledError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    context?: string
  ) {
    super(message, context);
    this.name = 'ValidationError';
  }

  static fromZod(error: z.ZodError, context: string): ValidationError {
    const issues = error.errors.map((issue) => {
      const field = issue.path.join('.') || '(root)';
      return `${field}: ${issue.message}`;
    });
    return new ValidationError(`Invalid ${context}:\n  - ${issues.join('\n  - ')}`, issues, context);
  }
}

/**
 * Parse `value` with `schema`, rethrowing zod failures as ValidationError.
 */
export function validateWith<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZod(result.error, context);
  }
  return result.data;
}

export class ErrorHandler {
  private static formatError(error: unknown, options: ErrorHandlingOptions): string {
    const output: string[] = [];

    if (options.context) {
      output.push(chalk.red.bold(`Error in ${options.context}:`));
    }

    output.push(chalk.red(this.getErrorMessage(error)));

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
   * Handle an error with consistent logging and optional stack trace
   */
  static handle(error: unknown, options: ErrorHandlingOptions = {}): void {
    const {
      includeStack = process.env.NODE_ENV === 'development' || Boolean(process.env.DEBUG),
      context,
      exitProcess = false,
      exitCode = 1,
    } = options;

    process.stderr.write(this.formatError(error, { includeStack, context }));

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

  static getStackTrace(error: unknown): string | undefined {
    if (error instanceof Error) {
      return error.stack;
    }
    return undefined;
  }
}

/**
 * Convenience function for quick error handling
 */
export function handleError(error: unknown, options?: ErrorHandlingOptions): void {
  ErrorHandler.handle(error, options);
}
