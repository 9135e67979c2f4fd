/**
 * Error handler for CLI error formatting and display
 *
 * Coloured text for terminals, JSON under --json, stack traces under
 * --verbose.
 */

import chalk from 'chalk';
import { CLIError, ValidationError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  issues?: string[];
  stack?: string;
}

function toOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    const issues = error instanceof ValidationError && error.issues.length > 0 ? error.issues : undefined;
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      issues,
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return {
      error: error.message,
      code: 1,
      stack: verbose ? error.stack : undefined,
    };
  }
  return { error: String(error), code: 1 };
}

/**
 * Format an error for display without printing or exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  } else if (error instanceof Error && !verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * CLIError carries its own exit code; everything else exits with 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the formatted error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Build a handler for `uncaughtException` / `unhandledRejection`.
 *
 * Options are read lazily so that flags parsed after the handler is
 * attached (--verbose, --json) still apply.
 */
export function createGlobalErrorHandler(
  getOptions: () => ErrorHandlerOptions = () => ({})
): (error: unknown) => never {
  return (error: unknown) => handleError(error, getOptions());
}
