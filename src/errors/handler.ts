/**
 * Error handler for CLI error formatting and display
 *
 * - Colored output for the terminal
 * - JSON output for scripts (--json)
 * - Stack traces with --verbose
 */

import chalk from 'chalk';
import { CLIError, LLMRequestError } from './types.js';

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
  /** HTTP status of a failed model request */
  status?: number;
  stack?: string;
}

function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      status: error instanceof LLMRequestError ? error.status : undefined,
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
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + output.error];

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  } else if (error instanceof Error && !(error instanceof CLIError) && !verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (output.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error. CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format an error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level events.
 *
 *   process.on('uncaughtException', createGlobalErrorHandler({ verbose: true }));
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
