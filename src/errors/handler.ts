/**
 * Error formatting and process-level handling for the CLI.
 *
 * Formatting is kept separate from exiting so it can be tested without
 * process.exit.
 */

import chalk from 'chalk';
import { DocentError } from './types.js';

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
  name: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Format an error for display on stderr.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (error instanceof Error) {
    const hint =
      error instanceof DocentError
        ? error.hint
        : verbose
          ? undefined
          : 'Run with --verbose for more details';

    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        name: error.name,
        code: getExitCode(error),
        hint: error instanceof DocentError ? error.hint : undefined,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [chalk.red('Error: ') + error.message];
    if (hint) {
      lines.push(chalk.dim('Hint: ') + hint);
    }
    if (verbose && error.stack) {
      lines.push('', chalk.dim('Stack trace:'), chalk.dim(error.stack));
    }
    return lines.join('\n');
  }

  // Strings, numbers and other thrown values
  if (json) {
    return JSON.stringify({ error: String(error), name: 'Error', code: 1 }, null, 2);
  }
  return chalk.red('Error: ') + String(error);
}

/**
 * DocentError carries its own exit code; everything else exits with 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof DocentError ? error.code : 1;
}

/**
 * Print the formatted error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler suitable for `uncaughtException` / `unhandledRejection`.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
