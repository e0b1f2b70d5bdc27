/**
 * CLI error handling and exit code mapping
 */

import { DaybookError } from "@daybook/core";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/config/IO/build error
 * - 2: document not found (a CliError raised by `show`)
 */
export function mapErrorToExitCode(error: unknown): number {
  return error instanceof CliError ? error.exitCode : 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error instanceof DaybookError) {
      message = `[${error.code}] ${message}`;
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
