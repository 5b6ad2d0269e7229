/**
 * CLI error handling and exit code mapping
 */

import { RecordNotFoundError, ScopeNotFoundError } from "@stoneward/sdk";

export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: nothing matched, unknown scope or record
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof ScopeNotFoundError || error instanceof RecordNotFoundError) {
    return 2;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  let message = error.message;

  if (verbose && error.cause !== undefined) {
    const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    message += `\n  Cause: ${cause}`;
  }

  if (verbose && error.stack) {
    message += `\n${error.stack}`;
  }

  return message;
}
