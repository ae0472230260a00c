/**
 * CLI error handling and exit code mapping
 */

import {
  NameNotFoundInGroupError,
  SourceGroupNotFoundError,
  TaskNotFoundError,
  VersionConflictError,
} from "@namegroups/sdk";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;
export const EXIT_MOVE_REJECTED = 3;
export const EXIT_VERSION_CONFLICT = 4;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_FAILURE;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: task not found
 * - 3: move rejected (source group or name not found)
 * - 4: version conflict
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof TaskNotFoundError) {
    return EXIT_NOT_FOUND;
  }

  if (error instanceof SourceGroupNotFoundError || error instanceof NameNotFoundInGroupError) {
    return EXIT_MOVE_REJECTED;
  }

  if (error instanceof VersionConflictError) {
    return EXIT_VERSION_CONFLICT;
  }

  return EXIT_FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
