/**
 * Error types for Name Groups operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Client-input errors name the request `field` they refer to
 */

import type { ValidationIssue } from "./types.js";

/**
 * Base class for all Name Groups errors
 */
export abstract class NameGroupsError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a move references a group that is not in the grouping
 */
export class SourceGroupNotFoundError extends NameGroupsError {
  readonly code = "SOURCE_GROUP_NOT_FOUND";
  readonly field = "source_group";

  constructor(
    public readonly group: string,
    options?: ErrorOptions
  ) {
    super(`Group not found: ${group}.`, options);
  }
}

/**
 * Thrown when a move references a name that is not in the source group
 */
export class NameNotFoundInGroupError extends NameGroupsError {
  readonly code = "NAME_NOT_FOUND_IN_GROUP";
  readonly field = "name";

  constructor(
    public readonly movedName: string,
    public readonly group: string,
    options?: ErrorOptions
  ) {
    super(`'${movedName}' not found in group '${group}'.`, options);
  }
}

/**
 * Thrown when input breaks the input constraints
 */
export class ValidationError extends NameGroupsError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    super(
      `Validation failed: ${issues.map((i) => `${i.pointer || "/"}: ${i.message}`).join("; ")}`,
      options
    );
  }
}

/**
 * Thrown when a grouping task cannot be found
 */
export class TaskNotFoundError extends NameGroupsError {
  readonly code = "ENOENT";

  constructor(
    public readonly taskId: string,
    options?: ErrorOptions
  ) {
    super(`Grouping task not found: ${taskId}`, options);
  }
}

/**
 * Thrown when a task file cannot be read or parsed
 */
export class TaskReadError extends NameGroupsError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read grouping task: ${filePath}`, options);
  }
}

/**
 * Thrown when a task file write fails
 */
export class TaskWriteError extends NameGroupsError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write grouping task: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends NameGroupsError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends NameGroupsError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when a move was made against a stale version of a task
 */
export class VersionConflictError extends NameGroupsError {
  readonly code = "VERSION_CONFLICT";

  constructor(
    public readonly taskId: string,
    public readonly expected: number,
    public readonly actual: number,
    options?: ErrorOptions
  ) {
    super(
      `Grouping task ${taskId} is at version ${actual}, expected ${expected}. Re-fetch the task and retry.`,
      options
    );
  }
}

/**
 * Thrown when a task lock cannot be acquired in time
 */
export class LockTimeoutError extends NameGroupsError {
  readonly code = "ETIMEDOUT";

  constructor(lockPath: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `This may indicate a stale lock from a crashed process - ` +
        `manually delete the lock file if safe.`,
      options
    );
  }
}
