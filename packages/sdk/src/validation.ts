/**
 * Input constraints for task creation and moves
 *
 * Checks return a structured result instead of throwing so that transports
 * can report every failing field at once; `assertValid` turns a failed
 * result into a ValidationError.
 */

import { z } from "zod";
import type {
  GroupingTaskInput,
  MoveNameRequest,
  ValidationIssue,
  ValidationIssueCode,
  ValidationResult,
} from "./types.js";
import { DEFAULT_DELIMITER } from "./grouper.js";
import { DEFAULT_STRATEGY, GROUPING_STRATEGIES } from "./strategies.js";
import { ValidationError } from "./errors.js";

/**
 * Upper bound on names in a single task
 */
export const MAX_NAMES = 10_000;

/**
 * Valid task IDs: alphanumeric runs joined by single dots, dashes or underscores
 */
const TASK_ID_PATTERN = /^[A-Za-z0-9]+(?:[._-][A-Za-z0-9]+)*$/;

export const TaskInputSchema = z.object({
  names: z
    .array(z.string().min(1, "names must be non-empty strings"))
    .min(1, "names must contain at least one name")
    .max(MAX_NAMES, `names cannot contain more than ${MAX_NAMES} entries`),
  delimiter: z
    .string()
    .length(1, "delimiter must be exactly one character")
    .default(DEFAULT_DELIMITER),
  strategy: z.enum(GROUPING_STRATEGIES).default(DEFAULT_STRATEGY),
});

export const MoveRequestSchema = z.object({
  name: z.string().min(1, "name must be a non-empty string"),
  // "" is a legitimate group key (a name that starts with the delimiter)
  sourceGroup: z.string(),
  targetGroup: z.string(),
  expectedVersion: z.number().int().positive().optional(),
});

/**
 * Escape a path segment for use in a JSON Pointer (RFC 6901)
 */
function escapePointerSegment(segment: string | number): string {
  return String(segment).replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Map a zod issue to a ValidationIssueCode
 */
function mapIssueCode(issue: z.ZodIssue): ValidationIssueCode {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return issue.received === "undefined" ? "required" : "type";
    case z.ZodIssueCode.too_small:
      return issue.type === "number" ? "minimum" : "minLength";
    case z.ZodIssueCode.too_big:
      return issue.type === "number" ? "maximum" : "maxLength";
    case z.ZodIssueCode.invalid_enum_value:
      return "enum";
    default:
      return "custom";
  }
}

/**
 * Normalize zod issues to ValidationIssue format
 */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    code: mapIssueCode(issue),
    pointer: issue.path.map((segment) => `/${escapePointerSegment(segment)}`).join(""),
    message: issue.message,
  }));
}

function check<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): ValidationResult<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return { ok: true, value: parsed.data, errors: [] };
  }
  return { ok: false, errors: toValidationIssues(parsed.error) };
}

/**
 * Check the input of a new grouping task
 * Applies the default delimiter ("_") and strategy ("first-word")
 */
export function checkTaskInput(value: unknown): ValidationResult<GroupingTaskInput> {
  return check(TaskInputSchema, value);
}

/**
 * Check a move request
 */
export function checkMoveRequest(value: unknown): ValidationResult<MoveNameRequest> {
  return check(MoveRequestSchema, value);
}

/**
 * Unwrap a check result
 * @throws {ValidationError} If the check failed
 */
export function assertValid<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw new ValidationError(result.errors);
  }
  return result.value;
}

/**
 * Validate a task ID
 * @throws {ValidationError} If the ID is empty or contains unsafe characters
 */
export function validateTaskId(id: string): void {
  if (!TASK_ID_PATTERN.test(id)) {
    throw new ValidationError([
      {
        code: "custom",
        pointer: "/id",
        message: `id must start with alphanumeric and contain only letters, numbers, dots, underscores, and hyphens: "${id}"`,
      },
    ]);
  }
}
