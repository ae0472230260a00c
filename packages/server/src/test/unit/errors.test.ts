/**
 * Unit tests for MCP error mapping
 */

import { describe, it, expect } from "vitest";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import {
  LockTimeoutError,
  NameNotFoundInGroupError,
  SourceGroupNotFoundError,
  TaskNotFoundError,
  ValidationError,
  VersionConflictError,
} from "@namegroups/sdk";
import { mapErrorToMcp } from "../../errors.js";
import { ToolTimeoutError } from "../../tools.js";
import { GetTaskInputSchema } from "../../schemas.js";

describe("mapErrorToMcp", () => {
  it("should map zod errors to InvalidParams with field paths", () => {
    const result = GetTaskInputSchema.safeParse({});
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(mapErrorToMcp(result.error)).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Validation error: id: Required",
    });
  });

  it("should map SDK validation errors to InvalidParams", () => {
    const error = new ValidationError([{ code: "minLength", pointer: "/names", message: "too short" }]);

    expect(mapErrorToMcp(error)).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Validation failed: /names: too short",
    });
  });

  it("should map rejected moves to InvalidParams naming the field", () => {
    expect(mapErrorToMcp(new SourceGroupNotFoundError("nope"))).toEqual({
      code: ErrorCode.InvalidParams,
      message: "source_group: Group not found: nope.",
    });
    expect(mapErrorToMcp(new NameNotFoundInGroupError("xyz", "foo"))).toEqual({
      code: ErrorCode.InvalidParams,
      message: "name: 'xyz' not found in group 'foo'.",
    });
  });

  it("should map missing tasks and version conflicts to InvalidRequest", () => {
    expect(mapErrorToMcp(new TaskNotFoundError("task-1"))).toEqual({
      code: ErrorCode.InvalidRequest,
      message: "Grouping task not found: task-1",
    });
    expect(mapErrorToMcp(new VersionConflictError("task-1", 1, 2)).code).toBe(ErrorCode.InvalidRequest);
  });

  it("should map timeouts to RequestTimeout", () => {
    expect(mapErrorToMcp(new ToolTimeoutError("move_name", 5000))).toEqual({
      code: ErrorCode.RequestTimeout,
      message: "Tool execution timeout after 5000ms",
    });
    expect(mapErrorToMcp(new LockTimeoutError("/tmp/x.lock", 100)).code).toBe(ErrorCode.RequestTimeout);
  });

  it("should report permission errors as internal errors", () => {
    const error = Object.assign(new Error("open failed"), { code: "EACCES" });

    expect(mapErrorToMcp(error)).toEqual({
      code: ErrorCode.InternalError,
      message: "Permission denied: open failed",
    });
  });

  it("should map anything else to InternalError", () => {
    expect(mapErrorToMcp(new Error("boom"))).toEqual({ code: ErrorCode.InternalError, message: "boom" });
    expect(mapErrorToMcp("plain string")).toEqual({ code: ErrorCode.InternalError, message: "plain string" });
  });
});
