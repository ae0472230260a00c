/**
 * Mapping of thrown errors to MCP error codes
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  LockTimeoutError,
  NameNotFoundInGroupError,
  SourceGroupNotFoundError,
  TaskNotFoundError,
  ValidationError,
  VersionConflictError,
} from "@namegroups/sdk";
import { errorCodeOf } from "./observability/logger.js";
import { ToolTimeoutError } from "./tools.js";

export interface McpErrorShape {
  code: number;
  message: string;
}

export function mapErrorToMcp(error: unknown): McpErrorShape {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    };
  }

  if (error instanceof ValidationError) {
    return { code: ErrorCode.InvalidParams, message: error.message };
  }

  if (error instanceof SourceGroupNotFoundError || error instanceof NameNotFoundInGroupError) {
    // The move named a group or name that is not there
    return { code: ErrorCode.InvalidParams, message: `${error.field}: ${error.message}` };
  }

  if (error instanceof TaskNotFoundError) {
    return { code: ErrorCode.InvalidRequest, message: error.message };
  }

  if (error instanceof VersionConflictError) {
    return { code: ErrorCode.InvalidRequest, message: error.message };
  }

  if (error instanceof ToolTimeoutError || error instanceof LockTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof Error) {
    const errCode = errorCodeOf(error);
    if (errCode === "EACCES" || errCode === "EPERM") {
      return { code: ErrorCode.InternalError, message: `Permission denied: ${error.message}` };
    }

    return { code: ErrorCode.InternalError, message: error.message };
  }

  return { code: ErrorCode.InternalError, message: String(error) };
}
