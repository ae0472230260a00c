/**
 * MCP server for name grouping
 * Exposes grouping and grouping tasks as MCP tools
 *
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { createToolHandlers, toolDefinitions, READ_ONLY_TOOLS } from "./tools.js";
import type { ToolHandler, ToolName } from "./tools.js";
import type { GroupingTaskService } from "./service/grouping-tasks.js";
import { mapErrorToMcp } from "./errors.js";
import { logger, errorCodeOf } from "./observability/logger.js";

export const SERVER_NAME = "namegroups-server";
export const SERVER_VERSION = "0.1.0";

export interface McpServerOptions {
  service: GroupingTaskService;
  /** Expose only tools that do not write to the store */
  readOnly?: boolean;
}

export { createGroupingTaskService, GroupingTaskService } from "./service/grouping-tasks.js";
export { mapErrorToMcp } from "./errors.js";

/**
 * Create and configure the MCP server (not yet connected to a transport)
 */
export function createMcpServer({ service, readOnly = false }: McpServerOptions): Server {
  const handlers = createToolHandlers(service);
  const isAllowed = (name: string): boolean =>
    !readOnly || READ_ONLY_TOOLS.some((tool) => tool === name);
  const findHandler = (name: string): ToolHandler | undefined => {
    const entry = Object.entries(handlers).find(([tool]) => tool === name);
    return entry?.[1];
  };

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: toolDefinitions.filter((t) => isAllowed(t.name)) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isAllowed(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }

      const handler = findHandler(name);
      if (!handler) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      return await handler(args);
    } catch (error) {
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCodeOf(error),
        err_message: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}

export type { ToolName };
