/**
 * MCP tool implementations for name grouping
 * Every tool returns a one-line text item plus the same data as structuredContent
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { GROUPING_STRATEGIES, groupingToObject, taskToView } from "@namegroups/sdk";
import {
  GroupNamesInputSchema,
  CreateTaskInputSchema,
  ListTasksInputSchema,
  GetTaskInputSchema,
  MoveNameInputSchema,
} from "./schemas.js";
import type { GroupingTaskService } from "./service/grouping-tasks.js";
import { logger, errorCodeOf } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export type ToolName =
  | "group_names"
  | "create_grouping_task"
  | "list_grouping_tasks"
  | "get_grouping_task"
  | "move_name";

export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

/**
 * Tools that never write to the store
 */
export const READ_ONLY_TOOLS: readonly ToolName[] = [
  "group_names",
  "list_grouping_tasks",
  "get_grouping_task",
];

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly tool: string,
    public readonly timeoutMs: number
  ) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

// Wrap tool execution with timeout, logging, and metrics
export async function executeTool<T>(
  toolName: string,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: unknown;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(toolName, timeoutMs)), timeoutMs);
    });

    const result = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    error = err;
    throw err;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, errorCodeOf(error));
  }
}

/**
 * Build the tool handlers over a service
 */
export function createToolHandlers(service: GroupingTaskService): Record<ToolName, ToolHandler> {
  return {
    /**
     * group_names: Group names without storing them
     */
    async group_names(args) {
      const input = GroupNamesInputSchema.parse(args);

      return executeTool<CallToolResult>("group_names", 2000, async () => {
        const grouping = service.group(input);

        return {
          content: [
            { type: "text", text: `Grouped ${input.names.length} names into ${grouping.size} groups` },
          ],
          structuredContent: { result: groupingToObject(grouping) },
        };
      });
    },

    /**
     * create_grouping_task: Create a task and compute its grouping
     */
    async create_grouping_task(args) {
      const input = CreateTaskInputSchema.parse(args);

      return executeTool<CallToolResult>("create_grouping_task", 5000, async () => {
        const task = await service.create(input);

        return {
          content: [{ type: "text", text: `Created grouping task ${task.id}` }],
          structuredContent: { id: task.id },
        };
      });
    },

    /**
     * list_grouping_tasks: List task IDs (capped)
     */
    async list_grouping_tasks(args) {
      ListTasksInputSchema.parse(args ?? {});

      return executeTool<CallToolResult>("list_grouping_tasks", 2000, async () => {
        const ids = await service.list();

        return {
          content: [{ type: "text", text: `Found ${ids.length} grouping tasks` }],
          structuredContent: { tasks: ids.map((id) => ({ id })), count: ids.length },
        };
      });
    },

    /**
     * get_grouping_task: Retrieve a task view by ID
     */
    async get_grouping_task(args) {
      const { id } = GetTaskInputSchema.parse(args);

      return executeTool<CallToolResult>("get_grouping_task", 2000, async () => {
        const task = await service.get(id);

        return {
          content: [
            { type: "text", text: task ? `Found grouping task ${id}` : `Grouping task ${id} not found` },
          ],
          structuredContent: { task: task ? taskToView(task) : null },
        };
      });
    },

    /**
     * move_name: Move a name from one group of a task to another
     */
    async move_name(args) {
      const input = MoveNameInputSchema.parse(args);

      return executeTool<CallToolResult>("move_name", 5000, async () => {
        const task = await service.move(input.id, {
          name: input.name,
          sourceGroup: input.source_group,
          targetGroup: input.target_group,
          expectedVersion: input.expected_version,
        });

        return {
          content: [
            {
              type: "text",
              text: `Moved '${input.name}' from '${input.source_group}' to '${input.target_group}' (version ${task.version})`,
            },
          ],
          structuredContent: { task: taskToView(task) },
        };
      });
    },
  };
}

const strategyProperty = {
  type: "string",
  enum: [...GROUPING_STRATEGIES],
  description:
    "Grouping strategy: 'first-word' groups by the text before the first delimiter (default); 'prefix-tree' groups by the longest shared word prefix",
};

const namesProperties = {
  names: {
    type: "array",
    items: { type: "string" },
    description: "Names to group (non-empty strings, at least one)",
  },
  delimiter: {
    type: "string",
    description: "Single-character word delimiter (default '_')",
  },
  strategy: strategyProperty,
};

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "group_names",
    description: "Group names by the prefix before the delimiter without storing anything",
    inputSchema: {
      type: "object",
      properties: namesProperties,
      required: ["names"],
    },
  },
  {
    name: "create_grouping_task",
    description: "Create a grouping task; the grouping is computed immediately and the task id returned",
    inputSchema: {
      type: "object",
      properties: namesProperties,
      required: ["names"],
    },
  },
  {
    name: "list_grouping_tasks",
    description: "List grouping task IDs in creation order (capped at 5000)",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
  {
    name: "get_grouping_task",
    description: "Retrieve a grouping task with its current grouping",
    inputSchema: {
      type: "object",
      properties: {
        id: {
          type: "string",
          description: "Task ID",
        },
      },
      required: ["id"],
    },
  },
  {
    name: "move_name",
    description:
      "Move a name from one group of a task to another; the target group is created if missing and an emptied source group is removed",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Task ID" },
        name: { type: "string", description: "Name to move" },
        source_group: { type: "string", description: "Group currently holding the name" },
        target_group: { type: "string", description: "Group to move the name into" },
        expected_version: {
          type: "number",
          description: "Reject the move unless the task is at this version",
        },
      },
      required: ["id", "name", "source_group", "target_group"],
    },
  },
];
