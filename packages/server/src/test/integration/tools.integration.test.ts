/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against a real store
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { z } from "zod";
import { openTaskStore, SourceGroupNotFoundError, VersionConflictError } from "@namegroups/sdk";
import { createTempStoreRoot, removeDir, fixedClock } from "@namegroups/testkit";
import { createToolHandlers, executeTool, ToolTimeoutError } from "../../tools.js";
import type { ToolHandler, ToolName } from "../../tools.js";
import { GroupingTaskService } from "../../service/grouping-tasks.js";
import { metrics } from "../../observability/metrics.js";

const NOW = "2026-02-03T04:05:06.000Z";

const CreatedSchema = z.object({ id: z.string() });

let testRoot: string;
let tools: Record<ToolName, ToolHandler>;

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  metrics.reset();
  testRoot = await createTempStoreRoot();
  const service = new GroupingTaskService(openTaskStore({ root: testRoot, clock: fixedClock(NOW) }));
  await service.init();
  tools = createToolHandlers(service);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await removeDir(testRoot);
});

async function createTask(names: string[], delimiter = "-"): Promise<string> {
  const result = await tools.create_grouping_task({ names, delimiter });
  return CreatedSchema.parse(result.structuredContent).id;
}

describe("Tool integration tests", () => {
  describe("group_names", () => {
    it("should group names without storing them", async () => {
      const result = await tools.group_names({ names: ["foo", "foo-bar", "foo-baz", "xyz"], delimiter: "-" });

      expect(result.content).toEqual([{ type: "text", text: "Grouped 4 names into 2 groups" }]);
      expect(result.structuredContent).toEqual({
        result: { foo: ["foo", "foo-bar", "foo-baz"], xyz: ["xyz"] },
      });

      const listed = await tools.list_grouping_tasks({});
      expect(listed.structuredContent).toEqual({ tasks: [], count: 0 });
    });

    it("should default to the underscore delimiter", async () => {
      const result = await tools.group_names({ names: ["order_id", "order_total", "currency"] });

      expect(result.structuredContent).toEqual({
        result: { order: ["order_id", "order_total"], currency: ["currency"] },
      });
    });

    it("should support the prefix-tree strategy", async () => {
      const result = await tools.group_names({
        names: ["app", "app_db_host", "app_db_port"],
        strategy: "prefix-tree",
      });

      expect(result.structuredContent).toEqual({
        result: { app_db: ["app_db_host", "app_db_port"], app: ["app"] },
      });
    });

    it("should reject invalid input before running", async () => {
      await expect(tools.group_names({ names: [] })).rejects.toBeInstanceOf(z.ZodError);
      expect(metrics.getCounter("namegroups.tool.calls_total", { tool: "group_names" })).toBe(0);
    });
  });

  describe("create_grouping_task and get_grouping_task", () => {
    it("should create a task and return its view", async () => {
      const id = await createTask(["foo", "foo-bar", "foo-baz", "xyz"]);

      const result = await tools.get_grouping_task({ id });

      expect(result.content).toEqual([{ type: "text", text: `Found grouping task ${id}` }]);
      expect(result.structuredContent).toEqual({
        task: {
          id,
          result: { foo: ["foo", "foo-bar", "foo-baz"], xyz: ["xyz"] },
          createdAt: NOW,
          completedAt: NOW,
          updatedAt: NOW,
          version: 1,
        },
      });
    });

    it("should return null for an unknown task", async () => {
      const result = await tools.get_grouping_task({ id: "missing-task" });

      expect(result.content).toEqual([{ type: "text", text: "Grouping task missing-task not found" }]);
      expect(result.structuredContent).toEqual({ task: null });
    });

    it("should reject unsafe ids", async () => {
      await expect(tools.get_grouping_task({ id: "../escape" })).rejects.toBeInstanceOf(z.ZodError);
    });
  });

  describe("list_grouping_tasks", () => {
    it("should list created tasks", async () => {
      const first = await createTask(["a"]);
      const second = await createTask(["b"]);

      const result = await tools.list_grouping_tasks(undefined);
      const listed = z
        .object({ tasks: z.array(z.object({ id: z.string() })), count: z.number() })
        .parse(result.structuredContent);

      expect(listed.count).toBe(2);
      expect(listed.tasks.map((t) => t.id).sort()).toEqual([first, second].sort());
    });
  });

  describe("move_name", () => {
    it("should move a name and bump the version", async () => {
      const id = await createTask(["foo", "foo-bar", "foo-baz", "xyz"]);

      const result = await tools.move_name({ id, name: "xyz", source_group: "xyz", target_group: "foo" });

      expect(result.content).toEqual([
        { type: "text", text: "Moved 'xyz' from 'xyz' to 'foo' (version 2)" },
      ]);
      expect(result.structuredContent).toEqual({
        task: {
          id,
          result: { foo: ["foo", "foo-bar", "foo-baz", "xyz"] },
          createdAt: NOW,
          completedAt: NOW,
          updatedAt: NOW,
          version: 2,
        },
      });
    });

    it("should create the target group", async () => {
      const id = await createTask(["foo", "foo-bar"]);

      const result = await tools.move_name({ id, name: "foo-bar", source_group: "foo", target_group: "bar" });

      expect(result.structuredContent).toMatchObject({
        task: { result: { foo: ["foo"], bar: ["foo-bar"] } },
      });
    });

    it("should surface rejected moves and record the error", async () => {
      const id = await createTask(["foo", "xyz"]);

      await expect(
        tools.move_name({ id, name: "xyz", source_group: "nope", target_group: "foo" })
      ).rejects.toBeInstanceOf(SourceGroupNotFoundError);
      expect(
        metrics.getCounter("namegroups.tool.errors_total", {
          tool: "move_name",
          err_code: "SOURCE_GROUP_NOT_FOUND",
        })
      ).toBe(1);
    });

    it("should reject stale versions", async () => {
      const id = await createTask(["a-1", "b-1"]);
      await tools.move_name({ id, name: "a-1", source_group: "a", target_group: "b", expected_version: 1 });

      await expect(
        tools.move_name({ id, name: "b-1", source_group: "b", target_group: "a", expected_version: 1 })
      ).rejects.toBeInstanceOf(VersionConflictError);
    });
  });
});

describe("executeTool", () => {
  it("should time out slow handlers", async () => {
    const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 200));

    await expect(executeTool("slow_tool", 10, slow)).rejects.toBeInstanceOf(ToolTimeoutError);
    expect(metrics.getCounter("namegroups.tool.errors_total", { tool: "slow_tool", err_code: "ETIMEDOUT" })).toBe(1);
  });

  it("should return the handler result and record latency", async () => {
    await expect(executeTool("fast_tool", 1000, async () => 42)).resolves.toBe(42);
    expect(metrics.getHistogram("namegroups.tool.latency_ms", { tool: "fast_tool" })?.count).toBe(1);
  });
});
