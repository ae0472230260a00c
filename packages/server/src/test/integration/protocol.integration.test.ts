/**
 * End-to-end MCP protocol tests
 * Connects a real MCP client to the server over an in-memory transport
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { openTaskStore } from "@namegroups/sdk";
import { createTempStoreRoot, removeDir } from "@namegroups/testkit";
import { createMcpServer, SERVER_NAME } from "../../server.js";
import { GroupingTaskService } from "../../service/grouping-tasks.js";

interface Session {
  client: Client;
  close: () => Promise<void>;
}

let testRoot: string;

async function connect(readOnly = false): Promise<Session> {
  const service = new GroupingTaskService(openTaskStore({ root: testRoot }));
  const server = createMcpServer({ service, readOnly });
  const client = new Client({ name: "test-client", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  testRoot = await createTempStoreRoot();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await removeDir(testRoot);
});

describe("MCP protocol", () => {
  it("should identify itself and list every tool", async () => {
    const { client, close } = await connect();

    try {
      expect(client.getServerVersion()?.name).toBe(SERVER_NAME);
      const { tools } = await client.listTools();
      expect(tools.map((t) => t.name)).toEqual([
        "group_names",
        "create_grouping_task",
        "list_grouping_tasks",
        "get_grouping_task",
        "move_name",
      ]);
    } finally {
      await close();
    }
  });

  it("should run a create, move and get round trip", async () => {
    const { client, close } = await connect();

    try {
      const created = await client.callTool({
        name: "create_grouping_task",
        arguments: { names: ["foo", "foo-bar", "foo-baz", "xyz"], delimiter: "-" },
      });
      const { id } = z.object({ id: z.string() }).parse(created.structuredContent);

      await client.callTool({
        name: "move_name",
        arguments: { id, name: "foo-bar", source_group: "foo", target_group: "xyz" },
      });

      const fetched = await client.callTool({ name: "get_grouping_task", arguments: { id } });
      expect(fetched.structuredContent).toMatchObject({
        task: { id, version: 2, result: { foo: ["foo", "foo-baz"], xyz: ["xyz", "foo-bar"] } },
      });
    } finally {
      await close();
    }
  });

  it("should map errors to MCP error codes", async () => {
    const { client, close } = await connect();

    try {
      await expect(
        client.callTool({ name: "group_names", arguments: { names: [] } })
      ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });

      await expect(
        client.callTool({
          name: "move_name",
          arguments: { id: "missing-task", name: "a", source_group: "a", target_group: "b" },
        })
      ).rejects.toMatchObject({ code: ErrorCode.InvalidRequest });

      const created = await client.callTool({ name: "create_grouping_task", arguments: { names: ["a_1"] } });
      const { id } = z.object({ id: z.string() }).parse(created.structuredContent);
      await expect(
        client.callTool({
          name: "move_name",
          arguments: { id, name: "a_2", source_group: "a", target_group: "b" },
        })
      ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });

      await expect(client.callTool({ name: "drop_table", arguments: {} })).rejects.toMatchObject({
        code: ErrorCode.MethodNotFound,
      });
    } finally {
      await close();
    }
  });

  it("should hide and refuse writing tools in read-only mode", async () => {
    const { client, close } = await connect(true);

    try {
      const { tools } = await client.listTools();
      expect(tools.map((t) => t.name)).toEqual(["group_names", "list_grouping_tasks", "get_grouping_task"]);

      await expect(
        client.callTool({ name: "create_grouping_task", arguments: { names: ["a"] } })
      ).rejects.toMatchObject({ code: ErrorCode.InvalidRequest });

      const grouped = await client.callTool({ name: "group_names", arguments: { names: ["a_1", "a_2"] } });
      expect(grouped.structuredContent).toEqual({ result: { a: ["a_1", "a_2"] } });
    } finally {
      await close();
    }
  });
});
