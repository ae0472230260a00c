#!/usr/bin/env node

/**
 * Stdio entry point of the MCP server
 *
 * Environment:
 * - DATA_ROOT: store root (default ./data)
 * - NAMEGROUPS_READONLY=true: expose read-only tools only
 * - NAMEGROUPS_ENABLED=false: exit immediately
 * - LOG_LEVEL: debug | info | warn | error
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "./server.js";
import { createGroupingTaskService } from "./service/grouping-tasks.js";
import { logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";

async function main(): Promise<void> {
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const readOnly = process.env.NAMEGROUPS_READONLY === "true";
  const enabled = process.env.NAMEGROUPS_ENABLED !== "false";

  if (!enabled) {
    console.error("Name Groups MCP server is disabled (NAMEGROUPS_ENABLED=false)");
    process.exit(0);
  }

  const service = createGroupingTaskService();
  await service.init();

  const server = createMcpServer({ service, readOnly });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: readOnly ? "readonly" : "readwrite",
    data_root: service.dataRoot,
  });

  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", { metrics: metrics.getAllMetrics() });
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown_failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
