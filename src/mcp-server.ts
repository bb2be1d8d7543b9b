#!/usr/bin/env node
/**
 * mcp-server.ts - Tool server entry point
 *
 * The tool client spawns this process and talks MCP (JSON-RPC) over its
 * stdin/stdout. stdout is reserved for the protocol, so all logging goes to
 * stderr.
 *
 * Steps:
 * 1. Initialize tracing (opt-in, stdout-safe exporters only)
 * 2. Build the kubectl tool registry and the MCP server around it
 * 3. Connect the stdio transport and serve until the client disconnects
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { initializeTracing, flushTracing } from "./tracing";
import { createToolRegistry } from "./tools/registry";
import { createToolServer } from "./tools/mcp";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  initializeTracing({ stdoutReserved: true });

  const registry = createToolRegistry();
  const server = createToolServer(registry);

  server.onclose = () => {
    flushTracing().catch((error) => logger.error("Failed to flush traces", error));
  };

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(
    `kubectl tool server running on stdio (${registry.listTools().length} tools)`
  );
}

main().catch((error) => {
  logger.error("Tool server error", error);
  process.exit(1);
});
