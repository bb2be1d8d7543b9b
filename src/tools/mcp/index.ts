/**
 * MCP wiring for the kubectl tool server
 *
 * Uses the SDK's low-level Server with explicit tools/list and tools/call
 * handlers, so every outcome of callTool (including unknown tools and bad
 * arguments) reaches the client as a regular tool result with isError set,
 * rather than as a protocol error.
 *
 * Failed results carry the error kind in _meta so the client can rebuild
 * the typed error:
 *
 *   { content: [{ type: "text", text: "Unknown tool: ..." }],
 *     isError: true,
 *     _meta: { errorKind: "unknown_tool" } }
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { toInputSchema } from "../schema";
import type { ToolRegistry } from "../registry";
import type { ToolDescriptor, ToolInvocationResult } from "../types";

export const SERVER_NAME = "kubectl-toolbridge";
export const SERVER_VERSION = "0.1.0";

/** _meta key carrying the ToolErrorKind of a failed result. */
export const ERROR_KIND_META_KEY = "errorKind";

const SERVER_INSTRUCTIONS =
  "This server provides read-only Kubernetes cluster administration tools backed by kubectl.";

export function toMcpTool(descriptor: ToolDescriptor): Tool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    inputSchema: toInputSchema(descriptor),
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
    },
  };
}

export function toCallToolResult(result: ToolInvocationResult): CallToolResult {
  if (result.success) {
    return { content: [{ type: "text", text: result.output }] };
  }
  return {
    content: [{ type: "text", text: result.error.message }],
    isError: true,
    _meta: { [ERROR_KIND_META_KEY]: result.error.kind },
  };
}

/**
 * Creates an MCP server exposing the registry's tools. The caller connects
 * it to a transport.
 */
export function createToolServer(registry: ToolRegistry): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: {} },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.listTools().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await registry.callTool(
      request.params.name,
      request.params.arguments ?? {}
    );
    return toCallToolResult(result);
  });

  return server;
}
