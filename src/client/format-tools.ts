/**
 * format-tools.ts - MCP tools → chat-completion function tools
 *
 * MCP lists a tool as { name, description?, inputSchema }. Chat-completion
 * APIs (OpenAI, Ollama) want { type: "function", function: { name,
 * description, parameters } }. The JSON Schema passes through unchanged.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { ChatCompletionTool } from "./chat-endpoint";

export function formatTool(tool: Tool): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description ?? "",
      parameters: { ...tool.inputSchema },
    },
  };
}

export function formatTools(tools: Tool[]): ChatCompletionTool[] {
  return tools.map(formatTool);
}
