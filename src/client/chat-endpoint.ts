/**
 * chat-endpoint.ts - The chat-completion model that picks a tool
 *
 * Any OpenAI-compatible /chat/completions endpoint works: a local Ollama
 * (the default), vLLM, llama.cpp's server, or OpenAI itself. LangChain's
 * ChatOpenAI does the HTTP; the tools are bound in OpenAI "function" format.
 *
 * The endpoint address is part of the config handed to the constructor, not
 * a process-wide setting.
 *
 * Failures (connection refused, non-2xx status, timeout) become a
 * ModelEndpointError. maxRetries is 0: nothing here retries.
 */

import { ChatOpenAI } from "@langchain/openai";
import type { AIMessage, BaseMessage, MessageContent } from "@langchain/core/messages";
import { ModelEndpointError, errorMessage } from "../errors";
import type { ToolInvocationRequest } from "../tools/types";
import type { ToolBridgeConfig } from "../config";

/**
 * A tool in chat-completion "function" calling format.
 */
export interface ChatCompletionTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/**
 * A tool call the model emitted but that could not be parsed (usually
 * arguments that are not valid JSON).
 */
export interface MalformedToolCall {
  name?: string;
  error: string;
}

export interface ModelResponse {
  /** Plain-text part of the reply; "" when the model only called a tool. */
  content: string;
  toolCalls: ToolInvocationRequest[];
  invalidToolCalls: MalformedToolCall[];
}

/**
 * Anything that can answer a conversation given a tool list.
 * The round trip only depends on this, so tests use an in-process fake.
 */
export interface ChatEndpoint {
  complete(messages: BaseMessage[], tools: ChatCompletionTool[]): Promise<ModelResponse>;
}

/**
 * Joins the text blocks of a message's content.
 */
export function extractText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  let text = "";
  for (const block of content) {
    if (typeof block === "object" && block !== null && "type" in block) {
      if (block.type === "text" && "text" in block) {
        text += String(block.text);
      }
    }
  }
  return text;
}

export function toModelResponse(
  message: Pick<AIMessage, "content" | "tool_calls" | "invalid_tool_calls">
): ModelResponse {
  return {
    content: extractText(message.content),
    toolCalls: (message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.name,
      arguments: call.args,
    })),
    invalidToolCalls: (message.invalid_tool_calls ?? []).map((call) => ({
      name: call.name,
      error: call.error ?? "unparseable tool call",
    })),
  };
}

export class OpenAIChatEndpoint implements ChatEndpoint {
  private readonly model: ChatOpenAI;
  private readonly baseUrl: string;

  constructor(model: ToolBridgeConfig["model"], timeoutMs: number) {
    this.baseUrl = model.baseUrl;
    this.model = new ChatOpenAI({
      model: model.name,
      apiKey: model.apiKey,
      temperature: 0,
      timeout: timeoutMs,
      maxRetries: 0,
      configuration: { baseURL: model.baseUrl },
    });
  }

  async complete(messages: BaseMessage[], tools: ChatCompletionTool[]): Promise<ModelResponse> {
    try {
      // An empty tools array is rejected by some servers; send none instead
      const message =
        tools.length > 0
          ? await this.model.bindTools(tools).invoke(messages)
          : await this.model.invoke(messages);
      return toModelResponse(message);
    } catch (error) {
      throw new ModelEndpointError(
        `Model endpoint ${this.baseUrl} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
