/**
 * tool-client.ts - One session with a tool server, plus the model
 *
 * Lifecycle:
 *   disconnected → connect() → connected → discover() → ask()/dispatch() ... → close()
 *
 * - connect() spawns the tool server (stdio) and performs the MCP handshake
 * - discover() lists the server's tools, remembers their descriptors and
 *   returns them formatted for the chat endpoint
 * - ask() sends a prompt plus tools to the model
 * - dispatch() validates the model's tool call against the discovered
 *   descriptors and runs it on the server
 * - close() ends the session; calling it again does nothing
 *
 * A closed client does not reconnect. Use withToolClient() to make sure the
 * session is released on every exit path.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { AIMessage, HumanMessage, ToolMessage, type BaseMessage } from "@langchain/core/messages";
import type { ToolBridgeConfig } from "../config";
import {
  ConnectionError,
  UnknownToolError,
  errorMessage,
  isToolErrorKind,
  toToolBridgeError,
} from "../errors";
import { validateArguments } from "../tools/arguments";
import { fromInputSchema } from "../tools/schema";
import { ERROR_KIND_META_KEY, SERVER_VERSION } from "../tools/mcp";
import type {
  ToolDescriptor,
  ToolInvocationRequest,
  ToolInvocationResult,
  ToolInvocationSuccess,
  ValidatedArguments,
} from "../tools/types";
import { logger } from "../utils/logger";
import {
  OpenAIChatEndpoint,
  type ChatCompletionTool,
  type ChatEndpoint,
  type ModelResponse,
} from "./chat-endpoint";
import { formatTool } from "./format-tools";

export type ToolClientState = "disconnected" | "connected" | "closed";

export interface ToolClientOptions {
  config: ToolBridgeConfig;
  /** Defaults to an OpenAI-compatible endpoint built from config.model. */
  chat?: ChatEndpoint;
}

/**
 * Environment for the spawned server. The SDK's default passes only a
 * minimal set of variables; kubectl also needs KUBECONFIG and friends.
 */
function serverEnvironment(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

function toPlainArguments(args: ValidatedArguments): Record<string, unknown> {
  const plain: Record<string, unknown> = {};
  for (const [name, argument] of Object.entries(args)) {
    plain[name] = argument.value;
  }
  return plain;
}

export class ToolClient {
  private readonly config: ToolBridgeConfig;
  private readonly chat: ChatEndpoint;
  private client: Client | null = null;
  private status: ToolClientState = "disconnected";
  private readonly descriptors = new Map<string, ToolDescriptor>();

  constructor(options: ToolClientOptions) {
    this.config = options.config;
    this.chat =
      options.chat ?? new OpenAIChatEndpoint(options.config.model, options.config.requestTimeoutMs);
  }

  get state(): ToolClientState {
    return this.status;
  }

  /**
   * Descriptors remembered by the last discover(), in server order.
   */
  get discoveredTools(): ToolDescriptor[] {
    return [...this.descriptors.values()];
  }

  /**
   * Opens the session.
   *
   * @param transport - defaults to spawning config.server over stdio
   * @throws ConnectionError when the server cannot be started or the
   *   handshake fails or times out
   */
  async connect(transport?: Transport): Promise<void> {
    if (this.status !== "disconnected") {
      throw new ConnectionError(`Cannot connect: client is already ${this.status}`);
    }

    const { command, args } = this.config.server;
    const target =
      transport ??
      new StdioClientTransport({
        command,
        args,
        env: serverEnvironment(),
        stderr: "inherit",
      });

    const client = new Client({ name: "kubectl-toolbridge-client", version: SERVER_VERSION });

    try {
      await client.connect(target, { timeout: this.config.requestTimeoutMs });
    } catch (error) {
      await client.close().catch((closeError: unknown) => {
        logger.debug(`Closing after failed connect also failed: ${errorMessage(closeError)}`);
      });
      throw new ConnectionError(
        `Could not connect to tool server "${[command, ...args].join(" ")}": ${errorMessage(error)}`,
        { cause: error }
      );
    }

    this.client = client;
    this.status = "connected";
    logger.info(`Connected to tool server ${[command, ...args].join(" ")}`);
  }

  /**
   * Lists the server's tools and formats them for the chat endpoint.
   *
   * Tools whose schema can't be expressed as a descriptor are logged and
   * left out.
   *
   * @throws ConnectionError when not connected or the listing fails
   */
  async discover(): Promise<ChatCompletionTool[]> {
    const client = this.requireClient();

    const tools: Tool[] = [];
    try {
      let cursor: string | undefined;
      do {
        const page = await client.listTools(
          cursor === undefined ? undefined : { cursor },
          { timeout: this.config.requestTimeoutMs }
        );
        tools.push(...page.tools);
        cursor = page.nextCursor;
      } while (cursor !== undefined);
    } catch (error) {
      throw new ConnectionError(`Listing tools failed: ${errorMessage(error)}`, { cause: error });
    }

    logger.info(`Found ${tools.length} tools:`);
    this.descriptors.clear();
    const formatted: ChatCompletionTool[] = [];

    for (const tool of tools) {
      logger.info(`  - ${tool.name}`);
      logger.debug(`    ${tool.description ?? ""}`);
      logger.debug(`    Schema: ${JSON.stringify(tool.inputSchema)}`);
      try {
        this.descriptors.set(
          tool.name,
          fromInputSchema(tool.name, tool.description ?? "", tool.inputSchema)
        );
        formatted.push(formatTool(tool));
      } catch (error) {
        logger.error(`Skipping tool ${tool.name}`, error);
      }
    }

    logger.info(`Formatted ${formatted.length} tools.`);
    return formatted;
  }

  /**
   * Sends the prompt and tools to the model.
   *
   * @throws ModelEndpointError
   */
  async ask(prompt: string, tools: ChatCompletionTool[]): Promise<ModelResponse> {
    return this.chat.complete([new HumanMessage(prompt)], tools);
  }

  /**
   * Sends a tool's output back to the model so it can answer in prose.
   *
   * @param prompt - the original prompt
   * @param call - the tool call the model made
   * @param result - what the tool returned
   * @throws ModelEndpointError
   */
  async relay(
    prompt: string,
    tools: ChatCompletionTool[],
    response: ModelResponse,
    call: ToolInvocationRequest,
    result: ToolInvocationSuccess
  ): Promise<ModelResponse> {
    const callId = call.id ?? "call_0";
    const messages: BaseMessage[] = [
      new HumanMessage(prompt),
      new AIMessage({
        content: response.content,
        tool_calls: [{ id: callId, name: call.name, args: call.arguments, type: "tool_call" }],
      }),
      new ToolMessage({ content: result.output, tool_call_id: callId }),
    ];
    return this.chat.complete(messages, tools);
  }

  /**
   * Runs one tool call on the server.
   *
   * Never throws for a bad call: unknown tools, missing or malformed
   * arguments, command failures and transport failures all come back as
   * { success: false, error }.
   */
  async dispatch(call: ToolInvocationRequest): Promise<ToolInvocationResult> {
    const client = this.client;
    if (!client || this.status !== "connected") {
      return {
        success: false,
        error: new ConnectionError(`Cannot dispatch ${call.name}: client is ${this.status}`),
      };
    }

    const descriptor = this.descriptors.get(call.name);
    if (!descriptor) {
      return { success: false, error: new UnknownToolError(call.name) };
    }

    const validation = validateArguments(descriptor, call.arguments);
    if (!validation.ok) {
      return { success: false, error: validation.error };
    }

    logger.info(`Calling ${call.name} ${JSON.stringify(toPlainArguments(validation.args))}`);

    let raw: unknown;
    try {
      raw = await client.callTool(
        { name: call.name, arguments: toPlainArguments(validation.args) },
        CallToolResultSchema,
        { timeout: this.config.requestTimeoutMs }
      );
    } catch (error) {
      return {
        success: false,
        error: new ConnectionError(`Calling ${call.name} failed: ${errorMessage(error)}`, {
          cause: error,
        }),
      };
    }

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        success: false,
        error: new ConnectionError(`Tool server sent a malformed result for ${call.name}`),
      };
    }

    const text = parsed.data.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("\n");

    if (parsed.data.isError) {
      const kind = parsed.data._meta?.[ERROR_KIND_META_KEY];
      return {
        success: false,
        error: toToolBridgeError(isToolErrorKind(kind) ? kind : "command_execution", text, call.name),
      };
    }

    return { success: true, output: text };
  }

  /**
   * Ends the session. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.status === "closed") return;
    const client = this.client;
    this.client = null;
    this.status = "closed";
    if (client) {
      await client.close();
      logger.debug("Tool server session closed");
    }
  }

  private requireClient(): Client {
    if (!this.client || this.status !== "connected") {
      throw new ConnectionError(`Not connected to a tool server (client is ${this.status})`);
    }
    return this.client;
  }
}

/**
 * Runs fn with a connected client and closes it afterwards, whether fn
 * returned or threw. When fn (or connect) has already failed, a failure to
 * close is logged and the original error is the one rethrown.
 *
 * @param transport - optional transport override (tests use in-memory pairs)
 */
export async function withToolClient<T>(
  options: ToolClientOptions,
  fn: (client: ToolClient) => Promise<T>,
  transport?: Transport
): Promise<T> {
  const client = new ToolClient(options);
  let result: T;
  try {
    await client.connect(transport);
    result = await fn(client);
  } catch (error) {
    await client.close().catch((closeError: unknown) => {
      logger.error("Closing the tool server session failed", closeError);
    });
    throw error;
  }
  await client.close();
  return result;
}
