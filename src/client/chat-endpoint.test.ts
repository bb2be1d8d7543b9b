/**
 * chat-endpoint.test.ts - Response mapping and the OpenAI-compatible adapter
 *
 * The adapter tests point ChatOpenAI at a throwaway HTTP server on the
 * loopback interface that answers /v1/chat/completions the way Ollama does.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as http from "http";
import { AIMessage, HumanMessage } from "@langchain/core/messages";
import { ModelEndpointError } from "../errors";
import { OpenAIChatEndpoint, extractText, toModelResponse, type ChatCompletionTool } from "./chat-endpoint";

const GET_TOOL: ChatCompletionTool = {
  type: "function",
  function: {
    name: "kubectl_get_resource",
    description: "Display one or many Kubernetes resources.",
    parameters: {
      type: "object",
      properties: { resource: { type: "string", description: "Resource type" } },
      required: ["resource"],
      additionalProperties: false,
    },
  },
};

describe("extractText", () => {
  it("returns string content as is", () => {
    expect(extractText("There are two nodes.")).toBe("There are two nodes.");
  });

  it("joins text blocks and skips the rest", () => {
    expect(
      extractText([
        { type: "text", text: "Two " },
        { type: "image_url", image_url: "data:image/png;base64,AAAA" },
        { type: "text", text: "nodes." },
      ])
    ).toBe("Two nodes.");
  });
});

describe("toModelResponse", () => {
  it("maps tool calls to invocation requests", () => {
    const message = new AIMessage({
      content: "",
      tool_calls: [
        { id: "call_1", name: "kubectl_get_resource", args: { resource: "nodes" }, type: "tool_call" },
      ],
    });

    expect(toModelResponse(message)).toEqual({
      content: "",
      toolCalls: [{ id: "call_1", name: "kubectl_get_resource", arguments: { resource: "nodes" } }],
      invalidToolCalls: [],
    });
  });

  it("keeps unparseable tool calls apart", () => {
    const message = new AIMessage({
      content: "",
      invalid_tool_calls: [
        {
          id: "call_2",
          name: "kubectl_get_resource",
          args: '{"resource":',
          error: "Malformed args.",
          type: "invalid_tool_call",
        },
      ],
    });

    expect(toModelResponse(message)).toEqual({
      content: "",
      toolCalls: [],
      invalidToolCalls: [{ name: "kubectl_get_resource", error: "Malformed args." }],
    });
  });
});

describe("OpenAIChatEndpoint", () => {
  type Responder = (body: string, res: http.ServerResponse) => void;

  let server: http.Server;
  let baseUrl: string;
  let requests: Array<{ url: string; body: string }>;
  let respond: Responder;

  function sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
    res.writeHead(status, { "content-type": "application/json" });
    res.end(JSON.stringify(payload));
  }

  function completion(message: Record<string, unknown>, finishReason: string) {
    return {
      id: "chatcmpl-test",
      object: "chat.completion",
      created: 1760000000,
      model: "test-model",
      choices: [{ index: 0, message, finish_reason: finishReason }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    };
  }

  beforeEach(async () => {
    requests = [];
    respond = (_body, res) => sendJson(res, 500, { error: { message: "no responder set" } });
    server = http.createServer((req, res) => {
      let body = "";
      req.setEncoding("utf-8");
      req.on("data", (chunk: string) => {
        body += chunk;
      });
      req.on("end", () => {
        requests.push({ url: req.url ?? "", body });
        respond(body, res);
      });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("test server has no port");
    }
    baseUrl = `http://127.0.0.1:${address.port}/v1`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  function endpoint(url = baseUrl, timeoutMs = 5000): OpenAIChatEndpoint {
    return new OpenAIChatEndpoint({ baseUrl: url, name: "test-model", apiKey: "test-key" }, timeoutMs);
  }

  it("posts the model name and tools and returns the tool call", async () => {
    respond = (_body, res) =>
      sendJson(
        res,
        200,
        completion(
          {
            role: "assistant",
            content: null,
            tool_calls: [
              {
                id: "call_1",
                type: "function",
                function: { name: "kubectl_get_resource", arguments: '{"resource":"nodes"}' },
              },
            ],
          },
          "tool_calls"
        )
      );

    const response = await endpoint().complete([new HumanMessage("what nodes exist?")], [GET_TOOL]);

    expect(response).toEqual({
      content: "",
      toolCalls: [{ id: "call_1", name: "kubectl_get_resource", arguments: { resource: "nodes" } }],
      invalidToolCalls: [],
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("/v1/chat/completions");
    const sent = JSON.parse(requests[0]?.body ?? "{}");
    expect(sent.model).toBe("test-model");
    expect(sent.temperature).toBe(0);
    expect(sent.tools).toEqual([GET_TOOL]);
  });

  it("returns a plain answer when the model calls no tool", async () => {
    respond = (_body, res) =>
      sendJson(res, 200, completion({ role: "assistant", content: "Hello." }, "stop"));

    const response = await endpoint().complete([new HumanMessage("hi")], [GET_TOOL]);

    expect(response).toEqual({ content: "Hello.", toolCalls: [], invalidToolCalls: [] });
  });

  it("omits the tools field when there are no tools", async () => {
    respond = (_body, res) =>
      sendJson(res, 200, completion({ role: "assistant", content: "Hello." }, "stop"));

    await endpoint().complete([new HumanMessage("hi")], []);

    expect(JSON.parse(requests[0]?.body ?? "{}").tools).toBeUndefined();
  });

  it("turns an error status into a ModelEndpointError", async () => {
    respond = (_body, res) => sendJson(res, 500, { error: { message: "model crashed" } });

    const attempt = endpoint().complete([new HumanMessage("hi")], [GET_TOOL]);

    await expect(attempt).rejects.toBeInstanceOf(ModelEndpointError);
    await expect(attempt).rejects.toThrow(`Model endpoint ${baseUrl} failed: `);
    expect(requests).toHaveLength(1);
  });

  it("turns a model that never answers into a ModelEndpointError", async () => {
    respond = () => {};

    const attempt = endpoint(baseUrl, 300).complete([new HumanMessage("hi")], [GET_TOOL]);

    await expect(attempt).rejects.toBeInstanceOf(ModelEndpointError);
    await expect(attempt).rejects.toThrow(`Model endpoint ${baseUrl} failed: `);
    expect(requests).toHaveLength(1);
  });

  it("turns a refused connection into a ModelEndpointError", async () => {
    const unreachable = baseUrl;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = http.createServer();
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

    await expect(
      endpoint(unreachable).complete([new HumanMessage("hi")], [GET_TOOL])
    ).rejects.toBeInstanceOf(ModelEndpointError);
  });
});
