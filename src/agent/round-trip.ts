/**
 * round-trip.ts - One prompt, at most one tool call
 *
 * The flow is strictly linear:
 *   discover tools → describe them to the model → model decides →
 *   dispatch the single requested tool → (optionally) relay the output back
 *   to the model for a prose answer
 *
 * There is no loop: if the model asks for more tools after seeing a relayed
 * result, that request is ignored and only its text is kept. Several tool
 * calls in one response are not supported either; the first is dispatched
 * and the rest are logged as ignored.
 *
 * Any failure aborts the round trip by throwing the typed error. No partial
 * tool output is made up.
 */

import { InvalidArgumentError } from "../errors";
import type { ToolInvocationRequest, ToolInvocationSuccess } from "../tools/types";
import { logger } from "../utils/logger";
import type { ToolClient } from "../client/tool-client";

export type RoundTripResult =
  | {
      kind: "answer";
      /** The model answered without calling a tool. */
      answer: string;
    }
  | {
      kind: "tool";
      call: ToolInvocationRequest;
      result: ToolInvocationSuccess;
      /** The model's prose answer, when the output was relayed back. */
      answer?: string;
    };

export interface RoundTripOptions {
  client: ToolClient;
  prompt: string;
  /** Send a successful tool output back to the model for a final answer. */
  relay?: boolean;
}

/**
 * Runs one round trip on an already-connected client.
 *
 * @throws ToolBridgeError subclasses for every failure kind
 */
export async function runRoundTrip(options: RoundTripOptions): Promise<RoundTripResult> {
  const { client, prompt, relay = false } = options;

  const tools = await client.discover();
  const response = await client.ask(prompt, tools);

  const [call, ...ignored] = response.toolCalls;
  if (call === undefined) {
    const [malformed] = response.invalidToolCalls;
    if (malformed !== undefined) {
      throw new InvalidArgumentError(
        `Model produced a malformed tool call${malformed.name ? ` for "${malformed.name}"` : ""}: ${malformed.error}`
      );
    }
    return { kind: "answer", answer: response.content };
  }

  if (ignored.length > 0) {
    logger.warn(
      `Model requested ${response.toolCalls.length} tool calls; only ${call.name} is run, ` +
        `ignoring ${ignored.map((extra) => extra.name).join(", ")}`
    );
  }

  const result = await client.dispatch(call);
  if (!result.success) {
    throw result.error;
  }

  if (!relay) {
    return { kind: "tool", call, result };
  }

  const followUp = await client.relay(prompt, tools, response, call, result);
  if (followUp.toolCalls.length > 0) {
    logger.warn("Model asked for another tool after the relayed result; not running it");
  }
  return { kind: "tool", call, result, answer: followUp.content };
}
