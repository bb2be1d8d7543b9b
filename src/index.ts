#!/usr/bin/env node
/**
 * index.ts - CLI entry point for kubectl-toolbridge
 *
 * Two commands:
 *
 * 1. Ask (default):
 *    kubectl-toolbridge "what nodes are in the cluster?"
 *    Starts the tool server, lets the model pick one kubectl tool, runs it
 *    and prints the output. With --relay the output goes back to the model
 *    and its answer is printed too.
 *
 * 2. List tools:
 *    kubectl-toolbridge tools
 *    Prints the tools the server offers, as the model will see them.
 *
 * Tool output and answers go to stdout; logs go to stderr.
 */

import { Command, InvalidArgumentError as InvalidOptionError } from "commander";
import { runRoundTrip, type RoundTripResult } from "./agent/round-trip";
import { withToolClient } from "./client/tool-client";
import { loadConfig, type ConfigOverrides } from "./config";
import { errorMessage } from "./errors";
import { flushTracing, initializeTracing } from "./tracing";

type GlobalOptions = {
  modelUrl?: string;
  model?: string;
  serverCommand?: string;
  serverArg: string[];
  timeout?: number;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidOptionError("must be a positive integer (milliseconds)");
  }
  return parsed;
}

/**
 * Maps parsed CLI options onto config overrides. An empty --server-arg list
 * means "not given".
 */
export function toConfigOverrides(options: GlobalOptions): ConfigOverrides {
  return {
    modelUrl: options.modelUrl,
    model: options.model,
    serverCommand: options.serverCommand,
    serverArgs: options.serverArg.length > 0 ? options.serverArg : undefined,
    timeoutMs: options.timeout,
  };
}

/**
 * Renders a round-trip result as the lines printed to stdout.
 */
export function formatRoundTrip(result: RoundTripResult): string[] {
  if (result.kind === "answer") {
    return ["Answer:", result.answer];
  }

  const lines = [
    `🔧 Tool: ${result.call.name}`,
    `   Args: ${JSON.stringify(result.call.arguments)}`,
    "   Result:",
    result.result.output,
  ];
  if (result.answer !== undefined) {
    lines.push("─".repeat(60), "Answer:", result.answer);
  }
  return lines;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("kubectl-toolbridge")
    .description("Lets a chat model answer questions about a Kubernetes cluster through kubectl tools")
    .version("0.1.0")
    .option("--model-url <url>", "OpenAI-compatible endpoint (default: MODEL_ENDPOINT_URL or local Ollama)")
    .option("--model <name>", "model name (default: MODEL_NAME or llama3.1)")
    .option("--server-command <command>", "command that starts the tool server")
    .option("--server-arg <arg>", "argument for the tool server command (repeatable)", collect, [])
    .option("--timeout <ms>", "timeout for discovery, tool calls and the model call", parsePositiveInteger);

  program
    .command("ask", { isDefault: true })
    .description("Ask a question; the model picks a kubectl tool and its output is printed")
    .argument("<prompt...>", "natural language question about your cluster")
    .option("--relay", "send the tool output back to the model for a final answer")
    .action(async (promptParts: string[], options: { relay?: boolean }) => {
      const prompt = promptParts.join(" ");
      const config = loadConfig(toConfigOverrides(program.opts<GlobalOptions>()));

      console.log(`\nQuestion: ${prompt}\n`);

      const result = await withToolClient({ config }, (client) =>
        runRoundTrip({ client, prompt, relay: options.relay })
      );

      for (const line of formatRoundTrip(result)) {
        console.log(line);
      }
    });

  program
    .command("tools")
    .description("List the tools the server offers, in chat-completion format")
    .action(async () => {
      const config = loadConfig(toConfigOverrides(program.opts<GlobalOptions>()));

      const tools = await withToolClient({ config }, (client) => client.discover());

      console.log("Formatted Tools:");
      for (const tool of tools) {
        console.log(`  - ${tool.function.name}`);
      }
    });

  return program;
}

async function main(): Promise<void> {
  initializeTracing();
  try {
    await buildProgram().parseAsync(process.argv);
  } finally {
    await flushTracing();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  });
}
