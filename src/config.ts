/**
 * config.ts - Runtime configuration for the tool client
 *
 * The model endpoint and the tool server to launch are explicit values handed
 * to the client when it is constructed. Nothing downstream reads
 * process.env for them.
 *
 * Precedence: CLI overrides, then environment variables, then defaults.
 *
 * Environment variables:
 * - MODEL_ENDPOINT_URL   OpenAI-compatible base URL (default: local Ollama)
 * - MODEL_NAME           model to ask
 * - MODEL_API_KEY        sent as the bearer token; Ollama ignores it
 * - TOOL_SERVER_COMMAND  executable that starts the tool server
 * - TOOL_SERVER_ARGS     its arguments, space separated
 * - REQUEST_TIMEOUT_MS   bound on discovery, tool calls and the model call
 */

import * as path from "path";
import { z } from "zod";

export const DEFAULT_MODEL_ENDPOINT_URL = "http://localhost:11434/v1";
export const DEFAULT_MODEL_NAME = "llama3.1";
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

const configSchema = z.object({
  model: z.object({
    baseUrl: z.string().url(),
    name: z.string().min(1),
    apiKey: z.string().min(1),
  }),
  server: z.object({
    command: z.string().min(1),
    args: z.array(z.string()),
  }),
  requestTimeoutMs: z.number().int().positive(),
});

export type ToolBridgeConfig = z.infer<typeof configSchema>;

/**
 * Values the CLI can override. Undefined means "not given".
 */
export interface ConfigOverrides {
  modelUrl?: string;
  model?: string;
  serverCommand?: string;
  serverArgs?: string[];
  timeoutMs?: number;
}

/**
 * Command that launches this package's own tool server.
 *
 * The server entry sits beside this file: mcp-server.js in a build, or
 * mcp-server.ts when running from source under a TypeScript loader. The
 * parent's execArgv is passed on so the child gets the same loader.
 */
export function defaultServerParameters(): { command: string; args: string[] } {
  const extension = path.extname(__filename) || ".js";
  return {
    command: process.execPath,
    args: [...process.execArgv, path.join(__dirname, `mcp-server${extension}`)],
  };
}

function splitArgs(value: string): string[] {
  return value.split(/\s+/).filter((part) => part.length > 0);
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

/**
 * Builds and validates the configuration.
 *
 * @param overrides - values from the command line
 * @param env - environment to read (defaults to process.env)
 * @throws Error listing every invalid field
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ToolBridgeConfig {
  const defaults = defaultServerParameters();

  const serverCommand = overrides.serverCommand ?? env.TOOL_SERVER_COMMAND;
  let serverArgs = overrides.serverArgs;
  if (serverArgs === undefined && env.TOOL_SERVER_ARGS !== undefined) {
    serverArgs = splitArgs(env.TOOL_SERVER_ARGS);
  }

  // A custom command without arguments must not inherit the default script path
  if (serverArgs === undefined) {
    serverArgs = serverCommand === undefined ? defaults.args : [];
  }

  const candidate = {
    model: {
      baseUrl: overrides.modelUrl ?? env.MODEL_ENDPOINT_URL ?? DEFAULT_MODEL_ENDPOINT_URL,
      name: overrides.model ?? env.MODEL_NAME ?? DEFAULT_MODEL_NAME,
      apiKey: env.MODEL_API_KEY ?? "ollama",
    },
    server: {
      command: serverCommand ?? defaults.command,
      args: serverArgs,
    },
    requestTimeoutMs:
      overrides.timeoutMs ?? parseTimeout(env.REQUEST_TIMEOUT_MS) ?? DEFAULT_REQUEST_TIMEOUT_MS,
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}
