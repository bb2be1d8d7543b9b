/**
 * registry.ts - The tool server's fixed set of kubectl tools
 *
 * This is the protocol-independent half of the tool server:
 * - listTools() returns the declared descriptors, always in the same order
 * - callTool() looks the tool up, validates the arguments, runs kubectl and
 *   returns a ToolInvocationResult. It never throws for a bad request: an
 *   unknown name, a missing argument or a failed command all come back as
 *   { success: false, error }.
 *
 * The MCP layer (tools/mcp) only translates these into protocol messages.
 */

import { CommandExecutionError, UnknownToolError } from "../errors";
import { executeKubectl, type KubectlResult, type KubectlRunner } from "../utils/kubectl";
import { logger } from "../utils/logger";
import { withToolTracing } from "../tracing/tool-tracing";
import { validateArguments } from "./arguments";
import {
  kubectlApiResources,
  kubectlApiResourcesDescriptor,
  kubectlDescribe,
  kubectlDescribeDescriptor,
  kubectlGet,
  kubectlGetDescriptor,
} from "./core";
import type {
  ToolDefinition,
  ToolDescriptor,
  ToolInvocationResult,
  ValidatedArguments,
} from "./types";

export interface ToolRegistryOptions {
  /** Runs kubectl; defaults to the real subprocess. */
  kubectl?: KubectlRunner;
}

function toInvocationResult(result: KubectlResult): ToolInvocationResult {
  if (result.isError) {
    return { success: false, error: new CommandExecutionError(result.output) };
  }
  return { success: true, output: result.output };
}

/**
 * The read-only kubectl tools, in declaration order.
 */
export function createKubectlTools(kubectl: KubectlRunner = executeKubectl): ToolDefinition[] {
  return [
    {
      descriptor: kubectlApiResourcesDescriptor,
      execute: async () => toInvocationResult(await kubectlApiResources(kubectl)),
    },
    {
      descriptor: kubectlGetDescriptor,
      execute: async (args) => toInvocationResult(await kubectlGet(args, kubectl)),
    },
    {
      descriptor: kubectlDescribeDescriptor,
      execute: async (args) => toInvocationResult(await kubectlDescribe(args, kubectl)),
    },
  ];
}

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;
  private readonly descriptors: readonly ToolDescriptor[];
  private readonly tracedExecutors: ReadonlyMap<
    string,
    (args: ValidatedArguments) => Promise<ToolInvocationResult>
  >;

  constructor(tools: ToolDefinition[]) {
    const byName = new Map<string, ToolDefinition>();
    const traced = new Map<string, (args: ValidatedArguments) => Promise<ToolInvocationResult>>();
    for (const tool of tools) {
      if (byName.has(tool.descriptor.name)) {
        throw new Error(`Duplicate tool name: ${tool.descriptor.name}`);
      }
      byName.set(tool.descriptor.name, tool);
      traced.set(tool.descriptor.name, withToolTracing(tool.descriptor.name, tool.execute));
    }
    this.tools = byName;
    this.tracedExecutors = traced;
    this.descriptors = Object.freeze(tools.map((tool) => tool.descriptor));
  }

  /**
   * Declared descriptors. No side effects; the same array every call.
   */
  listTools(): readonly ToolDescriptor[] {
    return this.descriptors;
  }

  /**
   * Runs one tool.
   *
   * @param name - tool name as requested
   * @param rawArguments - arguments as received; validated here
   */
  async callTool(name: string, rawArguments: Record<string, unknown> = {}): Promise<ToolInvocationResult> {
    const tool = this.tools.get(name);
    const execute = this.tracedExecutors.get(name);
    if (!tool || !execute) {
      logger.warn(`Rejected call to unknown tool "${name}"`);
      return { success: false, error: new UnknownToolError(name) };
    }

    const validation = validateArguments(tool.descriptor, rawArguments);
    if (!validation.ok) {
      logger.warn(validation.error.message);
      return { success: false, error: validation.error };
    }

    logger.debug(`Calling ${name} with ${JSON.stringify(rawArguments)}`);
    const result = await execute(validation.args);
    if (!result.success) {
      logger.warn(`${name} failed: ${result.error.message}`);
    }
    return result;
  }
}

/**
 * The registry the tool server runs with.
 */
export function createToolRegistry(options: ToolRegistryOptions = {}): ToolRegistry {
  return new ToolRegistry(createKubectlTools(options.kubectl));
}
