/**
 * types.ts - Shapes shared by the tool server and the tool client
 */

import type { ToolBridgeError } from "../errors";

export type ParameterType = "string" | "integer" | "number" | "boolean";

export interface ParameterSpec {
  type: ParameterType;
  required: boolean;
  description: string;
  /** Allowed values; only meaningful for string parameters. */
  enum?: readonly string[];
}

/**
 * A named, schema-bearing operation the tool server can execute.
 *
 * Parameter order is the declaration order and is preserved on the wire.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
}

/**
 * A parameter value after validation, tagged with the type it was checked
 * against. Handlers only ever receive these.
 */
export type ArgumentValue =
  | { kind: "string"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean };

export type ValidatedArguments = Readonly<Record<string, ArgumentValue>>;

/**
 * A tool call as the client builds it from the model's output.
 */
export interface ToolInvocationRequest {
  name: string;
  arguments: Record<string, unknown>;
  /** The model's id for this call, when it gave one. */
  id?: string;
}

export interface ToolInvocationSuccess {
  success: true;
  /** The command output, unmodified. May be empty. */
  output: string;
}

export interface ToolInvocationFailure {
  success: false;
  error: ToolBridgeError;
}

export type ToolInvocationResult = ToolInvocationSuccess | ToolInvocationFailure;

/**
 * A declared tool: its descriptor plus the function that runs it.
 */
export interface ToolDefinition {
  descriptor: ToolDescriptor;
  execute: (args: ValidatedArguments) => Promise<ToolInvocationResult>;
}
