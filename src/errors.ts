/**
 * errors.ts - Typed errors for the tool round trip
 *
 * Every failure a round trip can hit is one of these kinds. The `kind` field
 * survives the trip over MCP (it rides in the tool result's `_meta`), so the
 * client can rebuild the same typed error the server produced.
 *
 * Errors are never retried or swallowed: the round trip aborts and the
 * message is shown to the user verbatim.
 */

export type ToolErrorKind =
  | "connection"
  | "unknown_tool"
  | "missing_argument"
  | "invalid_argument"
  | "command_execution"
  | "model_endpoint";

/**
 * Base class for all round-trip errors.
 */
export class ToolBridgeError extends Error {
  readonly kind: ToolErrorKind;

  constructor(kind: ToolErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** The tool server process could not be reached, or the handshake failed. */
export class ConnectionError extends ToolBridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("connection", message, options);
  }
}

/** The requested tool name is not among the declared (or discovered) tools. */
export class UnknownToolError extends ToolBridgeError {
  readonly toolName: string;

  constructor(toolName: string, message = `Unknown tool: "${toolName}" is not a recognized tool`) {
    super("unknown_tool", message);
    this.toolName = toolName;
  }
}

export class MissingArgumentError extends ToolBridgeError {
  constructor(message: string) {
    super("missing_argument", message);
  }
}

/**
 * An argument was present but malformed: wrong type, unknown name, or a
 * value outside the parameter's allowed set. Also used for tool calls the
 * model emitted that could not be parsed at all.
 */
export class InvalidArgumentError extends ToolBridgeError {
  constructor(message: string) {
    super("invalid_argument", message);
  }
}

/** kubectl exited non-zero, could not be started, or timed out. */
export class CommandExecutionError extends ToolBridgeError {
  constructor(message: string) {
    super("command_execution", message);
  }
}

/** The chat endpoint was unreachable, timed out, or returned an error status. */
export class ModelEndpointError extends ToolBridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("model_endpoint", message, options);
  }
}

const ERROR_KINDS: readonly ToolErrorKind[] = [
  "connection",
  "unknown_tool",
  "missing_argument",
  "invalid_argument",
  "command_execution",
  "model_endpoint",
];

export function isToolErrorKind(value: unknown): value is ToolErrorKind {
  return typeof value === "string" && ERROR_KINDS.some((kind) => kind === value);
}

/**
 * Rebuilds a typed error from its wire form (kind + message).
 *
 * UnknownToolError needs the tool name, which the caller knows from the
 * request it sent; the message is kept as the server wrote it.
 */
export function toToolBridgeError(
  kind: ToolErrorKind,
  message: string,
  toolName = ""
): ToolBridgeError {
  switch (kind) {
    case "connection":
      return new ConnectionError(message);
    case "unknown_tool":
      return new UnknownToolError(toolName, message);
    case "missing_argument":
      return new MissingArgumentError(message);
    case "invalid_argument":
      return new InvalidArgumentError(message);
    case "command_execution":
      return new CommandExecutionError(message);
    case "model_endpoint":
      return new ModelEndpointError(message);
  }
}

/**
 * Extracts a message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
