/**
 * arguments.ts - Validates tool arguments against a descriptor
 *
 * Model output is untrusted: a tool call can name parameters that don't
 * exist, send a number where a string belongs, or leave out the one thing
 * the command needs. Validation happens before anything reaches kubectl, on
 * both sides of the wire (the client against the discovered descriptor, the
 * server against its declared one).
 *
 * Rules:
 * - strings are trimmed; a required string that trims to "" is missing
 * - null or "" for an optional parameter means "not given"
 * - unknown parameter names are rejected
 * - enum parameters only take their listed values
 *
 * The result maps each given parameter to a tagged ArgumentValue.
 */

import { z } from "zod";
import { InvalidArgumentError, MissingArgumentError } from "../errors";
import type {
  ArgumentValue,
  ParameterSpec,
  ToolDescriptor,
  ValidatedArguments,
} from "./types";

export type ArgumentValidation =
  | { ok: true; args: ValidatedArguments }
  | { ok: false; error: MissingArgumentError | InvalidArgumentError };

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function parameterSchema(spec: ParameterSpec): z.ZodTypeAny {
  switch (spec.type) {
    case "string": {
      const base = z.string().trim();
      const [first, ...rest] = spec.enum ?? [];
      return first === undefined ? base : base.pipe(z.enum([first, ...rest]));
    }
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
  }
}

function buildObjectSchema(descriptor: ToolDescriptor) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(descriptor.parameters)) {
    const schema = parameterSchema(spec);
    shape[name] = spec.required ? schema : schema.optional();
  }
  return z.object(shape).strict();
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function tagValue(spec: ParameterSpec, value: unknown): ArgumentValue | null {
  if (spec.type === "string" && typeof value === "string") {
    return { kind: "string", value };
  }
  if (spec.type === "integer" && typeof value === "number") {
    return { kind: "integer", value };
  }
  if (spec.type === "number" && typeof value === "number") {
    return { kind: "number", value };
  }
  if (spec.type === "boolean" && typeof value === "boolean") {
    return { kind: "boolean", value };
  }
  return null;
}

/**
 * Validates raw arguments for one tool.
 *
 * @param descriptor - the tool the arguments are for
 * @param raw - arguments as the model produced them
 */
export function validateArguments(
  descriptor: ToolDescriptor,
  raw: Record<string, unknown>
): ArgumentValidation {
  const missing = Object.entries(descriptor.parameters)
    .filter(([name, spec]) => spec.required && (!Object.hasOwn(raw, name) || isAbsent(raw[name])))
    .map(([name]) => name);

  if (missing.length > 0) {
    return {
      ok: false,
      error: new MissingArgumentError(
        `Missing required argument(s) for tool "${descriptor.name}": ${missing.join(", ")}`
      ),
    };
  }

  // Drop "not given" optionals so they don't trip type checks. fromEntries
  // keeps a "__proto__" key as an own property, so strict() still sees it.
  const given: Record<string, unknown> = Object.fromEntries(
    Object.entries(raw).filter(([, value]) => !isAbsent(value))
  );

  const parsed = buildObjectSchema(descriptor).safeParse(given);
  if (!parsed.success) {
    return {
      ok: false,
      error: new InvalidArgumentError(
        `Invalid arguments for tool "${descriptor.name}": ${formatIssues(parsed.error.issues)}`
      ),
    };
  }

  const args: Record<string, ArgumentValue> = {};
  for (const [name, value] of Object.entries(parsed.data)) {
    const spec = descriptor.parameters[name];
    if (spec === undefined || value === undefined) continue;
    const tagged = tagValue(spec, value);
    if (tagged === null) {
      return {
        ok: false,
        error: new InvalidArgumentError(
          `Invalid arguments for tool "${descriptor.name}": ${name}: expected ${spec.type}`
        ),
      };
    }
    args[name] = tagged;
  }

  return { ok: true, args };
}

/**
 * Reads a validated string argument.
 *
 * @returns the value, or undefined when the parameter was not given
 */
export function stringArgument(args: ValidatedArguments, name: string): string | undefined {
  const value = args[name];
  return value?.kind === "string" ? value.value : undefined;
}
