/**
 * schema.ts - Converts descriptors to and from MCP input schemas
 *
 * On the wire a tool's parameters travel as a JSON Schema object
 * (type/properties/required). The server renders its descriptors into that
 * shape; the client reads it back so it can validate model output against
 * the same parameter specs the server declared.
 *
 * Only flat schemas of string, integer, number and boolean properties map
 * onto a descriptor. Anything else is rejected with an error naming the
 * offending property.
 */

import { z } from "zod";
import type { ParameterSpec, ToolDescriptor } from "./types";

/**
 * JSON Schema for a tool's input, as sent in tools/list.
 */
export interface ToolInputSchema {
  [key: string]: unknown;
  type: "object";
  properties: Record<string, PropertySchema>;
  required?: string[];
  additionalProperties?: boolean;
}

interface PropertySchema {
  [key: string]: unknown;
  type: ParameterSpec["type"];
  description?: string;
  enum?: string[];
}

/**
 * Declares a tool descriptor and freezes it, parameters included.
 * Descriptors never change after declaration.
 */
export function declareTool(descriptor: ToolDescriptor): ToolDescriptor {
  const parameters: Record<string, ParameterSpec> = {};
  for (const [name, spec] of Object.entries(descriptor.parameters)) {
    parameters[name] = Object.freeze({ ...spec });
  }
  return Object.freeze({
    name: descriptor.name,
    description: descriptor.description,
    parameters: Object.freeze(parameters),
  });
}

export function toInputSchema(descriptor: ToolDescriptor): ToolInputSchema {
  const properties: Record<string, PropertySchema> = {};
  const required: string[] = [];

  for (const [name, spec] of Object.entries(descriptor.parameters)) {
    const property: PropertySchema = { type: spec.type, description: spec.description };
    if (spec.enum) {
      property.enum = [...spec.enum];
    }
    properties[name] = property;
    if (spec.required) {
      required.push(name);
    }
  }

  return {
    type: "object",
    properties,
    required,
    additionalProperties: false,
  };
}

const propertySchema = z
  .object({
    type: z.enum(["string", "integer", "number", "boolean"]),
    description: z.string().optional(),
    enum: z.array(z.string()).optional(),
  })
  .passthrough();

const inputSchemaSchema = z
  .object({
    type: z.literal("object"),
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

/**
 * Builds a descriptor from a discovered tool.
 *
 * @throws Error when the schema uses a shape descriptors cannot express
 */
export function fromInputSchema(
  name: string,
  description: string,
  inputSchema: unknown
): ToolDescriptor {
  const parsed = inputSchemaSchema.safeParse(inputSchema);
  if (!parsed.success) {
    throw new Error(`Tool "${name}" has an input schema that is not a JSON Schema object`);
  }

  const required = new Set(parsed.data.required ?? []);
  const entries: Array<[string, ParameterSpec]> = [];

  for (const [param, raw] of Object.entries(parsed.data.properties ?? {})) {
    const property = propertySchema.safeParse(raw);
    if (!property.success) {
      throw new Error(`Tool "${name}" parameter "${param}" has an unsupported schema`);
    }
    const spec: ParameterSpec = {
      type: property.data.type,
      required: required.has(param),
      description: property.data.description ?? "",
    };
    if (property.data.enum) {
      spec.enum = Object.freeze([...property.data.enum]);
    }
    entries.push([param, Object.freeze(spec)]);
  }

  return Object.freeze({
    name,
    description,
    parameters: Object.freeze(Object.fromEntries(entries)),
  });
}
