import { describe, it, expect } from "vitest";
import { kubectlApiResourcesDescriptor, kubectlGetDescriptor } from "./core";
import { declareTool, fromInputSchema, toInputSchema } from "./schema";

describe("declareTool", () => {
  it("freezes the descriptor and its parameter specs", () => {
    const descriptor = declareTool({
      name: "frozen",
      description: "",
      parameters: { name: { type: "string", required: true, description: "" } },
    });

    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.parameters)).toBe(true);
    expect(Object.isFrozen(descriptor.parameters.name)).toBe(true);
  });
});

describe("toInputSchema", () => {
  it("renders parameters as a closed JSON Schema object", () => {
    const schema = toInputSchema(kubectlGetDescriptor);

    expect(schema.type).toBe("object");
    expect(Object.keys(schema.properties)).toEqual([
      "resource",
      "namespace",
      "selector",
      "output_format",
    ]);
    expect(schema.required).toEqual(["resource"]);
    expect(schema.additionalProperties).toBe(false);
    expect(schema.properties.output_format).toEqual({
      type: "string",
      description: "Output format: 'json', 'yaml', 'wide', or 'name'",
      enum: ["json", "yaml", "wide", "name"],
    });
  });

  it("renders a parameterless tool with empty properties", () => {
    expect(toInputSchema(kubectlApiResourcesDescriptor)).toEqual({
      type: "object",
      properties: {},
      required: [],
      additionalProperties: false,
    });
  });
});

describe("fromInputSchema", () => {
  it("reads back the descriptor a schema was rendered from", () => {
    const descriptor = fromInputSchema(
      kubectlGetDescriptor.name,
      kubectlGetDescriptor.description,
      toInputSchema(kubectlGetDescriptor)
    );

    expect(descriptor).toEqual(kubectlGetDescriptor);
  });

  it("freezes the parameter specs of a discovered tool", () => {
    const descriptor = fromInputSchema("lookup", "", toInputSchema(kubectlGetDescriptor));

    expect(Object.isFrozen(descriptor.parameters)).toBe(true);
    expect(Object.isFrozen(descriptor.parameters.resource)).toBe(true);
    expect(Object.isFrozen(descriptor.parameters.output_format?.enum)).toBe(true);
  });

  it("treats properties not listed as required as optional", () => {
    const descriptor = fromInputSchema("lookup", "Looks things up", {
      type: "object",
      properties: { key: { type: "string" } },
    });

    expect(descriptor.parameters).toEqual({
      key: { type: "string", required: false, description: "" },
    });
  });

  it("rejects a schema that is not an object schema", () => {
    expect(() => fromInputSchema("broken", "", { type: "array" })).toThrow(
      'Tool "broken" has an input schema that is not a JSON Schema object'
    );
  });

  it("rejects properties with unsupported types", () => {
    expect(() =>
      fromInputSchema("nested", "", {
        type: "object",
        properties: { items: { type: "array", items: { type: "string" } } },
      })
    ).toThrow('Tool "nested" parameter "items" has an unsupported schema');
  });
});
