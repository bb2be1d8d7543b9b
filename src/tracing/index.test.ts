/**
 * index.test.ts - Unit tests for tracing setup
 *
 * Covers the fallback when the optional OTel SDK packages are absent and
 * what initializeTracing() does when they are present.
 *
 * Each test resets the module registry (vi.resetModules) and re-imports the
 * tracing module, since the optional packages are loaded and the
 * "initialized" flag is held at module level.
 *
 * Mocking strategy:
 * The source loads optional packages via require() in optional-deps.ts. We
 * mock that module rather than the npm packages themselves.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

const { mockConfig } = vi.hoisted(() => {
  const traceloopSpy = {
    initialize: vi.fn(),
    withTool: vi.fn((_config: unknown, fn: () => unknown) => fn()),
    forceFlush: vi.fn().mockResolvedValue(undefined),
  };
  // Regular functions (not arrows) so they work as constructors with `new`
  const consoleSpanExporterSpy = vi.fn().mockImplementation(function () {});
  const otlpTraceExporterSpy = vi.fn().mockImplementation(function () {});

  return {
    mockConfig: {
      traceloopAvailable: true,
      sdkTraceNodeAvailable: true,
      exporterOtlpProtoAvailable: true,
      traceloopSpy,
      consoleSpanExporterSpy,
      otlpTraceExporterSpy,
    },
  };
});

vi.mock("./optional-deps", () => ({
  loadTraceloop: () => (mockConfig.traceloopAvailable ? mockConfig.traceloopSpy : null),
  loadSdkTraceNode: () =>
    mockConfig.sdkTraceNodeAvailable
      ? { ConsoleSpanExporter: mockConfig.consoleSpanExporterSpy }
      : null,
  loadExporterOtlpProto: () =>
    mockConfig.exporterOtlpProtoAvailable
      ? { OTLPTraceExporter: mockConfig.otlpTraceExporterSpy }
      : null,
}));

const ORIGINAL_ENV = { ...process.env };

/** Log lines written through the logger (stderr) */
function loggedLines(spy: MockInstance<typeof console.error>): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

let stderrSpy: MockInstance<typeof console.error>;

beforeEach(() => {
  vi.resetModules();

  delete process.env.OTEL_TRACING_ENABLED;
  delete process.env.OTEL_CAPTURE_AI_PAYLOADS;
  delete process.env.OTEL_EXPORTER_TYPE;
  delete process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  delete process.env.LOG_LEVEL;

  mockConfig.traceloopSpy.initialize.mockClear();
  mockConfig.traceloopSpy.withTool.mockClear();
  mockConfig.traceloopSpy.forceFlush.mockClear();
  mockConfig.consoleSpanExporterSpy.mockClear();
  mockConfig.otlpTraceExporterSpy.mockClear();

  mockConfig.traceloopAvailable = true;
  mockConfig.sdkTraceNodeAvailable = true;
  mockConfig.exporterOtlpProtoAvailable = true;

  stderrSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  // initializeTracing registers SIGTERM/SIGINT flush handlers; keep them off the test process
  vi.spyOn(process, "on").mockReturnValue(process);
});

afterEach(() => {
  vi.restoreAllMocks();
  process.env = { ...ORIGINAL_ENV };
});

describe("SDK packages absent", () => {
  beforeEach(() => {
    mockConfig.traceloopAvailable = false;
    mockConfig.sdkTraceNodeAvailable = false;
    mockConfig.exporterOtlpProtoAvailable = false;
  });

  it("withTool calls the handler directly", async () => {
    const tracing = await import("./index.js");
    const handler = vi.fn().mockResolvedValue("test-result");

    const result = await tracing.withTool({ name: "kubectl_get_resource" }, handler);

    expect(result).toBe("test-result");
    expect(handler).toHaveBeenCalledOnce();
  });

  it("getTracer returns a usable (no-op) tracer", async () => {
    const tracing = await import("./index.js");
    const tracer = tracing.getTracer();

    expect(tracer.startActiveSpan).toBeTypeOf("function");
    expect(tracer.startSpan).toBeTypeOf("function");
  });

  it("warns and stays off when OTEL_TRACING_ENABLED=true", async () => {
    process.env.OTEL_TRACING_ENABLED = "true";
    const tracing = await import("./index.js");

    expect(tracing.initializeTracing()).toBe(false);
    expect(loggedLines(stderrSpy)).toContainEqual(
      expect.stringContaining("@traceloop/node-server-sdk is not installed")
    );
  });

  it("flushTracing resolves without the SDK", async () => {
    const tracing = await import("./index.js");
    await expect(tracing.flushTracing()).resolves.toBeUndefined();
  });
});

describe("tracing disabled", () => {
  it("does not call traceloop.initialize", async () => {
    const tracing = await import("./index.js");

    expect(tracing.initializeTracing()).toBe(false);
    expect(mockConfig.traceloopSpy.initialize).not.toHaveBeenCalled();
    expect(stderrSpy).not.toHaveBeenCalled();
  });

  it("withTool stays a passthrough until tracing is initialized", async () => {
    const tracing = await import("./index.js");

    const result = await tracing.withTool({ name: "kubectl_get_resource" }, async () => "direct");

    expect(result).toBe("direct");
    expect(mockConfig.traceloopSpy.withTool).not.toHaveBeenCalled();
  });
});

describe("tracing enabled", () => {
  beforeEach(() => {
    process.env.OTEL_TRACING_ENABLED = "true";
  });

  it("calls traceloop.initialize with the service configuration", async () => {
    const tracing = await import("./index.js");

    expect(tracing.initializeTracing()).toBe(true);
    expect(mockConfig.traceloopSpy.initialize).toHaveBeenCalledOnce();
    expect(mockConfig.traceloopSpy.initialize).toHaveBeenCalledWith(
      expect.objectContaining({
        appName: "kubectl-toolbridge",
        disableBatch: true,
        traceContent: false,
        silenceInitializationMessage: true,
      })
    );
    expect(mockConfig.consoleSpanExporterSpy).toHaveBeenCalledOnce();
  });

  it("initializes only once", async () => {
    const tracing = await import("./index.js");

    tracing.initializeTracing();
    expect(tracing.initializeTracing()).toBe(true);

    expect(mockConfig.traceloopSpy.initialize).toHaveBeenCalledOnce();
  });

  it("enables content capture when OTEL_CAPTURE_AI_PAYLOADS=true", async () => {
    process.env.OTEL_CAPTURE_AI_PAYLOADS = "true";
    const tracing = await import("./index.js");

    tracing.initializeTracing();

    expect(tracing.isCaptureAiPayloads).toBe(true);
    expect(mockConfig.traceloopSpy.initialize).toHaveBeenCalledWith(
      expect.objectContaining({ traceContent: true })
    );
  });

  it("routes withTool and flushTracing through traceloop once initialized", async () => {
    const tracing = await import("./index.js");
    tracing.initializeTracing();

    const result = await tracing.withTool({ name: "kubectl_get_resource" }, async () => "traced");
    await tracing.flushTracing();

    expect(result).toBe("traced");
    expect(mockConfig.traceloopSpy.withTool).toHaveBeenCalledOnce();
    expect(mockConfig.traceloopSpy.forceFlush).toHaveBeenCalledOnce();
  });

  it("refuses the console exporter when stdout carries the protocol", async () => {
    const tracing = await import("./index.js");

    expect(tracing.initializeTracing({ stdoutReserved: true })).toBe(false);
    expect(mockConfig.traceloopSpy.initialize).not.toHaveBeenCalled();
    expect(mockConfig.consoleSpanExporterSpy).not.toHaveBeenCalled();
    expect(loggedLines(stderrSpy)).toContainEqual(
      expect.stringContaining("Set OTEL_EXPORTER_TYPE=otlp to trace the tool server")
    );
  });

  it("allows the OTLP exporter in the tool server", async () => {
    process.env.OTEL_EXPORTER_TYPE = "otlp";
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT = "http://localhost:4318";
    const tracing = await import("./index.js");

    expect(tracing.initializeTracing({ stdoutReserved: true })).toBe(true);
  });
});

describe("span exporter selection", () => {
  beforeEach(() => {
    process.env.OTEL_TRACING_ENABLED = "true";
  });

  it("throws when OTLP is requested but the package is missing", async () => {
    process.env.OTEL_EXPORTER_TYPE = "otlp";
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT = "http://localhost:4318";
    mockConfig.exporterOtlpProtoAvailable = false;
    const tracing = await import("./index.js");

    expect(() => tracing.initializeTracing()).toThrow(
      "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto"
    );
  });

  it("throws when OTLP is requested without an endpoint", async () => {
    process.env.OTEL_EXPORTER_TYPE = "otlp";
    const tracing = await import("./index.js");

    expect(() => tracing.initializeTracing()).toThrow("OTEL_EXPORTER_OTLP_ENDPOINT is required");
  });

  it("throws when the console exporter's package is missing", async () => {
    mockConfig.sdkTraceNodeAvailable = false;
    const tracing = await import("./index.js");

    expect(() => tracing.initializeTracing()).toThrow(
      "Console exporter requires @opentelemetry/sdk-trace-node"
    );
  });

  it("throws for an unsupported exporter type", async () => {
    process.env.OTEL_EXPORTER_TYPE = "zipkin";
    const tracing = await import("./index.js");

    expect(() => tracing.initializeTracing()).toThrow('Unsupported OTEL_EXPORTER_TYPE: "zipkin"');
  });

  it.each([
    ["http://localhost:4318", "http://localhost:4318/v1/traces"],
    ["http://localhost:4318/", "http://localhost:4318/v1/traces"],
    ["http://localhost:4318/v1/traces", "http://localhost:4318/v1/traces"],
  ])("sends OTLP spans for endpoint %s to %s", async (endpoint, url) => {
    process.env.OTEL_EXPORTER_TYPE = "otlp";
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT = endpoint;
    const tracing = await import("./index.js");

    tracing.initializeTracing();

    expect(mockConfig.otlpTraceExporterSpy).toHaveBeenCalledWith({ url });
  });
});

describe("isCaptureAiPayloads", () => {
  it("defaults to false", async () => {
    const tracing = await import("./index.js");
    expect(tracing.isCaptureAiPayloads).toBe(false);
  });

  it("is false for values other than 'true'", async () => {
    process.env.OTEL_CAPTURE_AI_PAYLOADS = "yes";
    const tracing = await import("./index.js");
    expect(tracing.isCaptureAiPayloads).toBe(false);
  });
});
