/**
 * optional-deps.ts - Loaders for the optional OTel SDK packages
 *
 * Each loader returns the module, or null when the package is not installed.
 * Any other failure (a syntax error, a broken install) is rethrown so it
 * shows up at startup.
 *
 * Keeping the require() calls here lets tests vi.mock("./optional-deps") to
 * simulate packages being present or absent.
 */

function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}

/**
 * @traceloop/node-server-sdk (OpenLLMetry): LLM auto-instrumentation and the
 * TracerProvider.
 */
export function loadTraceloop(): typeof import("@traceloop/node-server-sdk") | null {
  try {
    return require("@traceloop/node-server-sdk");
  } catch (error) {
    if (isModuleNotFound(error, "@traceloop/node-server-sdk")) return null;
    throw error;
  }
}

/**
 * @opentelemetry/sdk-trace-node: ConsoleSpanExporter.
 */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  try {
    return require("@opentelemetry/sdk-trace-node");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/sdk-trace-node")) return null;
    throw error;
  }
}

/**
 * @opentelemetry/exporter-trace-otlp-proto: OTLPTraceExporter.
 */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  try {
    return require("@opentelemetry/exporter-trace-otlp-proto");
  } catch (error) {
    if (isModuleNotFound(error, "@opentelemetry/exporter-trace-otlp-proto")) return null;
    throw error;
  }
}
