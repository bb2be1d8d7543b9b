/**
 * tracing/index.ts - OpenTelemetry setup for kubectl-toolbridge
 *
 * Tracing is opt-in: nothing is initialized unless OTEL_TRACING_ENABLED=true.
 * Until then the OTel API hands out a no-op tracer, so the spans created in
 * utils/kubectl.ts and tracing/tool-tracing.ts cost nothing.
 *
 * The SDK packages (@traceloop/node-server-sdk, @opentelemetry/sdk-trace-node,
 * @opentelemetry/exporter-trace-otlp-proto) are optional peer dependencies,
 * loaded through optional-deps.ts. When they are absent, initialization is
 * skipped with a warning.
 *
 * OpenLLMetry owns the TracerProvider. It auto-instruments the LangChain chat
 * call, and our own tool and kubectl spans share its provider and exporter.
 *
 * Exporters (OTEL_EXPORTER_TYPE):
 * - console (default): prints spans to stdout. Refused in the stdio tool
 *   server, where stdout belongs to the MCP protocol.
 * - otlp: sends spans to OTEL_EXPORTER_OTLP_ENDPOINT.
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { logger } from "../utils/logger";
import {
  loadTraceloop,
  loadSdkTraceNode,
  loadExporterOtlpProto,
} from "./optional-deps";

const traceloop = loadTraceloop();
const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "kubectl-toolbridge";

/**
 * When true, tool arguments and prompts are written to span attributes.
 * Off by default: they can carry cluster names and user text.
 */
const isCaptureAiPayloads = process.env.OTEL_CAPTURE_AI_PAYLOADS === "true";

export interface TracingOptions {
  /**
   * Set by the stdio tool server. The console exporter would write spans
   * into the protocol stream, so it is refused there.
   */
  stdoutReserved?: boolean;
}

let initialized = false;

function createSpanExporter(options: TracingOptions): SpanExporter | null {
  const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    logger.info(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (options.stdoutReserved) {
    logger.warn(
      "[OTel] The console exporter writes to stdout, which carries the MCP protocol here. " +
        "Set OTEL_EXPORTER_TYPE=otlp to trace the tool server. Tracing disabled."
    );
    return null;
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  logger.info("[OTel] Using console exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

/**
 * Initializes tracing once per process, if enabled and installed.
 *
 * Entry points call this before anything that creates spans.
 *
 * @returns true when a tracer provider was registered
 */
export function initializeTracing(options: TracingOptions = {}): boolean {
  if (initialized) return true;
  if (process.env.OTEL_TRACING_ENABLED !== "true") return false;

  if (!traceloop) {
    logger.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @traceloop/node-server-sdk is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
    return false;
  }

  const exporter = createSpanExporter(options);
  if (!exporter) return false;

  traceloop.initialize({
    appName: SERVICE_NAME,
    exporter,
    // Short-lived process: export each span as soon as it ends
    disableBatch: true,
    traceContent: isCaptureAiPayloads,
    silenceInitializationMessage: true,
  });
  initialized = true;
  logger.info(`[OTel] Tracing enabled for ${SERVICE_NAME}`);

  const traceloopSdk = traceloop;
  const shutdown = async () => {
    try {
      await traceloopSdk.forceFlush();
      logger.info("[OTel] Tracing shut down gracefully");
    } catch (error) {
      logger.error("[OTel] Error shutting down tracing", error);
    }
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  return true;
}

/**
 * Flushes pending spans. Safe to call when tracing is off.
 */
export async function flushTracing(): Promise<void> {
  if (initialized && traceloop) {
    await traceloop.forceFlush();
  }
}

/**
 * Tracer from the global provider; a no-op tracer when tracing is off.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * OpenLLMetry's withTool when the SDK is installed, otherwise a passthrough.
 */
export function withTool<T>(config: { name: string }, fn: () => Promise<T>): Promise<T> {
  if (traceloop && initialized) {
    return traceloop.withTool(config, fn);
  }
  return fn();
}

export { isCaptureAiPayloads };
