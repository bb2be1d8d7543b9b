/**
 * tool-tracing.ts - Spans around tool invocations
 *
 * Wraps a tool handler so each call gets an "execute_tool {name}" span with
 * the OTel GenAI tool attributes. kubectl spans created inside the handler
 * nest under it:
 *
 *   execute_tool kubectl_get_resource
 *   └── kubectl get pods
 *
 * A failed invocation (success: false) is still a tool that ran correctly,
 * so the span status stays OK and the failure kind is recorded as an
 * attribute. Only a thrown exception marks the span as ERROR.
 */

import { randomUUID } from "crypto";
import { SpanKind, SpanStatusCode, context, trace } from "@opentelemetry/api";
import { getTracer, isCaptureAiPayloads, withTool } from "./index";
import type { ToolInvocationResult } from "../tools/types";

/**
 * @param toolName - e.g. "kubectl_get_resource"
 * @param handler - the function that executes the tool
 * @returns the handler, traced
 */
export function withToolTracing<TInput>(
  toolName: string,
  handler: (input: TInput) => Promise<ToolInvocationResult>
): (input: TInput) => Promise<ToolInvocationResult> {
  return (input: TInput) =>
    withTool({ name: toolName }, async () => {
      const span = getTracer().startSpan(`execute_tool ${toolName}`, {
        kind: SpanKind.INTERNAL,
      });

      span.setAttribute("gen_ai.operation.name", "execute_tool");
      span.setAttribute("gen_ai.tool.name", toolName);
      span.setAttribute("gen_ai.tool.type", "function");
      span.setAttribute("gen_ai.tool.call.id", randomUUID());
      if (isCaptureAiPayloads) {
        span.setAttribute("gen_ai.tool.call.arguments", JSON.stringify(input, null, 2));
      }

      // context.with() keeps the span active across the awaits inside the handler
      const activeContext = trace.setSpan(context.active(), span);

      return context.with(activeContext, async () => {
        try {
          const result = await handler(input);
          span.setAttribute("toolbridge.tool.success", result.success);
          if (!result.success) {
            span.setAttribute("toolbridge.tool.error_kind", result.error.kind);
          }
          span.setStatus({ code: SpanStatusCode.OK });
          return result;
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          throw error;
        } finally {
          span.end();
        }
      });
    });
}
