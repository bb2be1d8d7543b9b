/**
 * kubectl.ts - Executes kubectl commands as subprocesses
 *
 * Takes an array of kubectl arguments (e.g., ["get", "pods", "-n", "default"]),
 * runs kubectl with them and returns its stdout, or an error message when it
 * fails.
 *
 * spawnSync with an args array bypasses the shell: every element reaches
 * kubectl as one argument, so a value like "pods; rm -rf /" is just a
 * resource kubectl cannot find. Arguments here come from a language model,
 * so they are never joined into a shell string.
 *
 * Each execution gets a CLIENT span "kubectl {operation} {resource}" with
 * k8s.* attributes and the OTel process.* semconv attributes.
 */

import { spawnSync } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

export const KUBECTL_TIMEOUT_MS = 30_000;

/**
 * Result from executing a kubectl command.
 *
 * Success is decided by the exit code, not by inspecting the output: logs
 * and describe output often contain the word "Error" legitimately.
 */
export interface KubectlResult {
  output: string;
  isError: boolean;
  /** Process exit code; -1 when kubectl never ran or was killed. */
  exitCode: number;
}

/**
 * Anything that can run kubectl. Tools take one of these so tests can
 * substitute a fake.
 */
export type KubectlRunner = (args: string[]) => KubectlResult;

interface KubectlMetadata {
  operation: string;
  resource: string;
  namespace: string | undefined;
}

/**
 * Pulls span metadata out of the args:
 * - get pods -n default   → operation=get, resource=pods, namespace=default
 * - describe pod nginx    → operation=describe, resource=pod
 * - api-resources -o json → operation=api-resources, resource=unknown
 */
function extractKubectlMetadata(args: string[]): KubectlMetadata {
  const operation = args[0] || "unknown";
  const resource = args[1] && !args[1].startsWith("-") ? args[1] : "unknown";

  let namespaceIndex = args.indexOf("-n");
  if (namespaceIndex === -1) {
    namespaceIndex = args.indexOf("--namespace");
  }
  const namespace =
    namespaceIndex !== -1 && args[namespaceIndex + 1]
      ? args[namespaceIndex + 1]
      : undefined;

  return { operation, resource, namespace };
}

function hasErrorCode(error: Error, code: string): boolean {
  return "code" in error && error.code === code;
}

/**
 * Turns a spawn failure into the message the caller sees.
 */
function describeSpawnError(error: Error, command: string): string {
  if (hasErrorCode(error, "ETIMEDOUT")) {
    return `Command timed out after ${KUBECTL_TIMEOUT_MS / 1000} seconds`;
  }
  if (hasErrorCode(error, "ENOENT")) {
    return "kubectl not found.";
  }
  return `Error executing "${command}": ${error.message}`;
}

/**
 * Executes a kubectl command and returns a structured result.
 *
 * @param args - arguments to pass to kubectl, without "kubectl" itself
 *
 * Example:
 *   executeKubectl(["get", "pods", "-n", "default"])
 *   // { output: "NAME  READY  STATUS...", isError: false, exitCode: 0 }
 *
 *   executeKubectl(["get", "nonexistent"])
 *   // { output: 'Error executing "kubectl get nonexistent": ...', isError: true, exitCode: 1 }
 */
export function executeKubectl(args: string[]): KubectlResult {
  const tracer = getTracer();
  const metadata = extractKubectlMetadata(args);
  const startTime = Date.now();

  // For messages and spans only; never executed as a string
  const command = `kubectl ${args.join(" ")}`;

  return tracer.startActiveSpan(
    `kubectl ${metadata.operation} ${metadata.resource}`,
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("k8s.client", "kubectl");
      span.setAttribute("k8s.operation", metadata.operation);
      span.setAttribute("k8s.resource", metadata.resource);
      span.setAttribute("k8s.args", args.join(" "));
      if (metadata.namespace) {
        span.setAttribute("k8s.namespace", metadata.namespace);
      }
      span.setAttribute("process.executable.name", "kubectl");
      span.setAttribute("process.command_args", ["kubectl", ...args]);

      try {
        const result = spawnSync("kubectl", args, {
          encoding: "utf-8",
          timeout: KUBECTL_TIMEOUT_MS,
        });

        span.setAttribute("k8s.duration_ms", Date.now() - startTime);

        // Spawn failures: kubectl missing, timeout kill
        if (result.error) {
          const message = describeSpawnError(result.error, command);
          span.setAttribute("process.exit.code", -1);
          span.setAttribute("error.type", result.error.name);
          span.recordException(result.error);
          span.setStatus({ code: SpanStatusCode.ERROR, message });

          return { output: message, isError: true, exitCode: -1 };
        }

        const exitCode = result.status ?? -1;
        span.setAttribute("process.exit.code", exitCode);

        // Non-zero exit: resource type unknown, forbidden, unreachable cluster...
        if (exitCode !== 0) {
          const errorMessage = result.stderr.trim() || "Unknown error";
          span.setAttribute("error.type", "KubectlError");
          span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage });

          return {
            output: `Error executing "${command}": ${errorMessage}`,
            isError: true,
            exitCode,
          };
        }

        span.setStatus({ code: SpanStatusCode.OK });
        return { output: result.stdout, isError: false, exitCode };
      } catch (error) {
        span.setAttribute("k8s.duration_ms", Date.now() - startTime);
        span.setAttribute("process.exit.code", -1);

        const err = error instanceof Error ? error : new Error(String(error));
        span.setAttribute("error.type", err.name);
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });

        return {
          output: `Error executing "${command}": ${err.message}`,
          isError: true,
          exitCode: -1,
        };
      } finally {
        span.end();
      }
    }
  );
}
