/**
 * kubectl-get core - Lists Kubernetes resources
 *
 * The descriptor is what the model sees (name, description, parameters); the
 * execution builds the kubectl argument array and runs it. The tool registry
 * wraps both into a tool the MCP server exposes.
 */

import { executeKubectl, type KubectlResult, type KubectlRunner } from "../../utils/kubectl";
import { stringArgument } from "../arguments";
import { declareTool } from "../schema";
import type { ValidatedArguments } from "../types";

export const KUBECTL_GET_TOOL = "kubectl_get_resource";

export const OUTPUT_FORMATS = ["json", "yaml", "wide", "name"] as const;

export const kubectlGetDescriptor = declareTool({
  name: KUBECTL_GET_TOOL,
  description: `Display one or many Kubernetes resources.

By default returns a TABLE (one line per resource, with columns like NAME,
STATUS, READY, AGE). Use this to:
- See what resources exist in a namespace or cluster
- Check basic status (Running, Pending, CrashLoopBackOff, etc.)
- Filter by label with a selector

For events, configuration and conditions of a resource, use
kubectl_describe_resource instead.

Common resources: pods, deployments, services, nodes, configmaps, namespaces.`,
  parameters: {
    resource: {
      type: "string",
      required: true,
      description: "Kubernetes resource type (e.g., 'pods', 'deployments', 'nodes')",
    },
    namespace: {
      type: "string",
      required: false,
      description: "Namespace to query. Leave blank for cluster-scoped resources or the default namespace",
    },
    selector: {
      type: "string",
      required: false,
      description: "Label selector to filter the list (e.g., 'app=nginx')",
    },
    output_format: {
      type: "string",
      required: false,
      description: "Output format: 'json', 'yaml', 'wide', or 'name'",
      enum: OUTPUT_FORMATS,
    },
  },
});

/**
 * kubectl get <resource> [-n namespace] [-o format] [--selector selector]
 */
export function buildKubectlGetArgs(args: ValidatedArguments): string[] {
  const resource = stringArgument(args, "resource") ?? "";
  const namespace = stringArgument(args, "namespace");
  const outputFormat = stringArgument(args, "output_format");
  const selector = stringArgument(args, "selector");

  const kubectlArgs = ["get", resource];
  if (namespace) {
    kubectlArgs.push("-n", namespace);
  }
  if (outputFormat) {
    kubectlArgs.push("-o", outputFormat);
  }
  if (selector) {
    kubectlArgs.push("--selector", selector);
  }
  return kubectlArgs;
}

export async function kubectlGet(
  args: ValidatedArguments,
  kubectl: KubectlRunner = executeKubectl
): Promise<KubectlResult> {
  return kubectl(buildKubectlGetArgs(args));
}
