/**
 * kubectl-describe core - Detailed information about resources
 *
 * describe answers "why isn't this working?" where get answers "what
 * exists?". Its Events section shows scheduling decisions, image pulls,
 * failing health checks and crashes.
 *
 * Unlike most describe wrappers, name is optional: without it kubectl
 * describes every resource of the type, and a name works as a prefix.
 */

import { executeKubectl, type KubectlResult, type KubectlRunner } from "../../utils/kubectl";
import { stringArgument } from "../arguments";
import { declareTool } from "../schema";
import type { ValidatedArguments } from "../types";

export const KUBECTL_DESCRIBE_TOOL = "kubectl_describe_resource";

export const kubectlDescribeDescriptor = declareTool({
  name: KUBECTL_DESCRIBE_TOOL,
  description: `Show detailed information about a specific resource or group of resources.

Returns configuration, current status and conditions, related resources
(controllers, volumes) and Events. Events explain WHY something is not
working from Kubernetes' perspective.

Select by exact name, name prefix, or label selector. Use
kubectl_get_resource first to find resource names.`,
  parameters: {
    resource_type: {
      type: "string",
      required: true,
      description: "Kubernetes resource type (e.g., 'pod', 'deployment', 'node')",
    },
    name: {
      type: "string",
      required: false,
      description: "Name or name prefix of the resource. If omitted, describes all resources of the given type.",
    },
    namespace: {
      type: "string",
      required: false,
      description: "Namespace to query. Leave blank for cluster-scoped resources or the default namespace.",
    },
    selector: {
      type: "string",
      required: false,
      description: "Label selector to filter resources",
    },
  },
});

/**
 * kubectl describe <type> [name] [-n namespace] [--selector selector]
 */
export function buildKubectlDescribeArgs(args: ValidatedArguments): string[] {
  const resourceType = stringArgument(args, "resource_type") ?? "";
  const name = stringArgument(args, "name");
  const namespace = stringArgument(args, "namespace");
  const selector = stringArgument(args, "selector");

  const kubectlArgs = ["describe", resourceType];
  if (name) {
    kubectlArgs.push(name);
  }
  if (namespace) {
    kubectlArgs.push("-n", namespace);
  }
  if (selector) {
    kubectlArgs.push("--selector", selector);
  }
  return kubectlArgs;
}

export async function kubectlDescribe(
  args: ValidatedArguments,
  kubectl: KubectlRunner = executeKubectl
): Promise<KubectlResult> {
  return kubectl(buildKubectlDescribeArgs(args));
}
