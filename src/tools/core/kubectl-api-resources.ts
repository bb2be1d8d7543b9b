/**
 * kubectl-api-resources core - Lists the resource types the cluster serves
 *
 * Useful before kubectl_get_resource when the model doesn't know whether a
 * type (or a CRD) exists, or what it is called.
 */

import { executeKubectl, type KubectlResult, type KubectlRunner } from "../../utils/kubectl";
import { declareTool } from "../schema";

export const KUBECTL_API_RESOURCES_TOOL = "kubectl_get_api_resources";

export const kubectlApiResourcesDescriptor = declareTool({
  name: KUBECTL_API_RESOURCES_TOOL,
  description: `Get all available Kubernetes API resources.

Returns JSON listing every resource type the cluster supports (built-in and
custom), with its API group, kind, short names, verbs and whether it is
namespaced.`,
  parameters: {},
});

export async function kubectlApiResources(
  kubectl: KubectlRunner = executeKubectl
): Promise<KubectlResult> {
  return kubectl(["api-resources", "-o", "json"]);
}
