/**
 * Core kubectl tools - descriptors and command builders
 *
 * Usage:
 *   import { kubectlGet, kubectlGetDescriptor } from "./tools/core";
 */

export {
  kubectlApiResources,
  kubectlApiResourcesDescriptor,
  KUBECTL_API_RESOURCES_TOOL,
} from "./kubectl-api-resources";

export {
  kubectlGet,
  kubectlGetDescriptor,
  buildKubectlGetArgs,
  KUBECTL_GET_TOOL,
  OUTPUT_FORMATS,
} from "./kubectl-get";

export {
  kubectlDescribe,
  kubectlDescribeDescriptor,
  buildKubectlDescribeArgs,
  KUBECTL_DESCRIBE_TOOL,
} from "./kubectl-describe";
