import type { DetectedMisconfiguration, Result, ScannedResource, ScannerCategory } from "../types.js";
import { ScannerId } from "../types/domain/scanner.js";

const ACCESS_CONTROL_KINDS = new Set(["Role", "RoleBinding", "ClusterRole", "ClusterRoleBinding"]);

export const SYSTEM_NAMESPACE = "kube-system";
export const INFRA_CHECK_PREFIX = "KCV";

export type Placement =
  | { kind: "access-control" }
  | { kind: "infrastructure"; workload: ScannedResource; infra: ScannedResource }
  | { kind: "workload" }
  | { kind: "dropped" };

export function isAccessControlResource(resource: ScannedResource): boolean {
  return ACCESS_CONTROL_KINDS.has(resource.kind);
}

export function isInfrastructureResource(resource: ScannedResource): boolean {
  return resource.kind === "Pod" && resource.namespace === SYSTEM_NAMESPACE;
}

export function isInfraCheck(misconfig: DetectedMisconfiguration): boolean {
  return misconfig.id.startsWith(INFRA_CHECK_PREFIX);
}

function copyResource(resource: ScannedResource, results: Result[]): ScannedResource {
  const copy: ScannedResource = {
    namespace: resource.namespace,
    kind: resource.kind,
    name: resource.name,
    results
  };
  if (resource.error) copy.error = resource.error;
  if (resource.report !== undefined) copy.report = resource.report;
  return copy;
}

function copyResult(result: Result, misconfigurations: DetectedMisconfiguration[]): Result {
  const copy: Result = {
    target: result.target,
    class: result.class,
    type: result.type,
    misconfigurations
  };
  if (result.misconfSummary) copy.misconfSummary = { ...result.misconfSummary };
  return copy;
}

export function splitByOrigin(resource: ScannedResource): { workload: ScannedResource; infra: ScannedResource } {
  const workloadResults: Result[] = [];
  const infraResults: Result[] = [];

  for (const result of resource.results) {
    const workloadMisconfigs: DetectedMisconfiguration[] = [];
    const infraMisconfigs: DetectedMisconfiguration[] = [];

    for (const misconfig of result.misconfigurations ?? []) {
      if (isInfraCheck(misconfig)) {
        infraMisconfigs.push(misconfig);
        continue;
      }
      workloadMisconfigs.push(misconfig);
    }

    if (workloadMisconfigs.length > 0) {
      workloadResults.push(copyResult(result, workloadMisconfigs));
    }
    if (infraMisconfigs.length > 0) {
      infraResults.push(copyResult(result, infraMisconfigs));
    }
  }

  return {
    workload: copyResource(resource, workloadResults),
    infra: copyResource(resource, infraResults)
  };
}

// First match wins: access-control, then infrastructure, then workload.
export function classifyResource(
  resource: ScannedResource,
  scanners: ReadonlySet<ScannerCategory>
): Placement {
  const accessControl = isAccessControlResource(resource);

  if (scanners.has(ScannerId.Rbac) && accessControl) {
    return { kind: "access-control" };
  }
  if (isInfrastructureResource(resource)) {
    return { kind: "infrastructure", ...splitByOrigin(resource) };
  }
  if (scanners.has(ScannerId.Misconfiguration) && !accessControl) {
    return { kind: "workload" };
  }
  return { kind: "dropped" };
}
