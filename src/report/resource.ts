import type { AggregateReport, Result, ScannedArtifact, ScannedResource, Severity } from "../types.js";

const KUBERNETES_RESULT_TYPE = "kubernetes";

export function fullname(resource: Pick<ScannedResource, "namespace" | "kind" | "name">): string {
  return `${resource.namespace ?? ""}/${resource.kind ?? ""}/${resource.name ?? ""}`.toLowerCase();
}

export function createResource(
  artifact: ScannedArtifact,
  results: readonly Result[],
  err?: unknown,
  report?: unknown
): ScannedResource {
  const fixed = results.map((result) =>
    // the scanner works on a temp manifest file; point the target at the resource instead
    result.type === KUBERNETES_RESULT_TYPE
      ? { ...result, target: `${artifact.kind}/${artifact.name}` }
      : { ...result }
  );

  const resource: ScannedResource = {
    namespace: artifact.namespace ?? "",
    kind: artifact.kind,
    name: artifact.name,
    results: fixed
  };

  if (report !== undefined) {
    resource.report = report;
  }

  if (err != null) {
    resource.error = err instanceof Error ? err.message : String(err);
  }

  return resource;
}

export function countFindings(resource: ScannedResource): number {
  return resource.results.reduce(
    (sum, result) =>
      sum +
      (result.misconfigurations?.length ?? 0) +
      (result.vulnerabilities?.length ?? 0) +
      (result.secrets?.length ?? 0),
    0
  );
}

export function resultFailed(result: Result): boolean {
  if ((result.vulnerabilities?.length ?? 0) > 0) return true;
  if ((result.secrets?.length ?? 0) > 0) return true;
  return (result.misconfigurations ?? []).some((m) => (m.status ?? "FAIL") === "FAIL");
}

export function cloneResult(result: Result): Result {
  const copy: Result = { ...result };
  if (result.misconfSummary) copy.misconfSummary = { ...result.misconfSummary };
  if (result.misconfigurations) copy.misconfigurations = [...result.misconfigurations];
  if (result.vulnerabilities) copy.vulnerabilities = [...result.vulnerabilities];
  if (result.secrets) copy.secrets = [...result.secrets];
  return copy;
}

export function cloneResource(resource: ScannedResource): ScannedResource {
  return { ...resource, results: resource.results.map(cloneResult) };
}

export function filterBySeverity(resource: ScannedResource, severities: readonly Severity[]): ScannedResource {
  const allowed = new Set(severities);
  const results = resource.results.map((result): Result => {
    const copy: Result = { ...result };
    if (result.misconfigurations) copy.misconfigurations = result.misconfigurations.filter((m) => allowed.has(m.severity));
    if (result.vulnerabilities) copy.vulnerabilities = result.vulnerabilities.filter((v) => allowed.has(v.severity));
    if (result.secrets) copy.secrets = result.secrets.filter((s) => allowed.has(s.severity));
    return copy;
  });
  return { ...resource, results };
}

/** Findings outside `severities`, when given, do not count as failures. */
export function reportFailed(report: AggregateReport, severities?: readonly Severity[]): boolean {
  return [...report.vulnerabilities, ...report.misconfigurations].some((resource) => {
    const scoped = severities ? filterBySeverity(resource, severities) : resource;
    return scoped.results.some(resultFailed);
  });
}

export function sortByFullname(resources: readonly ScannedResource[]): ScannedResource[] {
  return resources
    .map((resource) => ({ key: fullname(resource), resource }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map((entry) => entry.resource);
}
