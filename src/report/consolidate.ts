import type { AggregateReport, ConsolidatedReport, ScannedResource } from "../types.js";
import { fullname } from "./resource.js";

/**
 * Folds the vulnerability and misconfiguration sides of a report into one list with
 * at most one entry per resource fullname. A resource present on both sides keeps the
 * misconfiguration entry's identity, error and payload, and its results come first.
 *
 * The order of `findings` is not part of the contract; use `sortByFullname` for stable output.
 */
export function consolidateReport(report: AggregateReport): ConsolidatedReport {
  const index = new Map<string, ScannedResource>();

  for (const misconfig of report.misconfigurations ?? []) {
    index.set(fullname(misconfig), { ...misconfig, results: [...misconfig.results] });
  }

  for (const vuln of report.vulnerabilities ?? []) {
    const key = fullname(vuln);
    const existing = index.get(key);

    if (existing) {
      const merged: ScannedResource = {
        namespace: existing.namespace,
        kind: existing.kind,
        name: existing.name,
        results: [...existing.results, ...vuln.results]
      };
      if (existing.error) merged.error = existing.error;
      if (existing.report !== undefined) merged.report = existing.report;
      index.set(key, merged);
      continue;
    }

    index.set(key, { ...vuln, results: [...vuln.results] });
  }

  return {
    schemaVersion: report.schemaVersion,
    clusterName: report.clusterName,
    findings: Array.from(index.values())
  };
}
