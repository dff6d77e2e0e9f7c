import type { Component, ScannerCategory } from "../types.js";
import { ComponentId, ScannerId } from "../types/domain/scanner.js";

export const ReportColumn = {
  Namespace: "Namespace",
  Resource: "Resource",
  Vulnerabilities: "Vulnerabilities",
  Misconfigurations: "Misconfigurations",
  Secrets: "Secrets",
  RbacAssessment: "RBAC Assessment",
  InfraAssessment: "Kubernetes Infra Assessment"
} as const;

export type ReportColumn = (typeof ReportColumn)[keyof typeof ReportColumn];

export const WORKLOAD_COLUMNS: readonly ReportColumn[] = [
  ReportColumn.Vulnerabilities,
  ReportColumn.Misconfigurations,
  ReportColumn.Secrets
];

export const RBAC_COLUMNS: readonly ReportColumn[] = [ReportColumn.RbacAssessment];

export const INFRA_COLUMNS: readonly ReportColumn[] = [ReportColumn.InfraAssessment];

export function columnHeading(
  scanners: ReadonlySet<ScannerCategory>,
  components: ReadonlySet<Component>,
  available: readonly ReportColumn[]
): ReportColumn[] {
  const enabled = new Set<ReportColumn>();

  for (const scanner of scanners) {
    switch (scanner) {
      case ScannerId.Vulnerability:
        enabled.add(ReportColumn.Vulnerabilities);
        break;
      case ScannerId.Misconfiguration:
        if (components.has(ComponentId.Workload)) enabled.add(ReportColumn.Misconfigurations);
        if (components.has(ComponentId.Infra)) enabled.add(ReportColumn.InfraAssessment);
        break;
      case ScannerId.Secret:
        enabled.add(ReportColumn.Secrets);
        break;
      case ScannerId.Rbac:
        enabled.add(ReportColumn.RbacAssessment);
        break;
    }
  }

  return [ReportColumn.Namespace, ReportColumn.Resource, ...available.filter((column) => enabled.has(column))];
}
