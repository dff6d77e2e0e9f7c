import type { AggregateReport, Component, ScannedResource, ScannerCategory } from "../types.js";
import { ComponentId, ScannerId } from "../types/domain/scanner.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { classifyResource } from "./classifier.js";
import { cloneResource } from "./resource.js";
import { INFRA_COLUMNS, RBAC_COLUMNS, WORKLOAD_COLUMNS, type ReportColumn } from "./columns.js";

export const WORKLOAD_ASSESSMENT = "Workload Assessment";
export const RBAC_ASSESSMENT = "RBAC Assessment";
export const INFRA_ASSESSMENT = "Infra Assessment";

export type NamedSubReport = {
  title: string;
  report: AggregateReport;
  columns: readonly ReportColumn[];
};

export type PartitionOptions = {
  scanners: Iterable<ScannerCategory>;
  components: Iterable<Component>;
  logger?: Logger;
};

export function logResourceErrors(report: AggregateReport, logger: Logger): void {
  for (const resource of report.vulnerabilities ?? []) {
    if (resource.error) {
      logger.error(`Error during vulnerabilities scan: ${resource.error}`, { resource: resource.name });
    }
  }
  for (const resource of report.misconfigurations ?? []) {
    if (resource.error) {
      logger.error(`Error during misconfiguration scan: ${resource.error}`, { resource: resource.name });
    }
  }
}

function subReport(
  source: AggregateReport,
  title: string,
  columns: readonly ReportColumn[],
  misconfigurations: ScannedResource[],
  vulnerabilities: ScannedResource[] = []
): NamedSubReport {
  return {
    title,
    columns,
    report: {
      schemaVersion: 0,
      clusterName: source.clusterName,
      vulnerabilities,
      misconfigurations,
      name: title
    }
  };
}

/**
 * Routes misconfiguration findings into workload, RBAC and infra sub-reports.
 * Vulnerability-origin resources always land in the workload sub-report, even when
 * the workload component is disabled. Every returned resource is a copy; the input
 * report is never shared or modified.
 */
export function partitionReport(report: AggregateReport, options: PartitionOptions): NamedSubReport[] {
  const scanners = new Set(options.scanners);
  const components = new Set(options.components);
  const logger = options.logger ?? noopLogger;

  logResourceErrors(report, logger);

  const withWorkload = components.has(ComponentId.Workload);
  const withInfra = components.has(ComponentId.Infra);

  const workloadMisconfig: ScannedResource[] = [];
  const infraMisconfig: ScannedResource[] = [];
  const rbacAssessment: ScannedResource[] = [];

  for (const resource of report.misconfigurations ?? []) {
    const placement = classifyResource(resource, scanners);
    switch (placement.kind) {
      case "access-control":
        rbacAssessment.push(cloneResource(resource));
        break;
      case "infrastructure":
        if (withInfra) infraMisconfig.push(placement.infra);
        if (withWorkload) workloadMisconfig.push(placement.workload);
        break;
      case "workload":
        if (withWorkload) workloadMisconfig.push(cloneResource(resource));
        break;
      case "dropped":
        break;
      default: {
        const unreachable: never = placement;
        throw new Error(`Unhandled placement: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  const vulnerabilities = (report.vulnerabilities ?? []).map(cloneResource);
  const reports: NamedSubReport[] = [];

  const workloadScanners =
    scanners.has(ScannerId.Misconfiguration) ||
    scanners.has(ScannerId.Vulnerability) ||
    scanners.has(ScannerId.Secret);

  if (workloadScanners && ((withWorkload && workloadMisconfig.length > 0) || vulnerabilities.length > 0)) {
    reports.push(subReport(report, WORKLOAD_ASSESSMENT, WORKLOAD_COLUMNS, workloadMisconfig, vulnerabilities));
  }

  if (scanners.has(ScannerId.Rbac) && rbacAssessment.length > 0) {
    reports.push(subReport(report, RBAC_ASSESSMENT, RBAC_COLUMNS, rbacAssessment));
  }

  if (scanners.has(ScannerId.Misconfiguration) && withInfra && infraMisconfig.length > 0) {
    reports.push(subReport(report, INFRA_ASSESSMENT, INFRA_COLUMNS, infraMisconfig));
  }

  return reports;
}
