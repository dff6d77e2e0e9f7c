import pc from "picocolors";
import type {
  AggregateReport,
  Component,
  OutputFormat,
  ReportMode,
  Result,
  ScannedResource,
  ScannerCategory,
  Severity
} from "../types.js";
import { SEVERITIES } from "../types/domain/severity.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { UnknownOutputFormatError, UnknownReportModeError } from "../errors/report.errors.js";
import { consolidateReport } from "./consolidate.js";
import { columnHeading, ReportColumn } from "./columns.js";
import { logResourceErrors, partitionReport, type NamedSubReport } from "./partition.js";
import { filterBySeverity, sortByFullname } from "./resource.js";

export type RenderOptions = {
  format: OutputFormat | string;
  report: ReportMode | string;
  scanners: ScannerCategory[];
  components: Component[];
  severities?: Severity[];
  color?: boolean;
  logger?: Logger;
};

type Colors = ReturnType<typeof pc.createColors>;

type SeverityCounts = Record<Severity, number>;

const SEVERITY_LETTERS: Record<Severity, string> = {
  critical: "C",
  high: "H",
  medium: "M",
  low: "L",
  unknown: "U"
};

function emptyCounts(): SeverityCounts {
  return { critical: 0, high: 0, medium: 0, low: 0, unknown: 0 };
}

function isFailing(status: string | undefined): boolean {
  return (status ?? "FAIL") === "FAIL";
}

function countColumn(resource: ScannedResource, column: ReportColumn): SeverityCounts {
  const counts = emptyCounts();
  for (const result of resource.results) {
    switch (column) {
      case ReportColumn.Vulnerabilities:
        for (const vuln of result.vulnerabilities ?? []) counts[vuln.severity] += 1;
        break;
      case ReportColumn.Secrets:
        for (const secret of result.secrets ?? []) counts[secret.severity] += 1;
        break;
      case ReportColumn.Misconfigurations:
      case ReportColumn.RbacAssessment:
      case ReportColumn.InfraAssessment:
        for (const misconfig of result.misconfigurations ?? []) {
          if (isFailing(misconfig.status)) counts[misconfig.severity] += 1;
        }
        break;
      default:
        break;
    }
  }
  return counts;
}

function formatCounts(counts: SeverityCounts, severities: readonly Severity[]): string {
  const parts = severities.filter((s) => counts[s] > 0).map((s) => `${SEVERITY_LETTERS[s]}:${counts[s]}`);
  return parts.length ? parts.join(" ") : "-";
}

function resourceLabel(resource: ScannedResource): string {
  return `${resource.kind}/${resource.name}`;
}

function rowsFor(subReport: NamedSubReport, severities: readonly Severity[]): ScannedResource[] {
  const consolidated = consolidateReport(subReport.report);
  return sortByFullname(consolidated.findings).map((resource) => filterBySeverity(resource, severities));
}

function renderSummaryTable(
  subReport: NamedSubReport,
  columns: ReportColumn[],
  severities: readonly Severity[],
  c: Colors
): string {
  const securityColumns = columns.slice(2);
  const rows: string[][] = [];

  for (const resource of rowsFor(subReport, severities)) {
    const counts = securityColumns.map((column) => countColumn(resource, column));
    const total = counts.reduce((sum, entry) => sum + severities.reduce((acc, s) => acc + entry[s], 0), 0);
    if (total === 0) continue;
    rows.push([resource.namespace, resourceLabel(resource), ...counts.map((entry) => formatCounts(entry, severities))]);
  }

  const lines = [c.bold(subReport.title)];
  if (rows.length === 0) {
    lines.push("No findings.");
    return lines.join("\n");
  }

  const widths = columns.map((column, index) =>
    Math.max(column.length, ...rows.map((row) => (row[index] ?? "").length))
  );
  const renderRow = (cells: string[]) => cells.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(" | ").trimEnd();

  lines.push(renderRow(columns));
  lines.push(widths.map((width) => "-".repeat(width)).join("-+-"));
  for (const row of rows) lines.push(renderRow(row));
  lines.push(c.dim(`Severities: ${severities.map((s) => `${SEVERITY_LETTERS[s]}=${s.toUpperCase()}`).join(" ")}`));
  return lines.join("\n");
}

function severityLabel(severity: Severity, c: Colors): string {
  switch (severity) {
    case "critical":
      return c.red(c.bold("CRITICAL"));
    case "high":
      return c.red("HIGH");
    case "medium":
      return c.yellow("MEDIUM");
    case "low":
      return c.green("LOW");
    case "unknown":
    default:
      return c.blue("UNKNOWN");
  }
}

function formatResult(result: Result, c: Colors): string[] {
  const lines: string[] = [];
  for (const vuln of result.vulnerabilities ?? []) {
    const fix = vuln.fixedVersion ? ` -> ${vuln.fixedVersion}` : "";
    const installed = vuln.installedVersion ? ` ${vuln.installedVersion}` : "";
    lines.push(`    ${severityLabel(vuln.severity, c)} ${vuln.vulnerabilityId} ${vuln.pkgName}${installed}${fix}`);
  }
  for (const misconfig of result.misconfigurations ?? []) {
    if (!isFailing(misconfig.status)) continue;
    const title = misconfig.title ? ` ${misconfig.title}` : "";
    lines.push(`    ${severityLabel(misconfig.severity, c)} ${misconfig.id}${title}`);
  }
  for (const secret of result.secrets ?? []) {
    const title = secret.title ? ` ${secret.title}` : "";
    lines.push(`    ${severityLabel(secret.severity, c)} ${secret.ruleId}${title}`);
  }
  if (lines.length === 0) return [];
  return [`  ${c.cyan(result.target)}`, ...lines];
}

function renderFullReport(subReport: NamedSubReport, severities: readonly Severity[], c: Colors): string {
  const lines = [c.bold(subReport.title)];
  let printed = 0;

  for (const resource of rowsFor(subReport, severities)) {
    const body = resource.results.flatMap((result) => formatResult(result, c));
    if (body.length === 0 && !resource.error) continue;
    const namespace = resource.namespace ? `${resource.namespace}/` : "";
    lines.push(`${namespace}${resourceLabel(resource)}`);
    if (resource.error) lines.push(`  ${c.red(`error: ${resource.error}`)}`);
    lines.push(...body);
    printed += 1;
  }

  if (printed === 0) lines.push("No findings.");
  return lines.join("\n");
}

function renderTable(report: AggregateReport, options: RenderOptions, logger: Logger): string {
  const c = pc.createColors(options.color ?? pc.isColorSupported);
  const severities = options.severities ?? [...SEVERITIES];
  const scanners = new Set(options.scanners);
  const components = new Set(options.components);
  const subReports = partitionReport(report, { scanners, components, logger });

  const sections: string[] = [];
  if (options.report === "summary") {
    sections.push(c.bold(`Summary Report for ${report.clusterName}`));
  }

  for (const subReport of subReports) {
    const columns = columnHeading(scanners, components, subReport.columns);
    sections.push(
      options.report === "summary"
        ? renderSummaryTable(subReport, columns, severities, c)
        : renderFullReport(subReport, severities, c)
    );
  }

  return sections.join("\n\n");
}

function countBySeverity(resource: ScannedResource, pick: (result: Result) => { severity: Severity }[]): SeverityCounts {
  const counts = emptyCounts();
  for (const result of resource.results) {
    for (const entry of pick(result)) counts[entry.severity] += 1;
  }
  return counts;
}

function renderJson(report: AggregateReport, options: RenderOptions, logger: Logger): string {
  const severities = options.severities ?? [...SEVERITIES];
  logResourceErrors(report, logger);

  const consolidated = consolidateReport(report);
  const findings = sortByFullname(consolidated.findings).map((resource) => filterBySeverity(resource, severities));

  if (options.report === "all") {
    // the opaque scanner payload is never serialized
    const stripped = findings.map(({ report: _payload, ...rest }) => rest);
    return JSON.stringify({ ...consolidated, findings: stripped }, null, 2);
  }

  const resources = findings.map((resource) => ({
    namespace: resource.namespace,
    kind: resource.kind,
    name: resource.name,
    vulnerabilities: countBySeverity(resource, (result) => result.vulnerabilities ?? []),
    misconfigurations: countBySeverity(resource, (result) =>
      (result.misconfigurations ?? []).filter((m) => isFailing(m.status))
    ),
    secrets: countBySeverity(resource, (result) => result.secrets ?? []),
    ...(resource.error ? { error: resource.error } : {})
  }));

  return JSON.stringify(
    { schemaVersion: consolidated.schemaVersion, clusterName: consolidated.clusterName, resources },
    null,
    2
  );
}

export function renderReport(report: AggregateReport, options: RenderOptions): string {
  const logger = options.logger ?? noopLogger;

  if (options.report !== "all" && options.report !== "summary") {
    throw new UnknownReportModeError(options.report);
  }

  switch (options.format) {
    case "json":
      return renderJson(report, options, logger);
    case "table":
      return renderTable(report, options, logger);
    default:
      throw new UnknownOutputFormatError(options.format);
  }
}
