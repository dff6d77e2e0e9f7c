import { readFile } from "node:fs/promises";
import type {
  AggregateReport,
  DetectedMisconfiguration,
  DetectedSecret,
  DetectedVulnerability,
  MisconfStatus,
  Result,
  ResultClass,
  ScannedResource,
  Severity
} from "../types.js";
import { isSeverity } from "../types/domain/severity.js";
import { AggregateReportInvalidError } from "../errors/report.errors.js";

const RESULT_CLASSES: readonly ResultClass[] = ["os-pkgs", "lang-pkgs", "config", "secret"];
const MISCONF_STATUSES: readonly MisconfStatus[] = ["PASS", "FAIL", "EXCEPTION"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value ? value : undefined;
}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== "string" || !value) {
    throw new AggregateReportInvalidError(`${where}.${key} must be a non-empty string.`);
  }
  return value;
}

function listOf<T>(raw: unknown, where: string, parse: (entry: unknown, where: string) => T): T[] | undefined {
  if (raw == null) return undefined;
  if (!Array.isArray(raw)) {
    throw new AggregateReportInvalidError(`${where} must be an array.`);
  }
  return raw.map((entry, index) => parse(entry, `${where}[${index}]`));
}

function normalizeSeverity(raw: unknown): Severity {
  const value = typeof raw === "string" ? raw.toLowerCase() : "";
  return isSeverity(value) ? value : "unknown";
}

function withOptional<T extends object>(target: T, record: Record<string, unknown>, keys: (keyof T & string)[]): T {
  for (const key of keys) {
    const value = optionalString(record, key);
    if (value !== undefined) Object.assign(target, { [key]: value });
  }
  return target;
}

function parseMisconfiguration(raw: unknown, where: string): DetectedMisconfiguration {
  if (!isPlainObject(raw)) throw new AggregateReportInvalidError(`${where} must be an object.`);
  const misconfig: DetectedMisconfiguration = {
    id: requireString(raw, "id", where),
    severity: normalizeSeverity(raw.severity)
  };
  const status = optionalString(raw, "status")?.toUpperCase();
  const known = MISCONF_STATUSES.find((candidate) => candidate === status);
  if (known) misconfig.status = known;
  return withOptional(misconfig, raw, ["avdId", "title", "message", "resolution"]);
}

function parseVulnerability(raw: unknown, where: string): DetectedVulnerability {
  if (!isPlainObject(raw)) throw new AggregateReportInvalidError(`${where} must be an object.`);
  const vuln: DetectedVulnerability = {
    vulnerabilityId: requireString(raw, "vulnerabilityId", where),
    pkgName: requireString(raw, "pkgName", where),
    severity: normalizeSeverity(raw.severity)
  };
  return withOptional(vuln, raw, ["installedVersion", "fixedVersion", "title"]);
}

function parseSecret(raw: unknown, where: string): DetectedSecret {
  if (!isPlainObject(raw)) throw new AggregateReportInvalidError(`${where} must be an object.`);
  const secret: DetectedSecret = {
    ruleId: requireString(raw, "ruleId", where),
    severity: normalizeSeverity(raw.severity)
  };
  return withOptional(secret, raw, ["category", "title", "match"]);
}

function parseResult(raw: unknown, where: string): Result {
  if (!isPlainObject(raw)) throw new AggregateReportInvalidError(`${where} must be an object.`);
  const resultClass = RESULT_CLASSES.find((candidate) => candidate === raw.class);
  if (!resultClass) {
    throw new AggregateReportInvalidError(`${where}.class must be one of ${RESULT_CLASSES.join(", ")}.`);
  }
  const result: Result = {
    target: requireString(raw, "target", where),
    class: resultClass,
    type: optionalString(raw, "type") ?? ""
  };
  if (isPlainObject(raw.misconfSummary)) {
    const summary = raw.misconfSummary;
    result.misconfSummary = {
      successes: typeof summary.successes === "number" ? summary.successes : 0,
      failures: typeof summary.failures === "number" ? summary.failures : 0
    };
    if (typeof summary.exceptions === "number") result.misconfSummary.exceptions = summary.exceptions;
  }
  const misconfigurations = listOf(raw.misconfigurations, `${where}.misconfigurations`, parseMisconfiguration);
  const vulnerabilities = listOf(raw.vulnerabilities, `${where}.vulnerabilities`, parseVulnerability);
  const secrets = listOf(raw.secrets, `${where}.secrets`, parseSecret);
  if (misconfigurations) result.misconfigurations = misconfigurations;
  if (vulnerabilities) result.vulnerabilities = vulnerabilities;
  if (secrets) result.secrets = secrets;
  return result;
}

function parseResource(raw: unknown, where: string): ScannedResource {
  if (!isPlainObject(raw)) throw new AggregateReportInvalidError(`${where} must be an object.`);
  const resource: ScannedResource = {
    namespace: optionalString(raw, "namespace") ?? "",
    kind: requireString(raw, "kind", where),
    name: requireString(raw, "name", where),
    results: listOf(raw.results, `${where}.results`, parseResult) ?? []
  };
  const error = optionalString(raw, "error");
  if (error) resource.error = error;
  if (raw.report !== undefined) resource.report = raw.report;
  return resource;
}

export function parseAggregateReport(raw: unknown): AggregateReport {
  if (!isPlainObject(raw)) {
    throw new AggregateReportInvalidError("expected a JSON object.");
  }
  const report: AggregateReport = {
    schemaVersion: typeof raw.schemaVersion === "number" ? raw.schemaVersion : 0,
    clusterName: optionalString(raw, "clusterName") ?? "",
    vulnerabilities: listOf(raw.vulnerabilities, "vulnerabilities", parseResource) ?? [],
    misconfigurations: listOf(raw.misconfigurations, "misconfigurations", parseResource) ?? []
  };
  const name = optionalString(raw, "name");
  if (name) report.name = name;
  return report;
}

export async function loadAggregateReport(filePath: string): Promise<AggregateReport> {
  const raw = await readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new AggregateReportInvalidError(`JSON invalid: ${message}`);
  }
  return parseAggregateReport(parsed);
}
