import type { Severity } from "./severity.js";

export type MisconfStatus = "PASS" | "FAIL" | "EXCEPTION";

export type ResultClass = "os-pkgs" | "lang-pkgs" | "config" | "secret";

export interface DetectedMisconfiguration {
  id: string;
  avdId?: string;
  title?: string;
  message?: string;
  resolution?: string;
  severity: Severity;
  status?: MisconfStatus;
}

export interface DetectedVulnerability {
  vulnerabilityId: string;
  pkgName: string;
  installedVersion?: string;
  fixedVersion?: string;
  title?: string;
  severity: Severity;
}

export interface DetectedSecret {
  ruleId: string;
  category?: string;
  title?: string;
  match?: string;
  severity: Severity;
}

export interface MisconfSummary {
  successes: number;
  failures: number;
  exceptions?: number;
}

export interface Result {
  target: string;
  class: ResultClass;
  type: string;
  misconfSummary?: MisconfSummary;
  misconfigurations?: DetectedMisconfiguration[];
  vulnerabilities?: DetectedVulnerability[];
  secrets?: DetectedSecret[];
}

export interface ScannedResource {
  readonly namespace: string;
  readonly kind: string;
  readonly name: string;
  results: Result[];
  error?: string;
  // Original scanner output, carried along untouched.
  report?: unknown;
}

export interface AggregateReport {
  schemaVersion: number;
  clusterName: string;
  vulnerabilities: ScannedResource[];
  misconfigurations: ScannedResource[];
  name?: string;
}

export interface ConsolidatedReport {
  schemaVersion: number;
  clusterName: string;
  findings: ScannedResource[];
}
