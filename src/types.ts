import type { Severity } from "./types/domain/severity.js";
import type { Component, ScannerCategory } from "./types/domain/scanner.js";
import type {
  AggregateReport,
  ConsolidatedReport,
  DetectedMisconfiguration,
  DetectedSecret,
  DetectedVulnerability,
  MisconfStatus,
  MisconfSummary,
  Result,
  ResultClass,
  ScannedResource
} from "./types/domain/resource.js";
import type { ComplianceSpec, Control, SpecCheck } from "./types/domain/compliance.js";

export type {
  AggregateReport,
  ComplianceSpec,
  Component,
  ConsolidatedReport,
  Control,
  DetectedMisconfiguration,
  DetectedSecret,
  DetectedVulnerability,
  MisconfStatus,
  MisconfSummary,
  Result,
  ResultClass,
  ScannedResource,
  ScannerCategory,
  Severity,
  SpecCheck
};

export type ReportMode = "all" | "summary";

export type OutputFormat = "table" | "json";

export interface ScannedArtifact {
  namespace?: string;
  kind: string;
  name: string;
}
