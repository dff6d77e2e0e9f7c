import type { Component, OutputFormat, ReportMode, ScannerCategory, Severity } from "../types.js";
import { COMPONENTS, SCANNER_CATEGORIES } from "../types/domain/scanner.js";
import { SEVERITIES } from "../types/domain/severity.js";

export const CONFIG_FILE_NAMES = ["fleetlens.config.json", ".fleetlensrc.json"];

export const STATE_DIR_NAME = ".fleetlens";

export const DEFAULT_SCANNERS: readonly ScannerCategory[] = SCANNER_CATEGORIES;

export const DEFAULT_COMPONENTS: readonly Component[] = COMPONENTS;

export const DEFAULT_SEVERITIES: readonly Severity[] = SEVERITIES;

export const DEFAULT_REPORT_MODE: ReportMode = "summary";

export const DEFAULT_OUTPUT_FORMAT: OutputFormat = "table";
