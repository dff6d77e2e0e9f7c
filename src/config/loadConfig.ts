import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import type { Component, OutputFormat, ReportMode, ScannerCategory, Severity } from "../types.js";
import { isComponent, isScannerCategory } from "../types/domain/scanner.js";
import { isSeverity } from "../types/domain/severity.js";
import { readEnv, readListEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_COMPONENTS,
  DEFAULT_OUTPUT_FORMAT,
  DEFAULT_REPORT_MODE,
  DEFAULT_SCANNERS,
  DEFAULT_SEVERITIES,
  STATE_DIR_NAME
} from "./defaults.js";
import {
  ConfigUnsupportedComponentError,
  ConfigUnsupportedScannerError,
  ConfigUnsupportedSeverityError
} from "../errors/config.errors.js";
import { UnknownOutputFormatError, UnknownReportModeError } from "../errors/report.errors.js";

export interface FleetlensConfig {
  projectRoot: string;
  stateDir: string;
  scanners: ScannerCategory[];
  components: Component[];
  severities: Severity[];
  report: ReportMode;
  format: OutputFormat;
}

// Raw, unvalidated settings as they come from a config file or CLI flags.
export type ConfigInput = {
  scanners?: string[];
  components?: string[];
  severities?: string[];
  report?: string;
  format?: string;
};

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: ConfigInput;
}

function readList(record: Record<string, unknown>, key: string): string[] | undefined {
  const value = record[key];
  if (typeof value === "string") return value.split(",").map((entry) => entry.trim()).filter(Boolean);
  if (Array.isArray(value)) return value.filter((entry): entry is string => typeof entry === "string");
  return undefined;
}

function toConfigInput(raw: unknown): ConfigInput {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return {};
  const record: Record<string, unknown> = { ...raw };
  return {
    scanners: readList(record, "scanners"),
    components: readList(record, "components"),
    severities: readList(record, "severities"),
    report: typeof record.report === "string" ? record.report : undefined,
    format: typeof record.format === "string" ? record.format : undefined
  };
}

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<ConfigInput> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    return toConfigInput(JSON.parse(raw));
  }

  return {};
}

function validateList<T extends string>(
  values: readonly string[],
  guard: (value: string) => value is T,
  onInvalid: (value: string) => Error
): T[] {
  const result: T[] = [];
  for (const raw of values) {
    const value = raw.trim().toLowerCase();
    if (!guard(value)) throw onInvalid(raw);
    if (!result.includes(value)) result.push(value);
  }
  return result;
}

function normalizeReportMode(raw: string): ReportMode {
  const value = raw.trim().toLowerCase();
  if (value === "all" || value === "summary") return value;
  throw new UnknownReportModeError(raw);
}

function normalizeFormat(raw: string): OutputFormat {
  const value = raw.trim().toLowerCase();
  if (value === "table" || value === "json") return value;
  throw new UnknownOutputFormatError(raw);
}

export async function loadConfig(params: LoadConfigParams): Promise<FleetlensConfig> {
  const configFile = await loadConfigFile(params.projectRoot, params.configPath);
  const overrides = params.overrides ?? {};

  const scanners =
    overrides.scanners ?? readListEnv("FLEETLENS_SCANNERS") ?? configFile.scanners ?? DEFAULT_SCANNERS;
  const components =
    overrides.components ?? readListEnv("FLEETLENS_COMPONENTS") ?? configFile.components ?? DEFAULT_COMPONENTS;
  const severities =
    overrides.severities ?? readListEnv("FLEETLENS_SEVERITIES") ?? configFile.severities ?? DEFAULT_SEVERITIES;
  const report = overrides.report ?? readEnv("FLEETLENS_REPORT") ?? configFile.report ?? DEFAULT_REPORT_MODE;
  const format = overrides.format ?? readEnv("FLEETLENS_FORMAT") ?? configFile.format ?? DEFAULT_OUTPUT_FORMAT;

  return {
    projectRoot: params.projectRoot,
    stateDir: path.join(params.projectRoot, STATE_DIR_NAME),
    scanners: validateList(scanners, isScannerCategory, (value) => new ConfigUnsupportedScannerError(value)),
    components: validateList(components, isComponent, (value) => new ConfigUnsupportedComponentError(value)),
    severities: validateList(severities, isSeverity, (value) => new ConfigUnsupportedSeverityError(value)),
    report: normalizeReportMode(report),
    format: normalizeFormat(format)
  };
}
