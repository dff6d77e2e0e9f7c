import path from "node:path";
import { readFile } from "node:fs/promises";
import type { ComplianceSpec, Control, SpecCheck } from "../types.js";
import { isSeverity } from "../types/domain/severity.js";
import { ComplianceSpecInvalidError } from "../errors/compliance.errors.js";
import { discoverSpecFiles } from "../fs/discover.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === "number") return String(value);
  return typeof value === "string" ? value : undefined;
}

function parseCheck(raw: unknown, source: string, where: string): SpecCheck {
  if (!isPlainObject(raw)) {
    throw new ComplianceSpecInvalidError(source, `${where} must be an object.`);
  }
  const id = readString(raw, "id")?.trim();
  if (!id) {
    throw new ComplianceSpecInvalidError(source, `${where} is missing an id.`);
  }
  return Object.freeze({ id });
}

function parseControl(raw: unknown, source: string, index: number): Control {
  const where = `controls[${index}]`;
  if (!isPlainObject(raw)) {
    throw new ComplianceSpecInvalidError(source, `${where} must be an object.`);
  }
  const id = readString(raw, "id");
  const name = readString(raw, "name");
  if (!id || !name) {
    throw new ComplianceSpecInvalidError(source, `${where} needs an id and a name.`);
  }
  const rawChecks = raw.checks ?? [];
  if (!Array.isArray(rawChecks)) {
    throw new ComplianceSpecInvalidError(source, `${where}.checks must be an array.`);
  }
  const rawSeverity = readString(raw, "severity")?.toLowerCase();
  const severity = rawSeverity === undefined ? undefined : isSeverity(rawSeverity) ? rawSeverity : null;
  if (severity === null) {
    throw new ComplianceSpecInvalidError(source, `${where}.severity "${rawSeverity}" is not a known severity.`);
  }

  const control: Control = {
    id,
    name,
    description: readString(raw, "description"),
    severity,
    checks: Object.freeze(rawChecks.map((check, i) => parseCheck(check, source, `${where}.checks[${i}]`)))
  };
  return Object.freeze(control);
}

export function parseComplianceSpec(raw: unknown, source = "<inline>"): ComplianceSpec {
  // accept both a bare spec and the { spec: {...} } envelope
  const body = isPlainObject(raw) && isPlainObject(raw.spec) ? raw.spec : raw;
  if (!isPlainObject(body)) {
    throw new ComplianceSpecInvalidError(source, "expected a JSON object.");
  }

  const id = readString(body, "id");
  const title = readString(body, "title");
  if (!id || !title) {
    throw new ComplianceSpecInvalidError(source, "id and title are required.");
  }

  const rawResources = body.relatedResources ?? [];
  if (!Array.isArray(rawResources) || rawResources.some((entry) => typeof entry !== "string")) {
    throw new ComplianceSpecInvalidError(source, "relatedResources must be an array of strings.");
  }
  const rawControls = body.controls;
  if (!Array.isArray(rawControls)) {
    throw new ComplianceSpecInvalidError(source, "controls must be an array.");
  }

  const spec: ComplianceSpec = {
    id,
    title,
    description: readString(body, "description"),
    version: readString(body, "version") ?? "",
    relatedResources: Object.freeze(rawResources.map(String)),
    controls: Object.freeze(rawControls.map((control, index) => parseControl(control, source, index)))
  };
  return Object.freeze(spec);
}

export async function loadComplianceSpec(filePath: string): Promise<ComplianceSpec> {
  const raw = await readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ComplianceSpecInvalidError(filePath, `JSON invalid: ${message}`);
  }
  return parseComplianceSpec(parsed, filePath);
}

export type LoadedSpec = {
  path: string;
  spec: ComplianceSpec;
};

export async function loadComplianceSpecs(root: string, patterns: string[]): Promise<LoadedSpec[]> {
  const files = await discoverSpecFiles({ root, patterns });
  const loaded: LoadedSpec[] = [];
  for (const file of files) {
    loaded.push({ path: path.relative(root, file) || file, spec: await loadComplianceSpec(file) });
  }
  return loaded;
}
