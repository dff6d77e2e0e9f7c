import type { ComplianceSpec, ScannerCategory } from "../types.js";
import { ScannerId } from "../types/domain/scanner.js";
import { UnrecognizedCheckIdError } from "../errors/compliance.errors.js";

type CheckIdRule = {
  prefix: string;
  scanner: ScannerCategory;
};

// AVD covers both "AVD-KSV012" style rule IDs and the dotted "AVD-1.2.31" benchmark IDs.
const CHECK_ID_RULES: readonly CheckIdRule[] = [
  { prefix: "avd-", scanner: ScannerId.Misconfiguration },
  { prefix: "cve-", scanner: ScannerId.Vulnerability },
  { prefix: "dla-", scanner: ScannerId.Vulnerability }
];

export function scannerForCheckId(checkId: string): ScannerCategory | null {
  const normalized = checkId.trim().toLowerCase();
  const rule = CHECK_ID_RULES.find((candidate) => normalized.startsWith(candidate.prefix));
  return rule?.scanner ?? null;
}

export function checkIdsByCategory(spec: ComplianceSpec): Map<ScannerCategory, string[]> {
  const grouped = new Map<ScannerCategory, string[]>();

  for (const control of spec.controls) {
    for (const check of control.checks) {
      const scanner = scannerForCheckId(check.id);
      if (!scanner) {
        throw new UnrecognizedCheckIdError(check.id, control.id);
      }
      const ids = grouped.get(scanner) ?? [];
      ids.push(check.id);
      grouped.set(scanner, ids);
    }
  }

  return grouped;
}

export function scannerCategories(spec: ComplianceSpec): Set<ScannerCategory> {
  return new Set(checkIdsByCategory(spec).keys());
}
