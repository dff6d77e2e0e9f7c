export const ScannerId = {
  Vulnerability: "vuln",
  Misconfiguration: "misconfig",
  Secret: "secret",
  Rbac: "rbac"
} as const;

export type ScannerCategory = (typeof ScannerId)[keyof typeof ScannerId];

export const SCANNER_CATEGORIES: readonly ScannerCategory[] = Object.values(ScannerId);

export const ComponentId = {
  Workload: "workload",
  Infra: "infra"
} as const;

export type Component = (typeof ComponentId)[keyof typeof ComponentId];

export const COMPONENTS: readonly Component[] = Object.values(ComponentId);

export function isScannerCategory(value: unknown): value is ScannerCategory {
  return typeof value === "string" && (SCANNER_CATEGORIES as readonly string[]).includes(value);
}

export function isComponent(value: unknown): value is Component {
  return typeof value === "string" && (COMPONENTS as readonly string[]).includes(value);
}
