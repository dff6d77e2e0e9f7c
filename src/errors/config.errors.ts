export class ConfigUnsupportedScannerError extends Error {
  constructor(value: string) {
    super(`Unsupported scanner "${value}". Use vuln, misconfig, secret or rbac.`);
    this.name = "ConfigUnsupportedScannerError";
  }
}

export class ConfigUnsupportedComponentError extends Error {
  constructor(value: string) {
    super(`Unsupported component "${value}". Use workload or infra.`);
    this.name = "ConfigUnsupportedComponentError";
  }
}

export class ConfigUnsupportedSeverityError extends Error {
  constructor(value: string) {
    super(`Unsupported severity "${value}". Use critical, high, medium, low or unknown.`);
    this.name = "ConfigUnsupportedSeverityError";
  }
}
