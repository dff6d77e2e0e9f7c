import type { Severity } from "./severity.js";

export interface SpecCheck {
  readonly id: string;
}

export interface Control {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly severity?: Severity;
  readonly checks: readonly SpecCheck[];
}

export interface ComplianceSpec {
  readonly id: string;
  readonly title: string;
  readonly description?: string;
  readonly version: string;
  readonly relatedResources: readonly string[];
  readonly controls: readonly Control[];
}
