export * from "./report/resource.js";
export * from "./report/consolidate.js";
export * from "./report/classifier.js";
export * from "./report/columns.js";
export * from "./report/partition.js";
export * from "./report/formatters.js";
export * from "./report/input.js";
export * from "./compliance/scanners.js";
export * from "./compliance/loadSpec.js";
export * from "./config/loadConfig.js";
export * from "./errors/compliance.errors.js";
export * from "./errors/report.errors.js";
export * from "./errors/config.errors.js";
export * from "./logging/logger.js";
export {
  COMPONENTS,
  ComponentId,
  SCANNER_CATEGORIES,
  ScannerId,
  isComponent,
  isScannerCategory
} from "./types/domain/scanner.js";
export { SEVERITIES, isSeverity } from "./types/domain/severity.js";
export * from "./types.js";
