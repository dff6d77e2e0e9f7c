export class UnknownOutputFormatError extends Error {
  constructor(format: string) {
    super(`Unknown format "${format}". Use "json" or "table".`);
    this.name = "UnknownOutputFormatError";
  }
}

export class UnknownReportModeError extends Error {
  constructor(mode: string) {
    super(`Unknown report mode "${mode}". Use "all" or "summary".`);
    this.name = "UnknownReportModeError";
  }
}

export class AggregateReportInvalidError extends Error {
  constructor(message: string) {
    super(`Aggregate report is invalid: ${message}`);
    this.name = "AggregateReportInvalidError";
  }
}
