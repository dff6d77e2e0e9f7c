export class UnrecognizedCheckIdError extends Error {
  checkId: string;
  controlId: string;

  constructor(checkId: string, controlId: string) {
    super(`Unsupported check ID "${checkId}" in control ${controlId}.`);
    this.name = "UnrecognizedCheckIdError";
    this.checkId = checkId;
    this.controlId = controlId;
  }
}

export class ComplianceSpecInvalidError extends Error {
  constructor(source: string, message: string) {
    super(`Compliance spec ${source} is invalid: ${message}`);
    this.name = "ComplianceSpecInvalidError";
  }
}
