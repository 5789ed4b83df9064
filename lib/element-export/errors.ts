// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ElementExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ElementExportError';
  }
}

/** Thrown when a part name cannot be written under the 'reject' escaping mode. */
export class ReportFormatError extends ElementExportError {
  constructor(
    message: string,
    readonly partName: string
  ) {
    super(message);
    this.name = 'ReportFormatError';
  }
}

/** Thrown when environment settings fail validation. */
export class ConfigError extends ElementExportError {
  constructor(readonly issues: string[]) {
    super(`Invalid element export configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
