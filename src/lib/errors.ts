/**
 * Base class for failures raised by the audit. Scripts catch these at the top
 * level, log them and exit with a non-zero code.
 */
export class AuditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends AuditError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

export class DataFileNotFoundError extends AuditError {
  constructor(public readonly filePath: string) {
    super(`Data file not found at path: ${filePath}`);
  }
}

export class SampleValidationError extends AuditError {
  constructor(public readonly filePath: string, public readonly issues: string[]) {
    super(`Sample file ${filePath} failed validation:\n  ${issues.join('\n  ')}`);
  }
}

// Raised when the UK group's default-address rate is zero, so the foreign/UK ratio has no value.
export class RatioUndefinedError extends AuditError {
  constructor(public readonly numerator: number) {
    super(`Cannot compute ratio ${numerator} / 0: denominator proportion is zero`);
  }
}
