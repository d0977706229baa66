/**
 * Base class for all spec-changelog errors.
 * Centralized here as it's used across modules (git, parser, config).
 */
export class ChangelogError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a header line of the working log cannot be read.
 */
export class ChangelogParseError extends ChangelogError {
  public readonly lineNumber: number;
  public readonly line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Line ${lineNumber}: ${message}`, 'CHANGELOG_PARSE_ERROR');
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

/**
 * A single field-level problem found while validating the configuration.
 */
export type ConfigFieldError = {
  field: string;
  message: string;
};

/**
 * Thrown when the changelog configuration does not match its schema.
 */
export class ConfigValidationError extends ChangelogError {
  public readonly errors: ConfigFieldError[];
  public readonly source: string;

  constructor(source: string, errors: ConfigFieldError[]) {
    const details = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    super(`Invalid configuration in ${source}: ${details}`, 'CONFIG_VALIDATION_ERROR');
    this.errors = errors;
    this.source = source;
  }
}
