/** Base class for everything the declustering library throws. */
export class DeclusterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid options. Raised before any record is read.
 */
export class ConfigurationError extends DeclusterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid decluster configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/**
 * A catalog record that cannot be classified.
 */
export class EventValidationError extends DeclusterError {
  readonly index: number;
  readonly issues: string[];

  constructor(index: number, issues: string[]) {
    super(`Invalid event at row ${index}: ${issues.join("; ")}`);
    this.index = index;
    this.issues = issues;
  }
}
