// Error types raised outside of rule evaluation.
// Rules themselves never throw: a rule that does not apply returns nothing.

/**
 * SqltermError is the base class for errors raised by sqlterm.
 */
export class SqltermError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SqltermError";
  }
}

/**
 * ParseError is thrown when SQL source cannot be turned into a segment tree.
 */
export class ParseError extends SqltermError {
  constructor(
    message: string,
    readonly line?: number,
    readonly column?: number
  ) {
    super(line === undefined ? message : `${message} (line ${line}, column ${column ?? 1})`);
    this.name = "ParseError";
  }
}

/**
 * ConfigError is thrown for invalid configuration, unknown dialects or unknown rules.
 */
export class ConfigError extends SqltermError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length === 0 ? message : `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
