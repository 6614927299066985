/**
 * Error classes for the question pipeline.
 *
 * Compile failures are returned as values from the parser and compiler;
 * the classes are still Errors so callers may throw them at their own
 * boundary.
 */

/**
 * Pseudo-SQL that is not a single well-formed SELECT statement.
 */
export class CompileError extends Error {
  public readonly fragment?: string;

  constructor(message: string, fragment?: string) {
    super(fragment ? `${message} (near "${fragment}")` : message);
    this.name = 'CompileError';
    this.fragment = fragment;
    Object.setPrototypeOf(this, CompileError.prototype);
  }
}

/**
 * The statement reads from a table the store does not describe.
 */
export class UnsupportedTableError extends Error {
  public readonly table: string;

  constructor(table: string) {
    super(`Unsupported table: ${table}`);
    this.name = 'UnsupportedTableError';
    this.table = table;
    Object.setPrototypeOf(this, UnsupportedTableError.prototype);
  }
}

/**
 * A remote store call failed or timed out.
 */
export class StoreError extends Error {
  public readonly table: string;

  constructor(table: string, message: string, options?: { cause?: unknown }) {
    super(`Store request on "${table}" failed: ${message}`, options);
    this.name = 'StoreError';
    this.table = table;
    Object.setPrototypeOf(this, StoreError.prototype);
  }
}

/**
 * Error thrown when LLM API calls fail.
 */
export class LLMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Environment configuration failed validation.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  • ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
