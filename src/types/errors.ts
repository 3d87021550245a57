/**
 * Custom error classes for the pipeline.
 *
 * Suggestions are carried in their own field and never folded into the
 * message: the error classifier keyword-matches messages, and suggestion text
 * mentioning tables or permissions would skew the category.
 */

/**
 * Error thrown when the environment does not describe a usable configuration.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown when the LLM reply cannot be turned into a semantic query plan.
 */
export class QueryUnderstandingError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    super(message);
    this.name = 'QueryUnderstandingError';
    this.suggestions = suggestions || [
      'Rephrase the question with the entity you are asking about',
      'Mention the table or field names you expect to be used',
    ];
    Object.setPrototypeOf(this, QueryUnderstandingError.prototype);
  }
}

/**
 * Error thrown when every table a plan asked for is missing from the live schema.
 *
 * Common causes:
 * - The question is about data this database does not hold
 * - The model invented a table name
 */
export class GroundingError extends Error {
  public readonly rejectedTables: string[];
  public readonly availableTables: string[];
  public readonly suggestions: string[];

  constructor(rejectedTables: string[], availableTables: string[]) {
    super(GroundingError.formatMessage(rejectedTables, availableTables));
    this.name = 'GroundingError';
    this.rejectedTables = rejectedTables;
    this.availableTables = availableTables;
    this.suggestions = [
      `Ask about one of: ${availableTables.join(', ') || '(no tables found)'}`,
    ];
    Object.setPrototypeOf(this, GroundingError.prototype);
  }

  private static formatMessage(rejected: string[], available: string[]): string {
    const quoted = rejected.map((t) => `'${t}'`).join(', ');
    const subject =
      rejected.length === 1
        ? `Table ${quoted} does not exist in the database.`
        : `Tables ${quoted} do not exist in the database.`;
    return `${subject} Available tables are: ${available.join(', ')}`;
  }
}

/**
 * Error thrown when SQL generation fails.
 */
export class SQLGenerationError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    super(message);
    this.name = 'SQLGenerationError';
    this.suggestions = suggestions || [
      'Try a simpler question with fewer joins',
      'Check the interpreted plan with the explain endpoint',
    ];
    Object.setPrototypeOf(this, SQLGenerationError.prototype);
  }
}

/**
 * Error thrown when SQL execution fails.
 */
export class SQLExecutionError extends Error {
  public readonly sql: string;

  constructor(message: string, sql: string) {
    super(message);
    this.name = 'SQLExecutionError';
    this.sql = sql;
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }
}

/**
 * Error thrown when a query runs longer than its timeout.
 */
export class QueryTimeoutError extends Error {
  public readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super(`Query timeout after ${timeoutSeconds} seconds`);
    this.name = 'QueryTimeoutError';
    this.timeoutSeconds = timeoutSeconds;
    Object.setPrototypeOf(this, QueryTimeoutError.prototype);
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
 * Error thrown when the state machine receives an event its current state
 * does not accept. Indicates a bug, not a user-facing failure.
 */
export class PipelineTransitionError extends Error {
  constructor(state: string, event: string) {
    super(`No transition from ${state} on ${event}`);
    this.name = 'PipelineTransitionError';
    Object.setPrototypeOf(this, PipelineTransitionError.prototype);
  }
}

/**
 * Extracts a message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
