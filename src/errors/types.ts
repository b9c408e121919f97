/**
 * Error type definitions for the course-rag CLI
 *
 * Every error raised on purpose carries:
 * - a message describing what failed
 * - a hint telling the user how to recover
 * - an exit code for scripts
 *
 * Retrieval-side conditions (no results, unknown course, unknown tool) are
 * NOT errors: tools report them as plain strings so the model can explain
 * them. Only configuration problems and LLM transport failures end up here.
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a course file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (bad TOML, invalid values).
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: crag config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a tool is registered without a usable name.
 *
 * This is a programmer error, raised at registration time rather than
 * when the model first tries to call the tool.
 *
 * Exit code 2: Configuration error
 */
export class ToolConfigurationError extends CLIError {
  constructor(message: string) {
    super(message, 'Every tool definition needs a non-empty "name"', 2);
    this.name = 'ToolConfigurationError';
  }
}

/**
 * Thrown when an API key is missing or malformed.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string, detail?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      detail ?? `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file works too)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown for database-related errors.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try running: crag courses  to check the course store', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when user input (CLI arguments, course files) fails validation.
 *
 * Exit code 1: General error
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the LLM request itself fails (network, auth, rate limit).
 *
 * Exit code 6: Upstream model failure
 */
export class LLMRequestError extends CLIError {
  /** HTTP status reported by the API, when there was a response */
  public readonly status?: number;

  /** The original SDK error */
  public readonly cause?: Error;

  constructor(message: string, status?: number, cause?: Error) {
    super(message, hintForStatus(status), 6);
    this.name = 'LLMRequestError';
    this.status = status;
    this.cause = cause;
  }
}

function hintForStatus(status: number | undefined): string {
  switch (status) {
    case 401:
      return 'Check that ANTHROPIC_API_KEY is valid';
    case 429:
      return 'Rate limited by the API. Wait a moment and try again';
    case undefined:
      return 'Check your internet connection and try again';
    default:
      return status >= 500
        ? 'The API is having trouble. Try again shortly'
        : 'Run with --verbose for more details';
  }
}
