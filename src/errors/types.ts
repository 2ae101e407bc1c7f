/**
 * Error type definitions for tender-insight
 *
 * Every error the CLI can surface carries:
 * - An actionable message with a recovery hint
 * - An exit code for programmatic error handling
 *
 * The pipeline taxonomy (store, document, provider, field, agent and
 * workflow failures) lives here too, so the orchestrator can tell fatal
 * failures from ones that still produce a report.
 */

/**
 * Base class for all CLI errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: allows scripts to handle different errors differently
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
 * Thrown when a file or directory doesn't exist.
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
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Values outside their allowed range
 * - Two agents claiming the same field
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: tender-insight config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file in the working directory also works)`,
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
    super(message, 'Check that the store path in config.toml is writable', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// PIPELINE ERRORS
// ============================================================================

/**
 * The vector store could not be reached or written.
 *
 * Fatal: the pipeline aborts before any extraction starts.
 *
 * Exit code 6
 */
export class StoreUnavailableError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      message,
      'Check the store path in config.toml, or retry with --in-memory',
      6
    );
    this.name = 'StoreUnavailableError';
    this.cause = cause;
  }
}

/**
 * The document has no text after trimming.
 *
 * Fatal, raised before any embedding call is issued.
 *
 * Exit code 7
 */
export class EmptyDocumentError extends CLIError {
  constructor(source?: string) {
    super(
      source ? `Document is empty: ${source}` : 'Document is empty',
      'Scanned documents need OCR before they can be analyzed',
      7
    );
    this.name = 'EmptyDocumentError';
  }
}

/**
 * The document source cannot read this file type.
 *
 * Exit code 8
 */
export class UnsupportedFormatError extends CLIError {
  public readonly extension: string;

  constructor(extension: string, supported: readonly string[]) {
    super(
      `Unsupported document format: ${extension || '(none)'}`,
      `Convert the document to text first. Supported: ${supported.join(', ')}`,
      8
    );
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
  }
}

/**
 * A provider call failed in a way worth retrying
 * (rate limit, server error, dropped connection, malformed output).
 *
 * Exit code 9
 */
export class TransientProviderError extends CLIError {
  public readonly provider: string;
  public readonly status?: number;
  public readonly cause?: unknown;

  constructor(provider: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${provider}: ${message}`, 'The provider may be overloaded. Try again shortly', 9);
    this.name = 'TransientProviderError';
    this.provider = provider;
    this.status = options.status;
    this.cause = options.cause;
  }
}

/**
 * A provider call failed in a way retrying cannot fix
 * (bad credentials, rejected request).
 *
 * Exit code 10
 */
export class PermanentProviderError extends CLIError {
  public readonly provider: string;
  public readonly status?: number;
  public readonly cause?: unknown;

  constructor(provider: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${provider}: ${message}`, 'Check the API key, base URL and model name', 10);
    this.name = 'PermanentProviderError';
    this.provider = provider;
    this.status = options.status;
    this.cause = options.cause;
  }
}

/**
 * One field could not be extracted. The field becomes `unavailable`
 * and the owning agent carries on with its other fields.
 *
 * Exit code 11
 */
export class FieldExtractionFailure extends CLIError {
  public readonly field: string;
  public readonly cause?: unknown;

  constructor(field: string, reason: string, cause?: unknown) {
    super(`Extraction failed for field "${field}": ${reason}`, undefined, 11);
    this.name = 'FieldExtractionFailure';
    this.field = field;
    this.cause = cause;
  }
}

/**
 * Every field of an agent failed. Other agents are unaffected.
 *
 * Exit code 12
 */
export class AgentTotalFailure extends CLIError {
  public readonly agent: string;
  public readonly failures: FieldExtractionFailure[];

  constructor(agent: string, failures: FieldExtractionFailure[]) {
    super(
      `Agent "${agent}" failed for all ${failures.length} fields`,
      failures[0] ? `First failure: ${failures[0].message}` : undefined,
      12
    );
    this.name = 'AgentTotalFailure';
    this.agent = agent;
    this.failures = failures;
  }
}

/**
 * The global workflow timeout elapsed.
 *
 * During extraction this still produces a report; before indexing
 * completes it is fatal.
 *
 * Exit code 13
 */
export class WorkflowTimeoutError extends CLIError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(
      `Workflow timed out after ${timeoutMs}ms`,
      'Raise pipeline.workflow_timeout_ms or pass --timeout',
      13
    );
    this.name = 'WorkflowTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Errors that end a run before any report exists.
 */
export function isFatalPipelineError(error: unknown): boolean {
  return (
    error instanceof StoreUnavailableError ||
    error instanceof EmptyDocumentError ||
    error instanceof UnsupportedFormatError
  );
}
