/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

/**
 * Base class for every error the diagnosis pipeline raises on purpose.
 */
export class RunwatchError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'RunwatchError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Missing credentials, paths or invalid settings. Fatal, raised before processing starts.
 */
export class ConfigurationError extends RunwatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A language-model response failed JSON parsing or schema validation.
 */
export class MalformedStructuredOutputError extends RunwatchError {
  /** First 200 characters of the offending response */
  public readonly excerpt: string;

  constructor(message: string, excerpt = '') {
    super(message, 'MALFORMED_STRUCTURED_OUTPUT');
    this.name = 'MalformedStructuredOutputError';
    this.excerpt = excerpt.slice(0, 200);
  }
}

/**
 * Network failure, timeout or error status from the model or retrieval backends.
 */
export class TransientReasoningError extends RunwatchError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSIENT_REASONING_ERROR', cause);
    this.name = 'TransientReasoningError';
  }
}

/**
 * A synthesized regex does not compile or fails self-validation. Never stored.
 */
export class RuleCompilationError extends RunwatchError {
  public readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Rejected rule pattern ${JSON.stringify(pattern)}: ${reason}`, 'RULE_COMPILATION_ERROR');
    this.name = 'RuleCompilationError';
    this.pattern = pattern;
  }
}

/**
 * Rule or retrieval storage could not be written.
 */
export class PersistenceError extends RunwatchError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

/** Only transient model/transport failures are worth retrying. */
export function isRetryable(err: unknown): boolean {
  return err instanceof TransientReasoningError;
}
