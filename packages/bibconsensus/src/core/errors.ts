/**
 * bibconsensus Error Types
 *
 * Custom error classes for configuration, input and per-field reconciliation
 * failures. Malformed field values are never errors: they normalize to an
 * invalid marker instead.
 */

/**
 * Machine-readable error codes
 */
export type ErrorCode =
  | 'CONFIG'
  | 'INPUT_FORMAT'
  | 'FIELD_PROCESSING'
  | 'QUERY_TIMEOUT'
  | 'DUPLICATE_SOURCE'
  | 'RESERVED_SOURCE';

/**
 * Base class for every error raised by bibconsensus
 */
export class BibConsensusError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BibConsensusError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Error thrown when a configuration file or override fails validation
 *
 * RECOVERY:
 * - Fix the reported keys in the config file
 * - Or pass --config to point at another file
 */
export class ConfigError extends BibConsensusError {
  constructor(
    message: string,
    public readonly configPath: string | null,
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }

  /**
   * Get formatted summary of the validation issues
   */
  getSummary(): string {
    const lines = [this.message];
    if (this.configPath) {
      lines.push(`  file: ${this.configPath}`);
    }
    for (const issue of this.issues) {
      lines.push(`  - ${issue}`);
    }
    return lines.join('\n');
  }
}

/**
 * Error thrown when an entries or results file does not match its schema
 */
export class InputFormatError extends BibConsensusError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'INPUT_FORMAT');
    this.name = 'InputFormatError';
  }

  getSummary(): string {
    return [`${this.message} (${this.filePath})`, ...this.issues.map((issue) => `  - ${issue}`)].join(
      '\n'
    );
  }
}

/**
 * Error raised while normalizing, comparing or formatting one field
 *
 * Caught by the reconciler and recorded as a per-field `error` status; it never
 * aborts the rest of the entry.
 */
export class FieldProcessingError extends BibConsensusError {
  constructor(
    public readonly field: string,
    public readonly entryKey: string,
    cause: unknown
  ) {
    super(
      `Failed to reconcile field "${field}" of entry "${entryKey}": ${describeError(cause)}`,
      'FIELD_PROCESSING',
      { cause }
    );
    this.name = 'FieldProcessingError';
  }
}

/**
 * Error a lookup query is aborted with when it exceeds its timeout
 *
 * Never reaches the reconciler: the scheduler turns it into a no-match result.
 */
export class QueryTimeoutError extends BibConsensusError {
  constructor(
    public readonly source: string,
    public readonly timeoutMs: number
  ) {
    super(`Query to "${source}" timed out after ${timeoutMs}ms`, 'QUERY_TIMEOUT');
    this.name = 'QueryTimeoutError';
  }
}

/**
 * Error thrown when two lookups share a source name
 */
export class DuplicateSourceError extends BibConsensusError {
  constructor(public readonly source: string) {
    super(`Source "${source}" is registered more than once`, 'DUPLICATE_SOURCE');
    this.name = 'DuplicateSourceError';
  }
}

/**
 * Error thrown when a lookup takes a name the data dump or the entry vote uses
 */
export class ReservedSourceError extends BibConsensusError {
  constructor(public readonly source: string) {
    super(`Source name "${source}" is reserved`, 'RESERVED_SOURCE');
    this.name = 'ReservedSourceError';
  }
}

/**
 * Render any thrown value as a message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
