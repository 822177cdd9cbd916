/**
 * Error types for list column configuration.
 */

/**
 * Raised when a column declaration (or a declaration file) cannot be normalized.
 * Fatal at registry construction; never retried.
 */
export class ConfigurationError extends Error {
  /** Offending column key, when the failure is tied to one column */
  readonly column_key?: string;
  readonly issues: string[];

  constructor(
    message: string,
    options?: {
      column_key?: string;
      issues?: string[];
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.column_key = options?.column_key;
    this.issues = options?.issues ?? [];

    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
