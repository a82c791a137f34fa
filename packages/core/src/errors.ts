/**
 * Pipeline Error Handling
 *
 * The categorization core never throws: its failures degrade to zero signals.
 * Errors here cover the operational shell around it (files, config, storage).
 */

/**
 * Error categories for pipeline failures
 */
export type ErrorCategory =
  // Extraction
  | 'UNSUPPORTED_FILE'
  | 'EXTRACTION_FAILED'
  | 'NO_TEXT'

  // Output
  | 'OUTPUT_WRITE_FAILED'

  // Storage
  | 'DATABASE_ERROR'

  // Configuration
  | 'CONFIGURATION_ERROR'

  // Taxonomy
  | 'TAXONOMY_INVALID'

  // Internal
  | 'INTERNAL_ERROR';

/**
 * PipelineError - structured error for document processing failures
 */
export class PipelineError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }
    if (error instanceof Error) {
      return new PipelineError(defaultCategory, error.message, { originalName: error.name });
    }
    return new PipelineError(defaultCategory, String(error));
  }
}

/**
 * ConfigError - invalid environment or configuration value
 */
export class ConfigError extends PipelineError {
  public readonly key: string;

  constructor(key: string, message: string) {
    super('CONFIGURATION_ERROR', `${key}: ${message}`, { key });
    this.name = 'ConfigError';
    this.key = key;
  }
}

/**
 * Human-readable message from any caught value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
