/**
 * Error types raised outside the query pipeline.
 * Remote-call failures are values (see CompletionFailure), not exceptions.
 */

/**
 * Thrown when configuration cannot be loaded or is incomplete
 */
export class ConfigurationError extends Error {
  details?: string[];

  constructor(message: string, details?: string[]) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}
