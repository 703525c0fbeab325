/**
 * Raised when the power plant CSV is missing, unreadable, or lacks the columns
 * the dashboard needs. Fatal for the request that triggered the load.
 */
export class DataLoadError extends Error {
  readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'DataLoadError';
    this.path = options?.path;
  }
}

/** Raised by aggregates that have no defined value over zero records. */
export class EmptySetError extends Error {
  constructor(operation: string) {
    super(`Cannot compute ${operation} of an empty record set`);
    this.name = 'EmptySetError';
  }
}
