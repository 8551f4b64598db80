/**
 * Error classes for the caption archive
 */

/**
 * Base class for all archive errors
 */
export class SupercutError extends Error {
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SupercutError';
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`];
    if (this.details && Object.keys(this.details).length) {
      parts.push(JSON.stringify(this.details));
    }
    return parts.join(' ');
  }
}

/**
 * yt-dlp (or whatever media source is plugged in) failed for one item
 */
export class MediaSourceError extends SupercutError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, details, options);
    this.name = 'MediaSourceError';
  }
}

/**
 * Video info was fetched but does not have the expected shape
 */
export class MetadataError extends SupercutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'MetadataError';
  }
}

/**
 * Storage failure (I/O, constraint violation, bad schema)
 */
export class StoreError extends SupercutError {
  operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(message, { operation }, options);
    this.name = 'StoreError';
    this.operation = operation;
  }
}

/**
 * Full-text query text is not a valid match expression
 */
export class SearchQueryError extends StoreError {
  query: string;

  constructor(query: string, message: string, options?: { cause?: unknown }) {
    super('search', message, options);
    this.name = 'SearchQueryError';
    this.query = query;
  }
}

export function toErrorMessage(e: unknown): string {
  if (e instanceof SupercutError) return e.toString();
  if (e instanceof Error) return e.message;
  return String(e);
}
