import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for the documentation server
 * Extends native Error with a stable kind and metadata
 */
export class DocsError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'DocsError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Convert error to string representation
   */
  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Malformed URL input
 */
export class InvalidUrlError extends DocsError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.INVALID_URL, ErrorSeverity.LOW, context, originalError);
    this.name = 'InvalidUrlError';
  }
}

/**
 * URL outside the documentation domain or corpus root
 */
export class NotAllowedError extends DocsError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.NOT_ALLOWED, ErrorSeverity.LOW, context);
    this.name = 'NotAllowedError';
  }
}

/**
 * Page or corpus directory absent on disk
 */
export class NotFoundError extends DocsError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.NOT_FOUND, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'NotFoundError';
  }
}

/**
 * Source content that cannot be read as an HTML document
 */
export class ParseError extends DocsError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.PARSE_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ParseError';
  }
}

/**
 * Search index missing or not yet built
 */
export class SearchUnavailableError extends DocsError {
  constructor(message: string = 'Search index unavailable', context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.SEARCH_UNAVAILABLE, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'SearchUnavailableError';
  }
}

/**
 * Query rejected by the full-text engine's grammar
 */
export class InvalidQueryError extends DocsError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.INVALID_QUERY, ErrorSeverity.LOW, context, originalError);
    this.name = 'InvalidQueryError';
  }
}

/**
 * A freshly built index failed validation before publication
 */
export class IndexBuildError extends DocsError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.INDEX_BUILD_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'IndexBuildError';
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends DocsError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation errors
 */
export class ValidationError extends DocsError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, context, originalError);
    this.name = 'ValidationError';
  }
}

/**
 * Whether retrying can succeed once the corpus or index changes.
 * Caller errors never become retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (!(error instanceof DocsError)) {
    return false;
  }
  return error.code === ErrorCode.NOT_FOUND || error.code === ErrorCode.SEARCH_UNAVAILABLE;
}

/**
 * Wrap any thrown value so callers always see a stable kind
 */
export function toDocsError(error: unknown): DocsError {
  if (error instanceof DocsError) {
    return error;
  }
  if (error instanceof Error) {
    return new DocsError(error.message, ErrorCode.UNKNOWN_ERROR, ErrorSeverity.MEDIUM, undefined, error);
  }
  return new DocsError(String(error));
}

// Export types
export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
