/**
 * Error kinds and severities for the documentation server
 * Every failure surfaced to a caller carries one of these stable codes
 */

export enum ErrorCode {
  // Caller errors
  INVALID_URL = 'InvalidURL',
  NOT_ALLOWED = 'NotAllowed',
  INVALID_QUERY = 'InvalidQuery',
  VALIDATION_ERROR = 'ValidationError',

  // Corpus and content errors
  NOT_FOUND = 'NotFound',
  PARSE_ERROR = 'ParseError',

  // Search index errors
  SEARCH_UNAVAILABLE = 'SearchUnavailable',
  INDEX_BUILD_ERROR = 'IndexBuildError',

  // Process-level errors
  CONFIGURATION_ERROR = 'ConfigurationError',
  UNKNOWN_ERROR = 'UnknownError',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}
