/**
 * Error types surfaced by the matcher.
 *
 * Routes translate these into `{ success: false, error: { code, message } }`
 * with the matching HTTP status. Anything that is not a MatcherError is
 * treated as an internal failure.
 */

export type MatcherErrorCode = 'NOT_FOUND' | 'VALIDATION_ERROR' | 'CONFIG_ERROR' | 'UNAUTHENTICATED';

export class MatcherError extends Error {
  readonly code: MatcherErrorCode;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(input: {
    code: MatcherErrorCode;
    message: string;
    statusCode: number;
    details?: unknown;
  }) {
    super(input.message);
    this.name = 'MatcherError';
    this.code = input.code;
    this.statusCode = input.statusCode;
    this.details = input.details;
  }
}

/**
 * A viewer, trip or match that does not exist (or is not the caller's to see).
 * Callers cannot tell "missing" from "belongs to someone else".
 */
export class NotFoundError extends MatcherError {
  constructor(message: string) {
    super({ code: 'NOT_FOUND', message, statusCode: 404 });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends MatcherError {
  constructor(message: string, details?: unknown) {
    super({ code: 'VALIDATION_ERROR', message, statusCode: 400, details });
    this.name = 'ValidationError';
  }
}

export class ConfigError extends MatcherError {
  constructor(message: string, details?: unknown) {
    super({ code: 'CONFIG_ERROR', message, statusCode: 400, details });
    this.name = 'ConfigError';
  }
}

export class UnauthenticatedError extends MatcherError {
  constructor(message = 'Missing climber identity') {
    super({ code: 'UNAUTHENTICATED', message, statusCode: 401 });
    this.name = 'UnauthenticatedError';
  }
}

export function isMatcherError(error: unknown): error is MatcherError {
  return error instanceof MatcherError;
}
