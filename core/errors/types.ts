/**
 * Error details type
 */
export interface ErrorDetails extends Record<string, unknown> {
  originalError?: string;
}

/**
 * Base error class for the importer core
 */
export class ImporterError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = 'ImporterError';
  }
}

export type AuthErrorKind = 'InvalidCredential' | 'NetworkFailure' | 'MalformedToken';

/**
 * Thrown by login, refresh and restore
 */
export class AuthError extends ImporterError {
  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
    cause?: Error,
    details?: ErrorDetails
  ) {
    super(message, `AUTH_${toCode(kind)}`, cause, details);
    this.name = 'AuthError';
  }
}

export type FetchErrorKind = 'NetworkFailure' | 'ServerError' | 'Unauthenticated' | 'Cancelled';

/**
 * Thrown by the request gateway and the fetch orchestrator
 */
export class FetchError extends ImporterError {
  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    public readonly status?: number,
    cause?: Error,
    details?: ErrorDetails
  ) {
    super(message, `FETCH_${toCode(kind)}`, cause, details);
    this.name = 'FetchError';
  }

  static cancelled(message = 'Request cancelled'): FetchError {
    return new FetchError('Cancelled', message);
  }

  static unauthenticated(message = 'Authentication required'): FetchError {
    return new FetchError('Unauthenticated', message);
  }
}

/**
 * Raised locally, before any network call, when a request exceeds the session's tier ceiling
 */
export class TierLimitExceededError extends ImporterError {
  constructor(
    public readonly requested: number,
    public readonly allowed: number
  ) {
    super(
      `Requested ${requested.toLocaleString('en-US')} records but your plan allows ${allowed.toLocaleString('en-US')}`,
      'TIER_LIMIT_EXCEEDED',
      undefined,
      { requested, allowed }
    );
    this.name = 'TierLimitExceededError';
  }
}

/**
 * Error thrown during input validation
 */
export class ValidationError extends ImporterError {
  constructor(
    message: string,
    code: string,
    cause?: Error,
    details?: ErrorDetails
  ) {
    super(message, code, cause, details);
    this.name = 'ValidationError';
  }
}

/**
 * A write that would break the session invariants
 */
export class SessionStateError extends ImporterError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'SESSION_STATE_INVALID', undefined, details);
    this.name = 'SessionStateError';
  }
}

/**
 * Create error details with original error
 */
export function createErrorDetails(originalError: unknown): ErrorDetails {
  return {
    originalError: originalError instanceof Error ? originalError.message : String(originalError)
  };
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function isCancellation(error: unknown): boolean {
  return error instanceof FetchError && error.kind === 'Cancelled';
}

function toCode(kind: string): string {
  return kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase();
}
