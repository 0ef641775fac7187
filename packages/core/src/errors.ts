/**
 * Custom error classes for the rateboard packages
 *
 * Every error carries a tagged `kind` so callers branch on the category
 * instead of comparing messages. Mapping a kind to a transport status code is
 * left to the adapter that owns the transport.
 */

/**
 * Error categories surfaced by the domain and storage layers
 */
export enum ErrorKind {
  /** Caller-fixable input problem, never retried */
  VALIDATION = 'VALIDATION',
  /** Referenced record is absent */
  NOT_FOUND = 'NOT_FOUND',
  /** Record exists but is not associated with the acting user/service */
  OWNERSHIP_MISMATCH = 'OWNERSHIP_MISMATCH',
  /** Uniqueness constraint violated */
  CONFLICT = 'CONFLICT',
  /** Any other storage failure */
  STORAGE = 'STORAGE',
  /** Caller's cancellation signal fired */
  CANCELLED = 'CANCELLED',
}

export interface SafeErrorDetails {
  kind: ErrorKind;
  code: string;
  message: string;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, kind: ErrorKind, code: string) {
    super(message);
    this.name = 'AppError';
    this.kind = kind;
    this.code = code;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for a boundary response (no stack, no cause)
   */
  toSafeError(): SafeErrorDetails {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly fieldErrors: Record<string, string[]>;

  constructor(message: string, fieldErrors: Record<string, string[]> = {}) {
    super(message, ErrorKind.VALIDATION, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }

  /**
   * Shorthand for a single failing field
   */
  static forField(field: string, message: string): ValidationError {
    return new ValidationError(message, { [field]: [message] });
  }
}

// ============================================================================
// REPOSITORY ERRORS - Standardized error types for data access layer
// ============================================================================

/**
 * Base repository error
 * Wraps any storage failure that has no more specific category
 */
export class RepositoryError extends AppError {
  public readonly repository: string;
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(repository: string, operation: string, message: string, originalError?: Error) {
    super(message, ErrorKind.STORAGE, 'REPOSITORY_ERROR');
    this.name = 'RepositoryError';
    this.repository = repository;
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Record not found error
 * Thrown when a requested record does not exist
 */
export class RecordNotFoundError extends AppError {
  public readonly recordType: string;
  public readonly recordId: string;

  constructor(recordType: string, recordId: string) {
    super(`${recordType} not found: ${recordId}`, ErrorKind.NOT_FOUND, 'RECORD_NOT_FOUND');
    this.name = 'RecordNotFoundError';
    this.recordType = recordType;
    this.recordId = recordId;
  }
}

/**
 * Uniqueness violation, translated from the backend-specific signal
 */
export class ConflictError extends AppError {
  public readonly recordType: string;
  public readonly constraint: string;

  constructor(recordType: string, constraint: string, message?: string) {
    super(message ?? `${recordType} already exists`, ErrorKind.CONFLICT, 'ALREADY_EXISTS');
    this.name = 'ConflictError';
    this.recordType = recordType;
    this.constraint = constraint;
  }
}

/**
 * A referenced record exists but belongs to another user or service
 */
export class OwnershipMismatchError extends AppError {
  public readonly recordType: string;
  public readonly recordId: string;

  constructor(recordType: string, recordId: string, message?: string) {
    super(
      message ?? `${recordType} ${recordId} does not belong to the acting user or service`,
      ErrorKind.OWNERSHIP_MISMATCH,
      'OWNERSHIP_MISMATCH'
    );
    this.name = 'OwnershipMismatchError';
    this.recordType = recordType;
    this.recordId = recordId;
  }
}

/**
 * The caller's AbortSignal fired before or during an operation
 */
export class OperationCancelledError extends AppError {
  public readonly operation: string;
  public readonly reason: unknown;

  constructor(operation: string, reason?: unknown) {
    super(`Operation cancelled: ${operation}`, ErrorKind.CANCELLED, 'OPERATION_CANCELLED');
    this.name = 'OperationCancelledError';
    this.operation = operation;
    this.reason = reason;
  }
}

/**
 * Database configuration error
 * Thrown when the configured driver cannot be used
 */
export class DatabaseConfigError extends Error {
  constructor(message = 'Database connection not configured') {
    super(message);
    this.name = 'DatabaseConfigError';
  }
}

/**
 * Check if a value is one of our tagged application errors
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return isAppError(error) && error.isOperational;
}

/**
 * Narrow an unknown error to a specific kind
 */
export function hasErrorKind(error: unknown, kind: ErrorKind): error is AppError {
  return isAppError(error) && error.kind === kind;
}

/**
 * Convert unknown error to safe error details
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    kind: ErrorKind.STORAGE,
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
  };
}

/**
 * Coerce a thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
