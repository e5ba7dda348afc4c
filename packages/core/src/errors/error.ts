import {
  ErrorCode,
  ErrorHttpStatus,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  BusinessRuleErrorCode,
  StorageErrorCode,
} from './codes.js';

/**
 * Additional context for errors
 */
export interface ErrorDetails {
  /** Field that caused the error */
  field?: string;
  /** The invalid value */
  value?: unknown;
  /** Expected format or value */
  expected?: unknown;
  /** Actual value received */
  actual?: unknown;
  /** Related record ID */
  recordId?: number;
  /** Additional arbitrary context */
  [key: string]: unknown;
}

/**
 * Base error class for all Worklane errors.
 * Provides structured error information with code, message, and details.
 */
export class WorklaneError extends Error {
  /** Machine-readable error code */
  readonly code: ErrorCode;
  /** Additional context about the error */
  readonly details: ErrorDetails;
  /** HTTP status code for API responses */
  readonly httpStatus: number;

  constructor(
    message: string,
    code: ErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message);
    this.name = 'WorklaneError';
    this.code = code;
    this.details = details;
    this.httpStatus = ErrorHttpStatus[code];
    this.cause = cause;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WorklaneError);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): {
    name: string;
    message: string;
    code: ErrorCode;
    details: ErrorDetails;
    httpStatus: number;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      httpStatus: this.httpStatus,
    };
  }
}

/**
 * Error for malformed input, raised before any lookup
 */
export class ValidationError extends WorklaneError {
  constructor(
    message: string,
    code: ValidationErrorCode = ErrorCode.INVALID_INPUT,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error for records that cannot be found or are not eligible
 */
export class NotFoundError extends WorklaneError {
  constructor(
    message: string,
    code: NotFoundErrorCode = ErrorCode.NOT_FOUND,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Error for unique-key conflicts
 */
export class ConflictError extends WorklaneError {
  constructor(
    message: string,
    code: ConflictErrorCode = ErrorCode.ALREADY_EXISTS,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ConflictError';
  }
}

/**
 * Error for records that exist but violate a domain rule
 */
export class BusinessRuleViolation extends WorklaneError {
  constructor(
    message: string,
    code: BusinessRuleErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'BusinessRuleViolation';
  }
}

/**
 * Error for storage/database operations
 */
export class StorageError extends WorklaneError {
  constructor(
    message: string,
    code: StorageErrorCode = ErrorCode.DATABASE_ERROR,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'StorageError';
  }
}

/**
 * Type guard to check if an error is a WorklaneError
 */
export function isWorklaneError(error: unknown): error is WorklaneError {
  return error instanceof WorklaneError;
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Type guard to check if an error is a NotFoundError
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Type guard to check if an error is a ConflictError
 */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

/**
 * Type guard to check if an error is a BusinessRuleViolation
 */
export function isBusinessRuleViolation(error: unknown): error is BusinessRuleViolation {
  return error instanceof BusinessRuleViolation;
}

/**
 * Type guard to check if an error is a StorageError
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type guard to check if an error has a specific error code
 */
export function hasErrorCode(
  error: unknown,
  code: ErrorCode
): error is WorklaneError {
  return isWorklaneError(error) && error.code === code;
}
