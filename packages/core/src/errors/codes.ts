/**
 * Error codes for the Worklane system.
 * Categorized by error type for consistent handling.
 */

/**
 * Validation error codes - Input validation failures
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** ID is not a positive integer */
  INVALID_ID: 'INVALID_ID',
  /** Unknown task status */
  INVALID_STATUS: 'INVALID_STATUS',
  /** Unknown task priority */
  INVALID_PRIORITY: 'INVALID_PRIORITY',
  /** Title shorter than 3 characters */
  TITLE_TOO_SHORT: 'TITLE_TOO_SHORT',
  /** Title exceeds 255 characters */
  TITLE_TOO_LONG: 'TITLE_TOO_LONG',
  /** Required field missing */
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  /** Timestamp format invalid */
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
  /** Due date lies in the past at creation time */
  DUE_DATE_IN_PAST: 'DUE_DATE_IN_PAST',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Not Found error codes - Resource not found or not eligible
 */
export const NotFoundErrorCode = {
  /** Generic record not found */
  NOT_FOUND: 'NOT_FOUND',
  /** Task not found */
  TASK_NOT_FOUND: 'TASK_NOT_FOUND',
  /** One or more users not found */
  USER_NOT_FOUND: 'USER_NOT_FOUND',
  /** Project missing or archived */
  PROJECT_NOT_FOUND: 'PROJECT_NOT_FOUND',
} as const;

export type NotFoundErrorCode = typeof NotFoundErrorCode[keyof typeof NotFoundErrorCode];

/**
 * Conflict error codes - State conflicts
 */
export const ConflictErrorCode = {
  /** Record with the same unique key already exists */
  ALREADY_EXISTS: 'ALREADY_EXISTS',
} as const;

export type ConflictErrorCode = typeof ConflictErrorCode[keyof typeof ConflictErrorCode];

/**
 * Business rule error codes - referenced records exist but break a domain rule
 */
export const BusinessRuleErrorCode = {
  /** Workflow transition not allowed from the current status */
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  /** Assignee exists but is not active */
  INACTIVE_ASSIGNEE: 'INACTIVE_ASSIGNEE',
  /** Record is already soft-deleted */
  ALREADY_DELETED: 'ALREADY_DELETED',
  /** Record is not soft-deleted */
  NOT_DELETED: 'NOT_DELETED',
} as const;

export type BusinessRuleErrorCode = typeof BusinessRuleErrorCode[keyof typeof BusinessRuleErrorCode];

/**
 * Storage error codes - Database and persistence errors
 */
export const StorageErrorCode = {
  /** SQLite error */
  DATABASE_ERROR: 'DATABASE_ERROR',
  /** Database is busy/locked */
  DATABASE_BUSY: 'DATABASE_BUSY',
  /** Schema migration failed */
  MIGRATION_FAILED: 'MIGRATION_FAILED',
} as const;

export type StorageErrorCode = typeof StorageErrorCode[keyof typeof StorageErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ValidationErrorCode,
  ...NotFoundErrorCode,
  ...ConflictErrorCode,
  ...BusinessRuleErrorCode,
  ...StorageErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Maps error codes to HTTP status codes for whichever transport sits on top
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_ID]: 400,
  [ErrorCode.INVALID_STATUS]: 400,
  [ErrorCode.INVALID_PRIORITY]: 400,
  [ErrorCode.TITLE_TOO_SHORT]: 400,
  [ErrorCode.TITLE_TOO_LONG]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INVALID_TIMESTAMP]: 400,
  [ErrorCode.DUE_DATE_IN_PAST]: 400,

  // Not Found errors -> 404
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.TASK_NOT_FOUND]: 404,
  [ErrorCode.USER_NOT_FOUND]: 404,
  [ErrorCode.PROJECT_NOT_FOUND]: 404,

  // Conflict errors -> 409
  [ErrorCode.ALREADY_EXISTS]: 409,

  // Business rule errors -> 400 (caller-correctable)
  [ErrorCode.INVALID_TRANSITION]: 400,
  [ErrorCode.INACTIVE_ASSIGNEE]: 400,
  [ErrorCode.ALREADY_DELETED]: 400,
  [ErrorCode.NOT_DELETED]: 400,

  // Storage errors -> 500/503
  [ErrorCode.DATABASE_ERROR]: 500,
  [ErrorCode.DATABASE_BUSY]: 503,
  [ErrorCode.MIGRATION_FAILED]: 500,
};
