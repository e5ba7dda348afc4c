import { ErrorCode } from './codes.js';
import {
  ValidationError,
  NotFoundError,
  ConflictError,
  BusinessRuleViolation,
  StorageError,
  ErrorDetails,
} from './error.js';

// =============================================================================
// Not Found Factories
// =============================================================================

/**
 * Creates a NotFoundError for a record that doesn't exist
 */
export function notFound(
  type: string,
  id: number,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError(`${capitalize(type)} not found: ${id}`, ErrorCode.NOT_FOUND, {
    recordId: id,
    ...details,
  });
}

/**
 * Creates a NotFoundError for a missing task
 */
export function taskNotFound(id: number, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError(`Task not found with ID: ${id}`, ErrorCode.TASK_NOT_FOUND, {
    recordId: id,
    ...details,
  });
}

/**
 * Creates a NotFoundError for a single missing user
 */
export function userNotFound(id: number, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError(`User not found with ID: ${id}`, ErrorCode.USER_NOT_FOUND, {
    recordId: id,
    ...details,
  });
}

/**
 * Creates one NotFoundError naming every missing assignee.
 *
 * When some of the found users are inactive as well, their usernames are
 * folded into the same error so the caller sees the whole problem at once.
 */
export function usersNotFound(
  missingIds: readonly number[],
  inactiveUsernames: readonly string[] = [],
  details: ErrorDetails = {}
): NotFoundError {
  let message = `Assignees not found with IDs: [${missingIds.join(', ')}]`;
  if (inactiveUsernames.length > 0) {
    message += `; cannot assign task to inactive users: ${inactiveUsernames.join(', ')}`;
  }
  return new NotFoundError(message, ErrorCode.USER_NOT_FOUND, {
    missingIds: [...missingIds],
    inactiveUsernames: [...inactiveUsernames],
    ...details,
  });
}

/**
 * Creates a NotFoundError for a project that is missing or archived.
 * Both cases produce the same message.
 */
export function projectNotFound(id: number, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError(`Active project not found with ID: ${id}`, ErrorCode.PROJECT_NOT_FOUND, {
    recordId: id,
    ...details,
  });
}

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for invalid input
 */
export function invalidInput(
  field: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  const valueStr = truncateValue(value);
  return new ValidationError(
    `Invalid ${field}: ${valueStr}`,
    ErrorCode.INVALID_INPUT,
    {
      field,
      value,
      expected,
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for an ID that is not a positive integer
 */
export function invalidId(field: string, value: unknown, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(
    `Invalid ${field}: ${truncateValue(value)}`,
    ErrorCode.INVALID_ID,
    {
      field,
      value,
      expected: 'positive integer',
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for missing required field
 */
export function missingRequiredField(field: string): ValidationError {
  return new ValidationError(
    `Missing required field: ${field}`,
    ErrorCode.MISSING_REQUIRED_FIELD,
    { field }
  );
}

/**
 * Creates a ValidationError for invalid timestamp format
 */
export function invalidTimestamp(
  field: string,
  value: unknown,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid timestamp format for ${field}: ${truncateValue(value)}`,
    ErrorCode.INVALID_TIMESTAMP,
    {
      field,
      value,
      expected: 'ISO 8601 format (YYYY-MM-DDTHH:mm:ss.sssZ)',
      ...details,
    }
  );
}

/**
 * Creates a ValidationError for a due date that already passed
 */
export function dueDateInPast(value: string, now: string): ValidationError {
  return new ValidationError(
    'Due date must be in the present or future',
    ErrorCode.DUE_DATE_IN_PAST,
    { field: 'dueDate', value, expected: `>= ${now}` }
  );
}

// =============================================================================
// Conflict Factories
// =============================================================================

/**
 * Creates a ConflictError for a duplicate unique key
 */
export function alreadyExists(
  type: string,
  field: string,
  value: string,
  details: ErrorDetails = {}
): ConflictError {
  return new ConflictError(
    `${capitalize(type)} with ${field} "${value}" already exists`,
    ErrorCode.ALREADY_EXISTS,
    { field, value, ...details }
  );
}

// =============================================================================
// Business Rule Factories
// =============================================================================

/**
 * Creates a BusinessRuleViolation naming every inactive assignee
 */
export function inactiveAssignees(
  usernames: readonly string[],
  details: ErrorDetails = {}
): BusinessRuleViolation {
  return new BusinessRuleViolation(
    `Cannot assign task to inactive users: ${usernames.join(', ')}`,
    ErrorCode.INACTIVE_ASSIGNEE,
    { inactiveUsernames: [...usernames], ...details }
  );
}

/**
 * Creates a BusinessRuleViolation for a workflow action that the
 * current status does not permit
 */
export function invalidTransition(
  action: string,
  currentStatus: string,
  allowedFrom: readonly string[],
  details: ErrorDetails = {}
): BusinessRuleViolation {
  return new BusinessRuleViolation(
    `Cannot ${action} task in status ${currentStatus}`,
    ErrorCode.INVALID_TRANSITION,
    {
      currentStatus,
      attemptedAction: action,
      allowedFrom: [...allowedFrom],
      ...details,
    }
  );
}

/**
 * Creates a BusinessRuleViolation for soft-deleting twice
 */
export function alreadyDeleted(type: string, name: string, details: ErrorDetails = {}): BusinessRuleViolation {
  return new BusinessRuleViolation(
    `${capitalize(type)} '${name}' has already been deleted`,
    ErrorCode.ALREADY_DELETED,
    details
  );
}

/**
 * Creates a BusinessRuleViolation for restoring a record that isn't deleted
 */
export function notDeleted(type: string, name: string, details: ErrorDetails = {}): BusinessRuleViolation {
  return new BusinessRuleViolation(
    `${capitalize(type)} '${name}' is not deleted`,
    ErrorCode.NOT_DELETED,
    details
  );
}

// =============================================================================
// Storage Factories
// =============================================================================

/**
 * Creates a StorageError for database operations
 */
export function databaseError(
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Database error: ${message}`,
    ErrorCode.DATABASE_ERROR,
    details,
    cause
  );
}

/**
 * Creates a StorageError for migration failures
 */
export function migrationFailed(
  version: number,
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Migration to version ${version} failed: ${message}`,
    ErrorCode.MIGRATION_FAILED,
    { ...details, version },
    cause
  );
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Capitalizes the first letter of a string
 */
function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Truncates a value for display in error messages
 */
function truncateValue(value: unknown, maxLength = 50): string {
  const str = typeof value === 'string' ? value : String(JSON.stringify(value));
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + '...';
}
