/**
 * Error handling module for Worklane
 *
 * Provides structured errors with codes, messages, and details
 * for consistent error handling across the service and storage layers.
 */

// Error codes
export {
  ErrorCode,
  ValidationErrorCode,
  NotFoundErrorCode,
  ConflictErrorCode,
  BusinessRuleErrorCode,
  StorageErrorCode,
  ErrorHttpStatus,
} from './codes.js';

// Error classes
export {
  WorklaneError,
  ValidationError,
  NotFoundError,
  ConflictError,
  BusinessRuleViolation,
  StorageError,
  isWorklaneError,
  isValidationError,
  isNotFoundError,
  isConflictError,
  isBusinessRuleViolation,
  isStorageError,
  hasErrorCode,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Not Found
  notFound,
  taskNotFound,
  userNotFound,
  usersNotFound,
  projectNotFound,
  // Validation
  invalidInput,
  invalidId,
  missingRequiredField,
  invalidTimestamp,
  dueDateInPast,
  // Conflict
  alreadyExists,
  // Business rules
  inactiveAssignees,
  invalidTransition,
  alreadyDeleted,
  notDeleted,
  // Storage
  databaseError,
  migrationFailed,
} from './factories.js';
