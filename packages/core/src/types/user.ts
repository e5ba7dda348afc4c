/**
 * User Type - collaborators that tasks are assigned to
 *
 * Users are owned by the user directory. The task engine only reads them,
 * except for the directory-administration operations layered on top.
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import type { Timestamp, UserId } from './common.js';

// ============================================================================
// Validation Constants
// ============================================================================

export const MIN_USERNAME_LENGTH = 3;
export const MAX_USERNAME_LENGTH = 50;
export const MIN_FULL_NAME_LENGTH = 2;
export const MAX_FULL_NAME_LENGTH = 100;
export const MAX_EMAIL_LENGTH = 100;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

// ============================================================================
// User Interface
// ============================================================================

/**
 * A collaborator known to the user directory.
 *
 * `active` and `deleted` are independent: an inactive user can no longer be
 * assigned but still shows on tasks it was assigned to before, while a
 * deleted user disappears from every default read.
 */
export interface User {
  readonly id: UserId;
  username: string;
  email: string;
  fullName: string;
  active: boolean;
  deleted: boolean;
  deletedAt?: Timestamp;
  readonly createdAt: Timestamp;
  updatedAt: Timestamp;
}

/**
 * Compact projection of a user embedded in task views
 */
export interface UserSummary {
  id: UserId;
  username: string;
  fullName: string;
  email: string;
}

/**
 * Input for registering a user in the directory
 */
export interface CreateUserInput {
  username: string;
  email: string;
  fullName: string;
  /** Optional: starts inactive when false (default: true) */
  active?: boolean;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validates a username and returns it trimmed
 */
export function validateUsername(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError('Username is required', ErrorCode.MISSING_REQUIRED_FIELD, {
      field: 'username',
      value,
    });
  }
  const trimmed = value.trim();
  if (trimmed.length < MIN_USERNAME_LENGTH || trimmed.length > MAX_USERNAME_LENGTH) {
    throw new ValidationError(
      `Username must be between ${MIN_USERNAME_LENGTH} and ${MAX_USERNAME_LENGTH} characters`,
      ErrorCode.INVALID_INPUT,
      { field: 'username', actual: trimmed.length }
    );
  }
  return trimmed;
}

/**
 * Checks an email address for a plausible shape
 */
export function isValidEmail(value: unknown): value is string {
  return typeof value === 'string' && value.length <= MAX_EMAIL_LENGTH && EMAIL_PATTERN.test(value);
}

/**
 * Validates an email address and throws if invalid
 */
export function validateEmail(value: unknown): string {
  if (!isValidEmail(value)) {
    throw new ValidationError('Email must be valid', ErrorCode.INVALID_INPUT, {
      field: 'email',
      value,
    });
  }
  return value;
}

/**
 * Validates a full name and returns it trimmed
 */
export function validateFullName(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError('Full name is required', ErrorCode.MISSING_REQUIRED_FIELD, {
      field: 'fullName',
      value,
    });
  }
  const trimmed = value.trim();
  if (trimmed.length < MIN_FULL_NAME_LENGTH || trimmed.length > MAX_FULL_NAME_LENGTH) {
    throw new ValidationError(
      `Full name must be between ${MIN_FULL_NAME_LENGTH} and ${MAX_FULL_NAME_LENGTH} characters`,
      ErrorCode.INVALID_INPUT,
      { field: 'fullName', actual: trimmed.length }
    );
  }
  return trimmed;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Projects a user onto the summary embedded in task views
 */
export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    username: user.username,
    fullName: user.fullName,
    email: user.email,
  };
}

/**
 * Whether the user may receive new assignments
 */
export function isAssignable(user: User): boolean {
  return user.active && !user.deleted;
}
