/**
 * Shared primitives - identifiers and timestamps
 *
 * Every persisted record in Worklane is keyed by a positive integer assigned
 * by storage. The brands keep task, user and project IDs from being mixed up
 * at compile time.
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

// ============================================================================
// Branded Types
// ============================================================================

declare const TaskIdBrand: unique symbol;
/** Storage-assigned task identifier */
export type TaskId = number & { readonly [TaskIdBrand]: typeof TaskIdBrand };

declare const UserIdBrand: unique symbol;
/** Storage-assigned user identifier */
export type UserId = number & { readonly [UserIdBrand]: typeof UserIdBrand };

declare const ProjectIdBrand: unique symbol;
/** Storage-assigned project identifier */
export type ProjectId = number & { readonly [ProjectIdBrand]: typeof ProjectIdBrand };

/**
 * Timestamp type - ISO 8601 formatted string
 * Format: YYYY-MM-DDTHH:mm:ss.sssZ
 */
export type Timestamp = string;

// ============================================================================
// Branded Type Cast Utilities
// ============================================================================

/** Cast a number to TaskId (use at trust boundaries only) */
export function asTaskId(id: number): TaskId {
  return id as TaskId;
}

/** Cast a number to UserId (use at trust boundaries only) */
export function asUserId(id: number): UserId {
  return id as UserId;
}

/** Cast a number to ProjectId (use at trust boundaries only) */
export function asProjectId(id: number): ProjectId {
  return id as ProjectId;
}

// ============================================================================
// ID Validation
// ============================================================================

/**
 * Checks that a value can serve as a record ID
 */
export function isValidId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validates a record ID and throws if invalid
 */
export function validateId(value: unknown, field: string): number {
  if (!isValidId(value)) {
    throw new ValidationError(
      `${field} must be a positive integer`,
      ErrorCode.INVALID_ID,
      { field, value, expected: 'positive integer' }
    );
  }
  return value;
}

// ============================================================================
// Timestamps
// ============================================================================

/** ISO 8601 timestamp pattern */
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/;

/**
 * Validates a timestamp string is in ISO 8601 format
 */
export function isValidTimestamp(value: unknown): value is Timestamp {
  if (typeof value !== 'string') {
    return false;
  }
  if (!TIMESTAMP_PATTERN.test(value)) {
    return false;
  }
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    return false;
  }
  // Rejects dates that JS silently rolls over (Feb 30 -> Mar 2)
  const isoString = date.toISOString();
  const normalizedInput = value.includes('.') ? value : value.replace('Z', '.000Z');
  return isoString === normalizedInput;
}

/**
 * Validates a timestamp and throws if invalid
 */
export function validateTimestamp(value: unknown, field: string): Timestamp {
  if (!isValidTimestamp(value)) {
    throw new ValidationError(
      `Invalid timestamp format for ${field}. Expected ISO 8601 format (YYYY-MM-DDTHH:mm:ss.sssZ)`,
      ErrorCode.INVALID_TIMESTAMP,
      { field, value, expected: 'YYYY-MM-DDTHH:mm:ss.sssZ' }
    );
  }
  return value;
}

/**
 * Creates a timestamp for the given instant (default: now)
 */
export function createTimestamp(date: Date = new Date()): Timestamp {
  return date.toISOString();
}

/**
 * Parses a timestamp string to a Date object
 */
export function parseTimestamp(timestamp: Timestamp): Date {
  return new Date(timestamp);
}
