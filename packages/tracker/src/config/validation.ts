/**
 * Configuration Validation
 */

import { ValidationError, ErrorCode } from '@worklane/core';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../utils/logger.js';
import type { Configuration, JournalMode, PartialConfiguration } from './types.js';
import { VALID_JOURNAL_MODES } from './types.js';
import { MAX_BUSY_TIMEOUT } from './defaults.js';

// ============================================================================
// Field Validators
// ============================================================================

export function isValidActor(value: unknown): value is string {
  return typeof value === 'string' && /^[a-zA-Z0-9_.-]+$/.test(value);
}

export function validateActor(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError('Actor must be a string', ErrorCode.INVALID_INPUT, {
      field: 'actor',
      value,
      expected: 'string',
    });
  }
  if (!isValidActor(value)) {
    throw new ValidationError(
      'Actor must contain only alphanumeric characters, dots, hyphens, and underscores',
      ErrorCode.INVALID_INPUT,
      { field: 'actor', value }
    );
  }
  return value;
}

export function validateDatabase(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError('Database must be a string', ErrorCode.INVALID_INPUT, {
      field: 'database',
      value,
      expected: 'string',
    });
  }
  if (value.trim().length === 0) {
    throw new ValidationError('Database cannot be empty', ErrorCode.INVALID_INPUT, { field: 'database', value });
  }
  return value;
}

export function isValidJournalMode(value: unknown): value is JournalMode {
  return typeof value === 'string' && (VALID_JOURNAL_MODES as readonly string[]).includes(value);
}

export function validateJournalMode(value: unknown): JournalMode {
  if (!isValidJournalMode(value)) {
    throw new ValidationError(
      `Invalid journal mode: '${String(value)}'. Must be one of: ${VALID_JOURNAL_MODES.join(', ')}`,
      ErrorCode.INVALID_INPUT,
      { field: 'storage.journalMode', value }
    );
  }
  return value;
}

export function validateBusyTimeout(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_BUSY_TIMEOUT) {
    throw new ValidationError(
      `storage.busyTimeout must be an integer between 0 and ${MAX_BUSY_TIMEOUT}ms`,
      ErrorCode.INVALID_INPUT,
      { field: 'storage.busyTimeout', value }
    );
  }
  return value;
}

export function validateLogLevel(value: unknown): LogLevel {
  if (!isLogLevel(value)) {
    throw new ValidationError(
      `Invalid log level: '${String(value)}'. Must be one of: ${LOG_LEVELS.join(', ')}`,
      ErrorCode.INVALID_INPUT,
      { field: 'logLevel', value }
    );
  }
  return value;
}

// ============================================================================
// Whole-Configuration Validation
// ============================================================================

/**
 * Validates a complete configuration
 *
 * @throws ValidationError naming the first invalid field
 */
export function validateConfiguration(config: Configuration): Configuration {
  if (config.actor !== undefined) {
    validateActor(config.actor);
  }
  validateDatabase(config.database);
  validateJournalMode(config.storage.journalMode);
  validateBusyTimeout(config.storage.busyTimeout);
  validateLogLevel(config.logLevel);
  return config;
}

/**
 * Validates only the fields present in a partial configuration
 */
export function validatePartialConfiguration(config: PartialConfiguration): void {
  if (config.actor !== undefined) {
    validateActor(config.actor);
  }
  if (config.database !== undefined) {
    validateDatabase(config.database);
  }
  if (config.storage?.journalMode !== undefined) {
    validateJournalMode(config.storage.journalMode);
  }
  if (config.storage?.busyTimeout !== undefined) {
    validateBusyTimeout(config.storage.busyTimeout);
  }
  if (config.logLevel !== undefined) {
    validateLogLevel(config.logLevel);
  }
}
