/**
 * Duration Parsing
 *
 * Converts duration strings such as '500ms', '5s' or '1m' into milliseconds.
 */

import { ValidationError, ErrorCode } from '@worklane/core';
import type { Duration } from './types.js';

/**
 * Duration unit multipliers (to milliseconds)
 */
export const DURATION_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
} as const;

type DurationUnit = keyof typeof DURATION_UNITS;

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m)$/;

function isDurationUnit(value: string): value is DurationUnit {
  return value in DURATION_UNITS;
}

/**
 * Parses a duration string to milliseconds
 *
 * @example
 * parseDuration('500ms') // 500
 * parseDuration('5s')    // 5000
 * parseDuration('1m')    // 60000
 */
export function parseDuration(value: string, field = 'duration'): Duration {
  const match = DURATION_PATTERN.exec(value.trim());
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined || !isDurationUnit(unit)) {
    throw new ValidationError(
      `Invalid duration format for ${field}: '${value}'. Expected <number><unit> with unit ms, s or m`,
      ErrorCode.INVALID_INPUT,
      { field, value, expected: '<number><unit>' }
    );
  }
  return Math.round(parseFloat(amount) * DURATION_UNITS[unit]);
}

/**
 * Parses a duration given either as milliseconds or as a duration string
 */
export function parseDurationValue(value: unknown, field = 'duration'): Duration {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(
        `Invalid duration value for ${field}: ${value}. Must be a non-negative finite number`,
        ErrorCode.INVALID_INPUT,
        { field, value, expected: 'non-negative finite number' }
      );
    }
    return Math.round(value);
  }
  if (typeof value === 'string') {
    if (/^\d+$/.test(value.trim())) {
      return parseInt(value.trim(), 10);
    }
    return parseDuration(value, field);
  }
  throw new ValidationError(`${field} must be a number or duration string`, ErrorCode.INVALID_INPUT, {
    field,
    value,
  });
}
