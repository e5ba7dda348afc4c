import { describe, it, expect } from 'vitest';
import {
  asTaskId,
  isValidId,
  validateId,
  isValidTimestamp,
  validateTimestamp,
  createTimestamp,
  parseTimestamp,
} from './common.js';
import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

describe('isValidId', () => {
  it('should accept positive integers', () => {
    expect(isValidId(1)).toBe(true);
    expect(isValidId(asTaskId(987))).toBe(true);
  });

  it('should reject everything else', () => {
    expect(isValidId(0)).toBe(false);
    expect(isValidId(-3)).toBe(false);
    expect(isValidId(1.5)).toBe(false);
    expect(isValidId('1')).toBe(false);
    expect(isValidId(undefined)).toBe(false);
  });
});

describe('validateId', () => {
  it('should return a valid id', () => {
    expect(validateId(12, 'taskId')).toBe(12);
  });

  it('should throw INVALID_ID naming the field', () => {
    expect(() => validateId(0, 'taskId')).toThrow(ValidationError);
    expect(() => validateId(0, 'taskId')).toThrow(
      expect.objectContaining({
        code: ErrorCode.INVALID_ID,
        message: 'taskId must be a positive integer',
        details: expect.objectContaining({ field: 'taskId' }),
      })
    );
  });
});

describe('timestamps', () => {
  it('should accept ISO 8601 UTC with and without milliseconds', () => {
    expect(isValidTimestamp('2025-03-01T08:30:00.000Z')).toBe(true);
    expect(isValidTimestamp('2025-03-01T08:30:00Z')).toBe(true);
  });

  it('should reject other shapes and rolled-over dates', () => {
    expect(isValidTimestamp('2025-03-01')).toBe(false);
    expect(isValidTimestamp('2025-02-30T00:00:00.000Z')).toBe(false);
    expect(isValidTimestamp(1700000000000)).toBe(false);
  });

  it('validateTimestamp should throw INVALID_TIMESTAMP', () => {
    expect(() => validateTimestamp('yesterday', 'dueDate')).toThrow(ValidationError);
  });

  it('createTimestamp should format the given instant', () => {
    const date = new Date(Date.UTC(2025, 0, 2, 3, 4, 5, 6));
    expect(createTimestamp(date)).toBe('2025-01-02T03:04:05.006Z');
    expect(parseTimestamp('2025-01-02T03:04:05.006Z').getTime()).toBe(date.getTime());
  });
});
