import { describe, it, expect } from 'vitest';
import {
  type User,
  validateUsername,
  validateEmail,
  isValidEmail,
  validateFullName,
  toUserSummary,
  isAssignable,
} from './user.js';
import { asUserId } from './common.js';
import { ValidationError } from '../errors/error.js';

function createTestUser(overrides: Partial<User> = {}): User {
  return {
    id: asUserId(1),
    username: 'alice',
    email: 'alice@example.com',
    fullName: 'Alice Example',
    active: true,
    deleted: false,
    createdAt: '2025-01-01T00:00:00.000Z',
    updatedAt: '2025-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('validateUsername', () => {
  it('should trim and accept 3-50 characters', () => {
    expect(validateUsername('  bob ')).toBe('bob');
    expect(validateUsername('x'.repeat(50))).toBe('x'.repeat(50));
  });

  it('should reject short, long and blank names', () => {
    expect(() => validateUsername('ab')).toThrow(ValidationError);
    expect(() => validateUsername('x'.repeat(51))).toThrow(ValidationError);
    expect(() => validateUsername('   ')).toThrow('Username is required');
  });
});

describe('validateEmail', () => {
  it('should accept plausible addresses', () => {
    expect(validateEmail('dev@example.org')).toBe('dev@example.org');
    expect(isValidEmail('dev@example')).toBe(false);
  });

  it('should reject malformed addresses', () => {
    expect(() => validateEmail('not-an-email')).toThrow('Email must be valid');
  });
});

describe('validateFullName', () => {
  it('should enforce 2-100 characters', () => {
    expect(validateFullName(' Al ')).toBe('Al');
    expect(() => validateFullName('A')).toThrow(ValidationError);
  });
});

describe('toUserSummary', () => {
  it('should keep only the summary fields', () => {
    expect(toUserSummary(createTestUser())).toEqual({
      id: 1,
      username: 'alice',
      fullName: 'Alice Example',
      email: 'alice@example.com',
    });
  });
});

describe('isAssignable', () => {
  it('should require active and not deleted', () => {
    expect(isAssignable(createTestUser())).toBe(true);
    expect(isAssignable(createTestUser({ active: false }))).toBe(false);
    expect(isAssignable(createTestUser({ deleted: true }))).toBe(false);
  });
});
