import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ErrorCode, NotFoundError, BusinessRuleViolation, asUserId, type TaskId, type User, type UserId } from '@worklane/core';
import type { UserDirectory } from '../directory/types.js';
import { AssignmentResolver } from './assignment-resolver.js';

function user(id: number, username: string, active = true): User {
  return {
    id: asUserId(id),
    username,
    email: `${username}@example.com`,
    fullName: `${username} Tester`,
    active,
    deleted: false,
    createdAt: '2030-01-01T00:00:00.000Z',
    updatedAt: '2030-01-01T00:00:00.000Z',
  };
}

/**
 * In-memory directory holding only visible (non-deleted) users
 */
class FakeUserDirectory implements UserDirectory {
  readonly lookups: UserId[][] = [];

  constructor(private readonly users: User[]) {}

  findAllById(ids: readonly UserId[]): User[] {
    this.lookups.push([...ids]);
    return this.users.filter((u) => ids.includes(u.id));
  }

  findAssignmentIds(_taskId: TaskId): UserId[] {
    return [];
  }
}

describe('AssignmentResolver', () => {
  let directory: FakeUserDirectory;
  let resolver: AssignmentResolver;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    directory = new FakeUserDirectory([user(1, 'alice'), user(2, 'bob'), user(3, 'carol', false), user(4, 'dave', false)]);
    resolver = new AssignmentResolver(directory);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns an empty list without touching the directory', () => {
    expect(resolver.resolveAssignees([])).toEqual([]);
    expect(directory.lookups).toEqual([]);
  });

  it('returns users in candidate order with duplicates dropped', () => {
    const resolved = resolver.resolveAssignees([asUserId(2), asUserId(1), asUserId(2)]);
    expect(resolved.map((u) => u.username)).toEqual(['bob', 'alice']);
    expect(directory.lookups).toEqual([[2, 1]]);
  });

  it('names every missing ID in one NotFoundError', () => {
    let thrown: unknown;
    try {
      resolver.resolveAssignees([asUserId(1), asUserId(99), asUserId(98)]);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(NotFoundError);
    expect(thrown).toMatchObject({
      code: ErrorCode.USER_NOT_FOUND,
      message: 'Assignees not found with IDs: [99, 98]',
      details: { missingIds: [99, 98], inactiveUsernames: [] },
    });
  });

  it('names every inactive user in one BusinessRuleViolation', () => {
    expect(() => resolver.resolveAssignees([asUserId(3), asUserId(1), asUserId(4)])).toThrow(BusinessRuleViolation);
    expect(() => resolver.resolveAssignees([asUserId(3), asUserId(1), asUserId(4)])).toThrow(
      expect.objectContaining({
        code: ErrorCode.INACTIVE_ASSIGNEE,
        message: 'Cannot assign task to inactive users: carol, dave',
        details: { inactiveUsernames: ['carol', 'dave'] },
      })
    );
  });

  it('reports missing and inactive users together as not found', () => {
    expect(() => resolver.resolveAssignees([asUserId(3), asUserId(99)])).toThrow(
      expect.objectContaining({
        code: ErrorCode.USER_NOT_FOUND,
        message: 'Assignees not found with IDs: [99]; cannot assign task to inactive users: carol',
        details: { missingIds: [99], inactiveUsernames: ['carol'] },
      })
    );
  });
});
