import { describe, it, expect } from 'vitest';
import {
  notFound,
  taskNotFound,
  userNotFound,
  usersNotFound,
  projectNotFound,
  invalidInput,
  invalidId,
  missingRequiredField,
  invalidTimestamp,
  dueDateInPast,
  alreadyExists,
  inactiveAssignees,
  invalidTransition,
  alreadyDeleted,
  notDeleted,
  databaseError,
  migrationFailed,
} from './factories.js';
import {
  NotFoundError,
  ValidationError,
  ConflictError,
  BusinessRuleViolation,
  StorageError,
} from './error.js';
import { ErrorCode } from './codes.js';

describe('Not Found Factories', () => {
  describe('notFound', () => {
    it('should create NotFoundError with type and id', () => {
      const error = notFound('comment', 12);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.code).toBe(ErrorCode.NOT_FOUND);
      expect(error.message).toBe('Comment not found: 12');
      expect(error.details.recordId).toBe(12);
    });
  });

  describe('taskNotFound', () => {
    it('should name the task id', () => {
      const error = taskNotFound(42);
      expect(error.code).toBe(ErrorCode.TASK_NOT_FOUND);
      expect(error.message).toBe('Task not found with ID: 42');
      expect(error.details.recordId).toBe(42);
    });
  });

  describe('userNotFound', () => {
    it('should name the user id', () => {
      const error = userNotFound(5);
      expect(error.code).toBe(ErrorCode.USER_NOT_FOUND);
      expect(error.message).toBe('User not found with ID: 5');
    });
  });

  describe('usersNotFound', () => {
    it('should list every missing id', () => {
      const error = usersNotFound([4, 9]);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.code).toBe(ErrorCode.USER_NOT_FOUND);
      expect(error.message).toBe('Assignees not found with IDs: [4, 9]');
      expect(error.details.missingIds).toEqual([4, 9]);
      expect(error.details.inactiveUsernames).toEqual([]);
    });

    it('should fold inactive usernames into the same error', () => {
      const error = usersNotFound([9], ['bob']);

      expect(error.message).toBe(
        'Assignees not found with IDs: [9]; cannot assign task to inactive users: bob'
      );
      expect(error.details.missingIds).toEqual([9]);
      expect(error.details.inactiveUsernames).toEqual(['bob']);
    });
  });

  describe('projectNotFound', () => {
    it('should use one message for missing and archived projects', () => {
      const error = projectNotFound(3);
      expect(error.code).toBe(ErrorCode.PROJECT_NOT_FOUND);
      expect(error.message).toBe('Active project not found with ID: 3');
    });
  });
});

describe('Validation Factories', () => {
  it('invalidInput should truncate long values', () => {
    const error = invalidInput('title', 'x'.repeat(80), 'short text');

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(error.message).toBe(`Invalid title: ${'x'.repeat(47)}...`);
    expect(error.details.expected).toBe('short text');
  });

  it('invalidInput should stringify non-string values', () => {
    expect(invalidInput('estimatedHours', -1, '0-999').message).toBe('Invalid estimatedHours: -1');
  });

  it('invalidId should use INVALID_ID', () => {
    const error = invalidId('projectId', 0);
    expect(error.code).toBe(ErrorCode.INVALID_ID);
    expect(error.message).toBe('Invalid projectId: 0');
  });

  it('missingRequiredField should name the field', () => {
    const error = missingRequiredField('description');
    expect(error.code).toBe(ErrorCode.MISSING_REQUIRED_FIELD);
    expect(error.message).toBe('Missing required field: description');
  });

  it('invalidTimestamp should name the field', () => {
    const error = invalidTimestamp('dueDate', 'tomorrow');
    expect(error.code).toBe(ErrorCode.INVALID_TIMESTAMP);
    expect(error.message).toBe('Invalid timestamp format for dueDate: tomorrow');
  });

  it('dueDateInPast should carry the reference instant', () => {
    const error = dueDateInPast('2024-01-01T00:00:00.000Z', '2025-01-01T00:00:00.000Z');
    expect(error.code).toBe(ErrorCode.DUE_DATE_IN_PAST);
    expect(error.message).toBe('Due date must be in the present or future');
    expect(error.details.expected).toBe('>= 2025-01-01T00:00:00.000Z');
  });
});

describe('Conflict Factories', () => {
  it('alreadyExists should quote the value', () => {
    const error = alreadyExists('user', 'username', 'alice');
    expect(error).toBeInstanceOf(ConflictError);
    expect(error.message).toBe('User with username "alice" already exists');
  });
});

describe('Business Rule Factories', () => {
  it('inactiveAssignees should list every username', () => {
    const error = inactiveAssignees(['bob', 'carol']);

    expect(error).toBeInstanceOf(BusinessRuleViolation);
    expect(error.code).toBe(ErrorCode.INACTIVE_ASSIGNEE);
    expect(error.message).toBe('Cannot assign task to inactive users: bob, carol');
    expect(error.details.inactiveUsernames).toEqual(['bob', 'carol']);
  });

  it('invalidTransition should describe the attempted action', () => {
    const error = invalidTransition('complete', 'PENDING', ['IN_PROGRESS']);

    expect(error.code).toBe(ErrorCode.INVALID_TRANSITION);
    expect(error.message).toBe('Cannot complete task in status PENDING');
    expect(error.details).toEqual({
      currentStatus: 'PENDING',
      attemptedAction: 'complete',
      allowedFrom: ['IN_PROGRESS'],
    });
  });

  it('alreadyDeleted and notDeleted should name the record', () => {
    expect(alreadyDeleted('user', 'alice').message).toBe("User 'alice' has already been deleted");
    expect(alreadyDeleted('user', 'alice').code).toBe(ErrorCode.ALREADY_DELETED);
    expect(notDeleted('user', 'alice').message).toBe("User 'alice' is not deleted");
    expect(notDeleted('user', 'alice').code).toBe(ErrorCode.NOT_DELETED);
  });
});

describe('Storage Factories', () => {
  it('databaseError should wrap the cause', () => {
    const cause = new Error('SQLITE_IOERR');
    const error = databaseError('write failed', cause);

    expect(error).toBeInstanceOf(StorageError);
    expect(error.message).toBe('Database error: write failed');
    expect(error.cause).toBe(cause);
  });

  it('migrationFailed should record the version', () => {
    const error = migrationFailed(2, 'syntax error');
    expect(error.code).toBe(ErrorCode.MIGRATION_FAILED);
    expect(error.message).toBe('Migration to version 2 failed: syntax error');
    expect(error.details.version).toBe(2);
  });
});
