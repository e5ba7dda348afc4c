/**
 * Tests for Schema Management
 *
 * Tests schema initialization, migrations, validation, and table constraints.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ErrorCode } from '@worklane/core';
import { createStorage } from './create-backend.js';
import type { StorageBackend } from './backend.js';
import {
  CURRENT_SCHEMA_VERSION,
  MIGRATIONS,
  EXPECTED_TABLES,
  initializeSchema,
  getSchemaVersion,
  isSchemaUpToDate,
  getPendingMigrations,
  resetSchema,
  validateSchema,
  getTableColumns,
  getTableIndexes,
} from './schema.js';

const TS = '2025-06-01T12:00:00.000Z';

describe('Schema Management', () => {
  let backend: StorageBackend;

  beforeEach(() => {
    backend = createStorage({ path: ':memory:' });
  });

  afterEach(() => {
    if (backend.isOpen) {
      backend.close();
    }
  });

  function insertUser(id: number, username: string): void {
    backend.run(
      `INSERT INTO users (id, username, email, full_name, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [id, username, `${username}@example.com`, `${username} Example`, TS, TS]
    );
  }

  function insertProject(id: number): void {
    backend.run('INSERT INTO projects (id, name, created_at, updated_at) VALUES (?, ?, ?, ?)', [
      id,
      'Website Relaunch',
      TS,
      TS,
    ]);
  }

  function insertTask(id: number, status = 'PENDING', completedAt: string | null = null): void {
    backend.run(
      `INSERT INTO tasks (id, title, description, status, priority, due_date, completed_at, project_id, created_at, updated_at)
       VALUES (?, ?, ?, ?, 'MEDIUM', ?, ?, 1, ?, ?)`,
      [id, 'Write copy', 'Draft landing page copy', status, TS, completedAt, TS, TS]
    );
  }

  // ==========================================================================
  // Schema Constants
  // ==========================================================================

  describe('Schema Constants', () => {
    it('should have migrations in ascending version order starting from 1', () => {
      expect(MIGRATIONS.map((m) => m.version)).toEqual([1, 2]);
    });

    it('should have latest migration version equal to CURRENT_SCHEMA_VERSION', () => {
      expect(MIGRATIONS[MIGRATIONS.length - 1]?.version).toBe(CURRENT_SCHEMA_VERSION);
    });

    it('should describe every migration and provide a down script', () => {
      for (const migration of MIGRATIONS) {
        expect(migration.description.length).toBeGreaterThan(0);
        expect(migration.down).toBeDefined();
      }
    });
  });

  // ==========================================================================
  // Schema Initialization
  // ==========================================================================

  describe('initializeSchema', () => {
    it('should apply all migrations on a fresh database', () => {
      const result = initializeSchema(backend);

      expect(result).toEqual({ fromVersion: 0, toVersion: CURRENT_SCHEMA_VERSION, applied: [1, 2], success: true });
      expect(getSchemaVersion(backend)).toBe(CURRENT_SCHEMA_VERSION);
    });

    it('should be idempotent', () => {
      initializeSchema(backend);
      const second = initializeSchema(backend);

      expect(second.applied).toEqual([]);
      expect(second.toVersion).toBe(CURRENT_SCHEMA_VERSION);
    });
  });

  describe('isSchemaUpToDate and getPendingMigrations', () => {
    it('should report every migration pending on a fresh database', () => {
      expect(isSchemaUpToDate(backend)).toBe(false);
      expect(getPendingMigrations(backend).map((m) => m.version)).toEqual([1, 2]);
    });

    it('should report only later migrations after a partial upgrade', () => {
      backend.migrate(MIGRATIONS.filter((m) => m.version === 1));
      expect(getPendingMigrations(backend).map((m) => m.version)).toEqual([2]);
    });

    it('should report nothing pending after initialization', () => {
      initializeSchema(backend);
      expect(isSchemaUpToDate(backend)).toBe(true);
      expect(getPendingMigrations(backend)).toEqual([]);
    });
  });

  describe('validateSchema', () => {
    it('should report missing tables for uninitialized database', () => {
      const result = validateSchema(backend);
      expect(result.valid).toBe(false);
      expect(result.missingTables).toEqual([...EXPECTED_TABLES]);
    });

    it('should report valid for initialized database', () => {
      initializeSchema(backend);
      expect(validateSchema(backend)).toEqual({ valid: true, missingTables: [], extraTables: [] });
    });
  });

  // ==========================================================================
  // Table Structure
  // ==========================================================================

  describe('Tasks Table', () => {
    beforeEach(() => {
      initializeSchema(backend);
    });

    it('should have the expected columns', () => {
      const names = getTableColumns(backend, 'tasks').map((c) => c.name);
      expect(names).toEqual([
        'id',
        'title',
        'description',
        'status',
        'priority',
        'due_date',
        'start_date',
        'completed_at',
        'estimated_hours',
        'notes',
        'project_id',
        'created_at',
        'updated_at',
      ]);
    });

    it('should keep optional columns nullable', () => {
      const nullable = getTableColumns(backend, 'tasks')
        .filter((c) => !c.notnull && !c.pk)
        .map((c) => c.name);
      expect(nullable).toEqual(['start_date', 'completed_at', 'estimated_hours', 'notes']);
    });

    it('should have expected indexes', () => {
      expect(getTableIndexes(backend, 'tasks').sort()).toEqual([
        'idx_tasks_due_date',
        'idx_tasks_project',
        'idx_tasks_status',
      ]);
    });

    it('should reject an unknown status', () => {
      insertProject(1);
      expect(() => insertTask(1, 'ARCHIVED')).toThrow(expect.objectContaining({ code: ErrorCode.DATABASE_ERROR }));
    });

    it('should require completed_at exactly when status is COMPLETED', () => {
      insertProject(1);
      expect(() => insertTask(1, 'COMPLETED', null)).toThrow(/CHECK constraint failed/);
      expect(() => insertTask(2, 'IN_PROGRESS', TS)).toThrow(/CHECK constraint failed/);
      insertTask(3, 'COMPLETED', TS);
      expect(backend.queryOne('SELECT status FROM tasks WHERE id = 3')).toEqual({ status: 'COMPLETED' });
    });

    it('should reject a task for a project that does not exist', () => {
      expect(() => insertTask(1)).toThrow(expect.objectContaining({ message: 'Referenced record does not exist' }));
    });
  });

  // ==========================================================================
  // Data Integrity
  // ==========================================================================

  describe('Data Integrity', () => {
    beforeEach(() => {
      initializeSchema(backend);
      insertProject(1);
      insertUser(1, 'alice');
      insertUser(2, 'bob');
    });

    it('should reject duplicate usernames as a conflict', () => {
      expect(() =>
        backend.run(
          `INSERT INTO users (username, email, full_name, created_at, updated_at) VALUES (?, ?, ?, ?, ?)`,
          ['alice', 'other@example.com', 'Alice Again', TS, TS]
        )
      ).toThrow(
        expect.objectContaining({
          code: ErrorCode.ALREADY_EXISTS,
          message: 'Record already exists (duplicate username)',
        })
      );
    });

    it('should prevent linking the same user twice', () => {
      insertTask(1);
      backend.run('INSERT INTO task_assignees (task_id, user_id) VALUES (1, 1)');
      expect(() => backend.run('INSERT INTO task_assignees (task_id, user_id) VALUES (1, 1)')).toThrow(
        expect.objectContaining({ code: ErrorCode.ALREADY_EXISTS })
      );
    });

    it('should cascade task deletion to assignees, comments and attachments', () => {
      insertTask(1);
      insertTask(2);
      backend.run('INSERT INTO task_assignees (task_id, user_id) VALUES (1, 1), (1, 2), (2, 2)');
      backend.run('INSERT INTO comments (task_id, author_id, text, created_at) VALUES (1, 1, ?, ?)', ['Looks good', TS]);
      backend.run(
        `INSERT INTO attachments (task_id, original_filename, content_type, file_size, uploaded_by, uploaded_at)
         VALUES (1, 'brief.pdf', 'application/pdf', 2048, 1, ?)`,
        [TS]
      );

      backend.run('DELETE FROM tasks WHERE id = 1');

      expect(backend.query('SELECT task_id, user_id FROM task_assignees')).toEqual([{ task_id: 2, user_id: 2 }]);
      expect(backend.query('SELECT id FROM comments')).toEqual([]);
      expect(backend.query('SELECT id FROM attachments')).toEqual([]);
      expect(backend.queryOne<{ count: number }>('SELECT COUNT(*) as count FROM users')?.count).toBe(2);
    });

    it('should reject an empty attachment', () => {
      insertTask(1);
      expect(() =>
        backend.run(
          `INSERT INTO attachments (task_id, original_filename, file_size, uploaded_by, uploaded_at)
           VALUES (1, 'empty.txt', 0, 1, ?)`,
          [TS]
        )
      ).toThrow(/CHECK constraint failed/);
    });
  });

  // ==========================================================================
  // Reset
  // ==========================================================================

  describe('resetSchema', () => {
    it('should drop all tables and reset the version', () => {
      initializeSchema(backend);
      resetSchema(backend);

      expect(getSchemaVersion(backend)).toBe(0);
      expect(validateSchema(backend).missingTables).toEqual([...EXPECTED_TABLES]);
    });

    it('should allow re-initialization after reset', () => {
      initializeSchema(backend);
      resetSchema(backend);

      expect(initializeSchema(backend).applied).toEqual([1, 2]);
      expect(validateSchema(backend).valid).toBe(true);
    });
  });
});
