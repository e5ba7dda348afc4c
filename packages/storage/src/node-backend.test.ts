/**
 * Integration Tests for Node.js SQLite Backend
 *
 * These tests validate the better-sqlite3 backend implementation
 * against in-memory and file-based databases.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ErrorCode, ValidationError } from '@worklane/core';
import { NodeStorageBackend, createNodeStorage } from './node-backend.js';
import { createStorage } from './create-backend.js';
import type { StorageBackend } from './backend.js';
import type { Migration } from './types.js';
import { DEFAULT_PRAGMAS } from './types.js';

describe('NodeStorageBackend', () => {
  describe('In-Memory Database', () => {
    let backend: StorageBackend;

    beforeEach(() => {
      backend = new NodeStorageBackend({ path: ':memory:' });
    });

    afterEach(() => {
      if (backend.isOpen) {
        backend.close();
      }
    });

    describe('Connection Management', () => {
      it('should open in-memory database', () => {
        expect(backend.isOpen).toBe(true);
        expect(backend.path).toBe(':memory:');
      });

      it('should throw after close', () => {
        backend.close();
        expect(backend.isOpen).toBe(false);
        expect(() => backend.exec('SELECT 1')).toThrow('Database is closed');
      });

      it('should enforce foreign keys by default', () => {
        expect(DEFAULT_PRAGMAS.foreign_keys).toBe(true);
        expect(backend.queryOne<{ foreign_keys: number }>('PRAGMA foreign_keys')).toEqual({
          foreign_keys: 1,
        });
      });
    });

    describe('SQL Execution', () => {
      beforeEach(() => {
        backend.exec('CREATE TABLE test (id INTEGER PRIMARY KEY, name TEXT, flag INTEGER)');
      });

      it('should query with results', () => {
        backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [1, 'Alice']);
        backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [2, 'Bob']);

        const rows = backend.query<{ id: number; name: string }>('SELECT id, name FROM test ORDER BY id');
        expect(rows).toEqual([
          { id: 1, name: 'Alice' },
          { id: 2, name: 'Bob' },
        ]);
      });

      it('should query with parameters', () => {
        backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [1, 'Alice']);
        backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [2, 'Bob']);

        const rows = backend.query<{ id: number }>('SELECT id FROM test WHERE name = ?', ['Bob']);
        expect(rows).toEqual([{ id: 2 }]);
      });

      it('should queryOne with no result', () => {
        expect(backend.queryOne('SELECT * FROM test WHERE id = ?', [999])).toBeUndefined();
      });

      it('should return changes and lastInsertRowid', () => {
        const result = backend.run('INSERT INTO test (name) VALUES (?)', ['Alice']);
        expect(result.changes).toBe(1);
        expect(result.lastInsertRowid).toBe(1);
      });

      it('should bind undefined as NULL and booleans as integers', () => {
        backend.run('INSERT INTO test (id, name, flag) VALUES (?, ?, ?)', [1, undefined, true]);
        expect(backend.queryOne('SELECT name, flag FROM test WHERE id = ?', [1])).toEqual({
          name: null,
          flag: 1,
        });
      });

      it('should map SQL errors to StorageError', () => {
        expect(() => backend.query('SELECT * FROM missing_table')).toThrow(
          expect.objectContaining({ code: ErrorCode.DATABASE_ERROR })
        );
      });

      it('should map unique violations to ConflictError', () => {
        backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [1, 'Alice']);
        expect(() => backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [1, 'Again'])).toThrow(
          expect.objectContaining({ code: ErrorCode.ALREADY_EXISTS })
        );
      });
    });

    describe('Transactions', () => {
      beforeEach(() => {
        backend.exec('CREATE TABLE test (id INTEGER PRIMARY KEY, name TEXT)');
      });

      it('should commit on success and return the value', () => {
        const count = backend.transaction((tx) => {
          tx.run('INSERT INTO test (id, name) VALUES (?, ?)', [1, 'Alice']);
          tx.run('INSERT INTO test (id, name) VALUES (?, ?)', [2, 'Bob']);
          return tx.queryOne<{ count: number }>('SELECT COUNT(*) as count FROM test')?.count;
        });

        expect(count).toBe(2);
        expect(backend.inTransaction).toBe(false);
        expect(backend.query('SELECT * FROM test')).toHaveLength(2);
      });

      it('should rollback on error', () => {
        expect(() => {
          backend.transaction((tx) => {
            tx.run('INSERT INTO test (id, name) VALUES (?, ?)', [1, 'Alice']);
            throw new Error('Test error');
          });
        }).toThrow('Test error');

        expect(backend.query('SELECT * FROM test')).toHaveLength(0);
        expect(backend.inTransaction).toBe(false);
      });

      it('should rethrow domain errors unchanged', () => {
        const error = new ValidationError('bad input');
        expect(() =>
          backend.transaction(() => {
            throw error;
          })
        ).toThrow(error);
      });

      it('should run nested transactions as savepoints', () => {
        backend.transaction(() => {
          backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [1, 'Alice']);
          expect(() =>
            backend.transaction(() => {
              backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [2, 'Bob']);
              throw new Error('inner failure');
            })
          ).toThrow('inner failure');
          expect(backend.inTransaction).toBe(true);
          backend.transaction(() => {
            backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [3, 'Charlie']);
          });
        });

        const rows = backend.query<{ id: number }>('SELECT id FROM test ORDER BY id');
        expect(rows.map((r) => r.id)).toEqual([1, 3]);
      });

      it('should roll back nested work when the outer transaction fails', () => {
        expect(() =>
          backend.transaction(() => {
            backend.transaction(() => {
              backend.run('INSERT INTO test (id, name) VALUES (?, ?)', [1, 'Alice']);
            });
            throw new Error('outer failure');
          })
        ).toThrow('outer failure');

        expect(backend.query('SELECT * FROM test')).toHaveLength(0);
      });
    });

    describe('Schema Management', () => {
      it('should get and set schema version', () => {
        expect(backend.getSchemaVersion()).toBe(0);
        backend.setSchemaVersion(42);
        expect(backend.getSchemaVersion()).toBe(42);
      });

      it('should run migrations in version order', () => {
        const migrations: Migration[] = [
          {
            version: 2,
            description: 'Add email column',
            up: 'ALTER TABLE people ADD COLUMN email TEXT',
          },
          {
            version: 1,
            description: 'Create people table',
            up: 'CREATE TABLE people (id INTEGER PRIMARY KEY, name TEXT)',
          },
        ];

        const result = backend.migrate(migrations);

        expect(result).toEqual({ fromVersion: 0, toVersion: 2, applied: [1, 2], success: true });
        expect(backend.getSchemaVersion()).toBe(2);
      });

      it('should skip applied migrations', () => {
        const migrations: Migration[] = [{ version: 1, description: 'Test', up: 'SELECT 1' }];

        backend.migrate(migrations);
        const result = backend.migrate(migrations);

        expect(result.applied).toEqual([]);
        expect(result.fromVersion).toBe(1);
        expect(result.toVersion).toBe(1);
      });

      it('should stop at a failing migration and keep earlier ones', () => {
        const migrations: Migration[] = [
          { version: 1, description: 'ok', up: 'CREATE TABLE a (id INTEGER)' },
          { version: 2, description: 'broken', up: 'CREATE TABL b (id INTEGER)' },
        ];

        expect(() => backend.migrate(migrations)).toThrow(
          expect.objectContaining({ code: ErrorCode.MIGRATION_FAILED, details: { version: 2, operation: 'migrate' } })
        );
        expect(backend.getSchemaVersion()).toBe(1);
      });
    });
  });

  describe('File-Based Database', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'worklane-storage-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should create new database file in WAL mode', () => {
      const path = join(dir, 'test.db');
      const backend = new NodeStorageBackend({ path });
      expect(existsSync(path)).toBe(true);
      expect(backend.queryOne('PRAGMA journal_mode')).toEqual({ journal_mode: 'wal' });
      backend.close();
    });

    it('should apply configured pragmas', () => {
      const backend = new NodeStorageBackend({
        path: join(dir, 'test.db'),
        pragmas: { journal_mode: 'delete', busy_timeout: 250 },
      });
      expect(backend.queryOne('PRAGMA journal_mode')).toEqual({ journal_mode: 'delete' });
      expect(backend.queryOne('PRAGMA busy_timeout')).toEqual({ timeout: 250 });
      backend.close();
    });

    it('should refuse to create a file when create is false', () => {
      expect(() => new NodeStorageBackend({ path: join(dir, 'absent.db'), create: false })).toThrow(
        /Failed to open database at/
      );
    });
  });

  describe('Factory Functions', () => {
    it('should create backend via factory', () => {
      const backend = createNodeStorage({ path: ':memory:' });
      expect(backend).toBeInstanceOf(NodeStorageBackend);
      backend.close();
    });

    it('should accept a bare path', () => {
      const backend = createStorage(':memory:');
      expect(backend.isOpen).toBe(true);
      expect(backend.path).toBe(':memory:');
      backend.close();
    });
  });
});
