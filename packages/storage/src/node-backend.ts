/**
 * better-sqlite3 Backend
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType, RunResult } from 'better-sqlite3';
import type { StorageBackend } from './backend.js';
import type {
  Row,
  MutationResult,
  Transaction,
  StorageConfig,
  Migration,
  MigrationResult,
  SqlitePragmas,
} from './types.js';
import { DEFAULT_PRAGMAS } from './types.js';
import { connectionError, mapStorageError, migrationError } from './errors.js';

const IN_MEMORY = ':memory:';

/**
 * SQLite has no undefined and no boolean; bind them as NULL and 0/1
 */
function bindParams(params?: unknown[]): unknown[] {
  if (!params) return [];
  return params.map((p) => {
    if (p === undefined) return null;
    if (typeof p === 'boolean') return p ? 1 : 0;
    return p;
  });
}

function toMutationResult(result: RunResult): MutationResult {
  return { changes: result.changes, lastInsertRowid: result.lastInsertRowid };
}

/**
 * SQLite backend on a single better-sqlite3 connection
 */
export class NodeStorageBackend implements StorageBackend {
  private db: DatabaseType | null;
  private readonly dbPath: string;
  private depth = 0;

  constructor(config: StorageConfig) {
    this.dbPath = config.path;
    try {
      this.db = new Database(config.path, { fileMustExist: config.create === false });
      this.applyPragmas(this.db, { ...DEFAULT_PRAGMAS, ...config.pragmas });
    } catch (error) {
      throw connectionError(config.path, error);
    }
  }

  private applyPragmas(db: DatabaseType, pragmas: Required<SqlitePragmas>): void {
    // an in-memory database keeps its memory journal
    if (this.dbPath !== IN_MEMORY) {
      db.pragma(`journal_mode = ${pragmas.journal_mode}`);
    }
    db.pragma(`synchronous = ${pragmas.synchronous}`);
    db.pragma(`foreign_keys = ${pragmas.foreign_keys ? 'ON' : 'OFF'}`);
    db.pragma(`busy_timeout = ${Math.trunc(pragmas.busy_timeout)}`);
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  get path(): string {
    return this.dbPath;
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private connection(): DatabaseType {
    if (!this.db) {
      throw mapStorageError(new Error('Database is closed'), { operation: 'connect' });
    }
    return this.db;
  }

  exec(sql: string): void {
    try {
      this.connection().exec(sql);
    } catch (error) {
      throw mapStorageError(error, { operation: 'exec' });
    }
  }

  query<T extends Row = Row>(sql: string, params?: unknown[]): T[] {
    try {
      return this.connection().prepare<unknown[], T>(sql).all(...bindParams(params));
    } catch (error) {
      throw mapStorageError(error, { operation: 'query' });
    }
  }

  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined {
    try {
      return this.connection().prepare<unknown[], T>(sql).get(...bindParams(params));
    } catch (error) {
      throw mapStorageError(error, { operation: 'queryOne' });
    }
  }

  run(sql: string, params?: unknown[]): MutationResult {
    try {
      return toMutationResult(this.connection().prepare(sql).run(...bindParams(params)));
    } catch (error) {
      throw mapStorageError(error, { operation: 'run' });
    }
  }

  transaction<T>(fn: (tx: Transaction) => T): T {
    const db = this.connection();
    const nested = this.depth > 0;
    const savepoint = `sp_${this.depth}`;

    db.exec(nested ? `SAVEPOINT ${savepoint}` : 'BEGIN');
    this.depth++;
    try {
      const result = fn(this);
      db.exec(nested ? `RELEASE SAVEPOINT ${savepoint}` : 'COMMIT');
      return result;
    } catch (error) {
      // SQLite may already have rolled back on its own (e.g. SQLITE_FULL)
      if (db.inTransaction) {
        if (nested) {
          db.exec(`ROLLBACK TO SAVEPOINT ${savepoint}`);
          db.exec(`RELEASE SAVEPOINT ${savepoint}`);
        } else {
          db.exec('ROLLBACK');
        }
      }
      throw mapStorageError(error, { operation: 'transaction' });
    } finally {
      this.depth--;
    }
  }

  getSchemaVersion(): number {
    const version: unknown = this.connection().pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  }

  setSchemaVersion(version: number): void {
    this.connection().pragma(`user_version = ${Math.trunc(version)}`);
  }

  migrate(migrations: readonly Migration[]): MigrationResult {
    const fromVersion = this.getSchemaVersion();
    const pending = migrations
      .filter((m) => m.version > fromVersion)
      .sort((a, b) => a.version - b.version);

    const applied: number[] = [];
    for (const migration of pending) {
      try {
        this.transaction(() => {
          this.exec(migration.up);
          this.setSchemaVersion(migration.version);
        });
      } catch (error) {
        throw migrationError(migration.version, error);
      }
      applied.push(migration.version);
    }

    return { fromVersion, toVersion: this.getSchemaVersion(), applied, success: true };
  }
}

export function createNodeStorage(config: StorageConfig): StorageBackend {
  return new NodeStorageBackend(config);
}
