/**
 * Storage Backend
 *
 * The synchronous SQL surface the Worklane stores and directories are
 * written against. NodeStorageBackend implements it on better-sqlite3.
 */

import type { Row, MutationResult, Transaction, Migration, MigrationResult } from './types.js';

export interface StorageBackend {
  readonly isOpen: boolean;
  readonly path: string;
  /** True while a transaction body is running */
  readonly inTransaction: boolean;

  /** Closes the connection; every later call fails */
  close(): void;

  /** Runs one or more statements that bind no parameters (DDL, scripts) */
  exec(sql: string): void;

  /** All rows of a `?`-parameterized query */
  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];

  /** First row of a `?`-parameterized query, or undefined */
  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;

  run(sql: string, params?: unknown[]): MutationResult;

  /**
   * Runs `fn` in a transaction: committed when it returns, rolled back when
   * it throws. A call made inside an open transaction runs in a savepoint,
   * so a failing inner body undoes only its own writes and the outer body
   * decides whether to go on.
   *
   * Errors are rethrown as WorklaneError (see mapStorageError).
   */
  transaction<T>(fn: (tx: Transaction) => T): T;

  /** Reads `PRAGMA user_version` */
  getSchemaVersion(): number;

  setSchemaVersion(version: number): void;

  /**
   * Applies every migration newer than the current schema version, each in
   * its own transaction, in version order.
   */
  migrate(migrations: readonly Migration[]): MigrationResult;
}
