/**
 * Storage Types
 *
 * Row shapes, the transaction handle, connection settings and migrations.
 */

/** One result row, keyed by column name */
export type Row = Record<string, unknown>;

/** Outcome of an INSERT, UPDATE or DELETE */
export interface MutationResult {
  changes: number;
  /** Rowid of the last inserted row; absent for statements that insert nothing */
  lastInsertRowid?: number | bigint;
}

/**
 * Handle passed to a transaction body. Statements run through it share the
 * enclosing transaction.
 */
export interface Transaction {
  exec(sql: string): void;
  query<T extends Row = Row>(sql: string, params?: unknown[]): T[];
  queryOne<T extends Row = Row>(sql: string, params?: unknown[]): T | undefined;
  run(sql: string, params?: unknown[]): MutationResult;
}

/**
 * Connection pragmas. Unset keys fall back to DEFAULT_PRAGMAS.
 */
export interface SqlitePragmas {
  journal_mode?: 'delete' | 'truncate' | 'persist' | 'memory' | 'wal' | 'off';
  synchronous?: 'off' | 'normal' | 'full' | 'extra';
  foreign_keys?: boolean;
  /** Milliseconds a writer waits on a locked database before SQLITE_BUSY */
  busy_timeout?: number;
}

export interface StorageConfig {
  /** Database file, or `:memory:` */
  path: string;
  pragmas?: SqlitePragmas;
  /** When false, opening a missing file fails instead of creating it (default true) */
  create?: boolean;
}

export const DEFAULT_PRAGMAS: Required<SqlitePragmas> = {
  journal_mode: 'wal',
  synchronous: 'normal',
  foreign_keys: true,
  busy_timeout: 5000,
};

/**
 * A numbered schema step. `down` reverses `up` and is only run by resetSchema.
 */
export interface Migration {
  version: number;
  description: string;
  up: string;
  down?: string;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  /** Versions applied by this call, in order */
  applied: number[];
  success: boolean;
}
