/**
 * SQLite Error Mapping
 *
 * Turns driver errors into WorklaneError subclasses so nothing above the
 * storage layer sees a raw better-sqlite3 error.
 */

import {
  StorageError,
  ConflictError,
  ErrorCode,
  isWorklaneError,
  type WorklaneError,
} from '@worklane/core';

/**
 * Where a failing statement came from
 */
export interface StorageErrorContext {
  operation?: string;
  table?: string;
  recordId?: number;
}

type Failure = 'unique' | 'foreign_key' | 'constraint' | 'busy' | 'corrupt' | 'other';

/**
 * better-sqlite3 reports extended result names such as
 * "SQLITE_CONSTRAINT_UNIQUE"; the primary name is the prefix.
 */
function driverCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function hasPrimaryCode(code: string | undefined, primary: string): boolean {
  return code === primary || (code?.startsWith(`${primary}_`) ?? false);
}

function classify(error: Error): Failure {
  const code = driverCode(error);
  const message = error.message;

  if (/(UNIQUE|PRIMARY KEY) constraint failed/i.test(message)) return 'unique';
  if (/FOREIGN KEY constraint failed/i.test(message)) return 'foreign_key';
  if (hasPrimaryCode(code, 'SQLITE_CONSTRAINT') || /constraint failed/i.test(message)) return 'constraint';
  if (
    hasPrimaryCode(code, 'SQLITE_BUSY') ||
    hasPrimaryCode(code, 'SQLITE_LOCKED') ||
    /database is locked/i.test(message)
  ) {
    return 'busy';
  }
  if (
    hasPrimaryCode(code, 'SQLITE_CORRUPT') ||
    hasPrimaryCode(code, 'SQLITE_NOTADB') ||
    /malformed|not a database/i.test(message)
  ) {
    return 'corrupt';
  }
  return 'other';
}

/** "UNIQUE constraint failed: users.email" names the table and column */
function constraintTarget(message: string): { table?: string; column?: string } {
  const match = /constraint failed: (\w+)\.(\w+)/i.exec(message);
  return match ? { table: match[1], column: match[2] } : {};
}

/**
 * Maps anything thrown by the driver, or by a transaction body, to a
 * WorklaneError. Worklane errors pass through untouched.
 */
export function mapStorageError(error: unknown, context: StorageErrorContext = {}): WorklaneError {
  if (isWorklaneError(error)) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new StorageError(`Storage operation failed: ${String(error)}`, ErrorCode.DATABASE_ERROR, {
      operation: context.operation,
    });
  }

  const { operation, table, recordId } = context;
  switch (classify(error)) {
    case 'unique': {
      const target = constraintTarget(error.message);
      return new ConflictError(
        `Record already exists${target.column ? ` (duplicate ${target.column})` : ''}`,
        ErrorCode.ALREADY_EXISTS,
        { recordId, table: target.table ?? table, column: target.column, operation },
        error
      );
    }
    case 'foreign_key':
      return new StorageError(
        'Referenced record does not exist',
        ErrorCode.DATABASE_ERROR,
        { recordId, table, operation, constraint: 'foreign_key' },
        error
      );
    case 'constraint': {
      const target = constraintTarget(error.message);
      return new StorageError(
        `Database constraint violation: ${error.message}`,
        ErrorCode.DATABASE_ERROR,
        { table: target.table ?? table, column: target.column, operation, constraint: 'check' },
        error
      );
    }
    case 'busy':
      return new StorageError(
        'Database is busy. Please retry the operation.',
        ErrorCode.DATABASE_BUSY,
        { operation, retryable: true },
        error
      );
    case 'corrupt':
      return new StorageError(
        'Database is corrupted or not a valid database file',
        ErrorCode.DATABASE_ERROR,
        { operation, corrupted: true },
        error
      );
    case 'other':
      return new StorageError(
        `Database operation failed: ${error.message}`,
        ErrorCode.DATABASE_ERROR,
        { sqliteCode: driverCode(error), operation, recordId },
        error
      );
  }
}

export function connectionError(path: string, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined;
  return new StorageError(
    `Failed to open database at ${path}: ${cause?.message ?? String(error)}`,
    ErrorCode.DATABASE_ERROR,
    { path },
    cause
  );
}

/**
 * Reports the driver's message when the failure arrives already mapped
 */
export function migrationError(version: number, error: unknown): StorageError {
  const cause = error instanceof Error ? error : undefined;
  const reason = cause?.cause instanceof Error ? cause.cause.message : cause?.message ?? String(error);
  return new StorageError(
    `Failed to apply migration version ${version}: ${reason}`,
    ErrorCode.MIGRATION_FAILED,
    { version, operation: 'migrate' },
    cause
  );
}
