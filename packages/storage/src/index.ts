/**
 * @worklane/storage
 *
 * SQLite storage layer for Worklane: the backend interface, the
 * better-sqlite3 implementation, SQLite error mapping and the schema
 * migrations.
 */

// Type definitions
export type {
  Row,
  MutationResult,
  Transaction,
  SqlitePragmas,
  StorageConfig,
  Migration,
  MigrationResult,
} from './types.js';

export { DEFAULT_PRAGMAS } from './types.js';

// Backend interface
export type { StorageBackend } from './backend.js';

// Error mapping
export {
  mapStorageError,
  connectionError,
  migrationError,
  type StorageErrorContext,
} from './errors.js';

// better-sqlite3 backend
export { NodeStorageBackend, createNodeStorage } from './node-backend.js';
export { createStorage } from './create-backend.js';

// Schema management
export {
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
