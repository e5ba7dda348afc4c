/**
 * Schema Management
 *
 * Defines the database schema migrations for Worklane.
 * Uses a migration-based approach for schema versioning.
 */

import type { Migration, MigrationResult } from './types.js';
import type { StorageBackend } from './backend.js';

// ============================================================================
// Schema Constants
// ============================================================================

/**
 * Current schema version
 */
export const CURRENT_SCHEMA_VERSION = 2;

// ============================================================================
// Migrations
// ============================================================================

/**
 * Migration 1: Initial schema
 *
 * Users and projects are directory-owned; tasks reference a project and are
 * linked to users through task_assignees.
 */
const migration001: Migration = {
  version: 1,
  description: 'Initial schema with users, projects, tasks, and task assignees',
  up: `
-- Directory: users (soft-deleted, never removed)
CREATE TABLE users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    email TEXT NOT NULL UNIQUE,
    full_name TEXT NOT NULL,
    active INTEGER NOT NULL DEFAULT 1 CHECK (active IN (0, 1)),
    deleted INTEGER NOT NULL DEFAULT 0 CHECK (deleted IN (0, 1)),
    deleted_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

-- Directory: projects (archived by clearing active)
CREATE TABLE projects (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    description TEXT,
    active INTEGER NOT NULL DEFAULT 1 CHECK (active IN (0, 1)),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

-- Tasks
CREATE TABLE tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'PENDING',
    priority TEXT NOT NULL DEFAULT 'MEDIUM',
    due_date TEXT NOT NULL,
    start_date TEXT,
    completed_at TEXT,
    estimated_hours INTEGER,
    notes TEXT,
    project_id INTEGER NOT NULL REFERENCES projects(id),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (status IN ('PENDING', 'IN_PROGRESS', 'BLOCKED', 'IN_REVIEW', 'COMPLETED', 'CANCELLED')),
    CHECK (priority IN ('LOW', 'MEDIUM', 'HIGH', 'CRITICAL')),
    CHECK (estimated_hours IS NULL OR estimated_hours BETWEEN 0 AND 999),
    CHECK ((status = 'COMPLETED') = (completed_at IS NOT NULL))
);

-- Assignment relation
CREATE TABLE task_assignees (
    task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
    user_id INTEGER NOT NULL REFERENCES users(id),
    PRIMARY KEY (task_id, user_id)
);

-- Indexes
CREATE INDEX idx_tasks_project ON tasks(project_id);
CREATE INDEX idx_tasks_status ON tasks(status);
CREATE INDEX idx_tasks_due_date ON tasks(due_date);
CREATE INDEX idx_task_assignees_user ON task_assignees(user_id);
CREATE INDEX idx_users_deleted ON users(deleted);
`,
  down: `
DROP TABLE IF EXISTS task_assignees;
DROP TABLE IF EXISTS tasks;
DROP TABLE IF EXISTS projects;
DROP TABLE IF EXISTS users;
`,
};

/**
 * Migration 2: Task activity
 *
 * Comments and attachments are owned by their task and go with it.
 */
const migration002: Migration = {
  version: 2,
  description: 'Add comments and attachments owned by tasks',
  up: `
CREATE TABLE comments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
    author_id INTEGER NOT NULL REFERENCES users(id),
    text TEXT NOT NULL,
    created_at TEXT NOT NULL
);

CREATE TABLE attachments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
    original_filename TEXT NOT NULL,
    content_type TEXT,
    file_size INTEGER NOT NULL CHECK (file_size > 0),
    uploaded_by INTEGER NOT NULL REFERENCES users(id),
    uploaded_at TEXT NOT NULL
);

CREATE INDEX idx_comments_task ON comments(task_id);
CREATE INDEX idx_attachments_task ON attachments(task_id);
`,
  down: `
DROP TABLE IF EXISTS attachments;
DROP TABLE IF EXISTS comments;
`,
};

/**
 * All migrations in order
 */
export const MIGRATIONS: readonly Migration[] = [migration001, migration002];

// ============================================================================
// Schema Functions
// ============================================================================

/**
 * Initialize the database schema
 *
 * Applies all pending migrations to bring the database up to the current version.
 *
 * @param backend - The storage backend to initialize
 * @returns Migration result with details of what was applied
 */
export function initializeSchema(backend: StorageBackend): MigrationResult {
  return backend.migrate(MIGRATIONS);
}

/**
 * Get the current schema version from a backend
 *
 * @param backend - The storage backend to check
 * @returns Current schema version number
 */
export function getSchemaVersion(backend: StorageBackend): number {
  return backend.getSchemaVersion();
}

/**
 * Check if the schema is up to date
 *
 * @param backend - The storage backend to check
 * @returns True if schema is at the current version
 */
export function isSchemaUpToDate(backend: StorageBackend): boolean {
  return backend.getSchemaVersion() === CURRENT_SCHEMA_VERSION;
}

/**
 * Get pending migrations that need to be applied
 *
 * @param backend - The storage backend to check
 * @returns Array of migrations that haven't been applied yet
 */
export function getPendingMigrations(backend: StorageBackend): Migration[] {
  const currentVersion = backend.getSchemaVersion();
  return MIGRATIONS.filter((m) => m.version > currentVersion);
}

/**
 * Reset the database schema
 *
 * WARNING: This drops all tables and data! Use only for testing.
 *
 * @param backend - The storage backend to reset
 */
export function resetSchema(backend: StorageBackend): void {
  // Run all down scripts in reverse order (newest first)
  const reversedMigrations = [...MIGRATIONS].reverse();
  for (const migration of reversedMigrations) {
    if (migration.down) {
      backend.exec(migration.down);
    }
  }

  // Reset version
  backend.setSchemaVersion(0);
}

// ============================================================================
// Schema Validation
// ============================================================================

/**
 * Table names that should exist after schema initialization
 */
export const EXPECTED_TABLES = [
  'users',
  'projects',
  'tasks',
  'task_assignees',
  'comments',
  'attachments',
] as const;

/**
 * Validate that all expected tables exist
 *
 * @param backend - The storage backend to validate
 * @returns Object with validation results
 */
export function validateSchema(backend: StorageBackend): {
  valid: boolean;
  missingTables: string[];
  extraTables: string[];
} {
  // Query actual tables
  const rows = backend.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'"
  );

  const actualTables = new Set(rows.map((r) => r.name));
  const expectedSet = new Set<string>(EXPECTED_TABLES);

  const missingTables = EXPECTED_TABLES.filter((t) => !actualTables.has(t));
  const extraTables = [...actualTables].filter((t) => !expectedSet.has(t));

  return {
    valid: missingTables.length === 0,
    missingTables,
    extraTables,
  };
}

/**
 * Validate table columns match expected schema
 *
 * @param backend - The storage backend
 * @param tableName - Name of table to validate
 * @returns Column information
 */
export function getTableColumns(
  backend: StorageBackend,
  tableName: string
): Array<{
  name: string;
  type: string;
  notnull: boolean;
  pk: boolean;
}> {
  const rows = backend.query<{
    name: string;
    type: string;
    notnull: number;
    pk: number;
  }>(`PRAGMA table_info(${tableName})`);

  return rows.map((r) => ({
    name: r.name,
    type: r.type,
    notnull: r.notnull === 1,
    pk: r.pk === 1,
  }));
}

/**
 * Get indexes for a table
 *
 * @param backend - The storage backend
 * @param tableName - Name of table
 * @returns Index names for the table
 */
export function getTableIndexes(backend: StorageBackend, tableName: string): string[] {
  const rows = backend.query<{ name: string }>(
    `SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? AND name NOT LIKE 'sqlite_%'`,
    [tableName]
  );
  return rows.map((r) => r.name);
}
