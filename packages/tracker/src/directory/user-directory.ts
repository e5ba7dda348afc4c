/**
 * SQLite User Directory
 *
 * Users are never removed: deletion sets `deleted` and `deleted_at`, and
 * every default lookup filters deleted rows out.
 */

import type { StorageBackend } from '@worklane/storage';
import {
  alreadyDeleted,
  alreadyExists,
  asUserId,
  createTimestamp,
  notDeleted,
  userNotFound,
  validateEmail,
  validateFullName,
  validateUsername,
  type CreateUserInput,
  type TaskId,
  type User,
  type UserId,
} from '@worklane/core';
import type { Clock, UserAdministration } from './types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('user-directory');

// ============================================================================
// Row Mapping
// ============================================================================

interface UserRow {
  id: number;
  username: string;
  email: string;
  full_name: string;
  active: number;
  deleted: number;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
  [key: string]: unknown;
}

function rowToUser(row: UserRow): User {
  return {
    id: asUserId(row.id),
    username: row.username,
    email: row.email,
    fullName: row.full_name,
    active: row.active === 1,
    deleted: row.deleted === 1,
    deletedAt: row.deleted_at ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

// ============================================================================
// SqliteUserDirectory
// ============================================================================

export class SqliteUserDirectory implements UserAdministration {
  constructor(
    private readonly db: StorageBackend,
    private readonly now: Clock = () => createTimestamp()
  ) {}

  // --------------------------------------------------------------------------
  // Lookups
  // --------------------------------------------------------------------------

  findAllById(ids: readonly UserId[]): User[] {
    const unique = [...new Set(ids)];
    if (unique.length === 0) {
      return [];
    }
    const rows = this.db.query<UserRow>(
      `SELECT * FROM users WHERE deleted = 0 AND id IN (${placeholders(unique.length)}) ORDER BY id`,
      unique
    );
    return rows.map(rowToUser);
  }

  findAssignmentIds(taskId: TaskId): UserId[] {
    const rows = this.db.query<{ user_id: number }>(
      'SELECT user_id FROM task_assignees WHERE task_id = ? ORDER BY user_id',
      [taskId]
    );
    return rows.map((row) => asUserId(row.user_id));
  }

  findById(id: UserId): User | undefined {
    const row = this.db.queryOne<UserRow>('SELECT * FROM users WHERE id = ? AND deleted = 0', [id]);
    return row ? rowToUser(row) : undefined;
  }

  findByIdIncludingDeleted(id: UserId): User | undefined {
    const row = this.db.queryOne<UserRow>('SELECT * FROM users WHERE id = ?', [id]);
    return row ? rowToUser(row) : undefined;
  }

  // --------------------------------------------------------------------------
  // Administration
  // --------------------------------------------------------------------------

  create(input: CreateUserInput): User {
    const username = validateUsername(input.username);
    const email = validateEmail(input.email.trim());
    const fullName = validateFullName(input.fullName);

    if (this.db.queryOne('SELECT id FROM users WHERE username = ?', [username])) {
      throw alreadyExists('user', 'username', username);
    }
    if (this.db.queryOne('SELECT id FROM users WHERE email = ?', [email])) {
      throw alreadyExists('user', 'email', email);
    }

    const now = this.now();
    const result = this.db.run(
      `INSERT INTO users (username, email, full_name, active, deleted, created_at, updated_at)
       VALUES (?, ?, ?, ?, 0, ?, ?)`,
      [username, email, fullName, input.active ?? true, now, now]
    );
    const id = asUserId(Number(result.lastInsertRowid));
    logger.info(`Created user ${id} (${username})`);
    return this.requireIncludingDeleted(id);
  }

  setActive(id: UserId, active: boolean): User {
    const user = this.findById(id);
    if (!user) {
      throw userNotFound(id);
    }
    this.db.run('UPDATE users SET active = ?, updated_at = ? WHERE id = ?', [active, this.now(), id]);
    logger.info(`${active ? 'Activated' : 'Deactivated'} user ${id} (${user.username})`);
    return this.requireIncludingDeleted(id);
  }

  softDelete(id: UserId): User {
    const user = this.findByIdIncludingDeleted(id);
    if (!user) {
      throw userNotFound(id);
    }
    if (user.deleted) {
      logger.warn(`User ${id} (${user.username}) is already deleted`);
      throw alreadyDeleted('user', user.username, { recordId: id });
    }
    const now = this.now();
    this.db.run('UPDATE users SET deleted = 1, deleted_at = ?, updated_at = ? WHERE id = ?', [now, now, id]);
    logger.info(`Soft deleted user ${id} (${user.username})`);
    return this.requireIncludingDeleted(id);
  }

  restore(id: UserId): User {
    const user = this.findByIdIncludingDeleted(id);
    if (!user) {
      throw userNotFound(id);
    }
    if (!user.deleted) {
      throw notDeleted('user', user.username, { recordId: id });
    }
    this.db.run('UPDATE users SET deleted = 0, deleted_at = NULL, updated_at = ? WHERE id = ?', [this.now(), id]);
    logger.info(`Restored user ${id} (${user.username})`);
    return this.requireIncludingDeleted(id);
  }

  private requireIncludingDeleted(id: UserId): User {
    const user = this.findByIdIncludingDeleted(id);
    if (!user) {
      throw userNotFound(id);
    }
    return user;
  }
}

/**
 * Creates a user directory backed by the given storage
 */
export function createUserDirectory(db: StorageBackend, now?: Clock): SqliteUserDirectory {
  return new SqliteUserDirectory(db, now);
}
