/**
 * Task Store
 *
 * Persists task rows and their assignment links. Reads return scalar fields
 * only; assignees are attached by the task reader.
 */

import type { StorageBackend } from '@worklane/storage';
import {
  asProjectId,
  asTaskId,
  createTimestamp,
  isValidTaskPriority,
  isValidTaskStatus,
  databaseError,
  taskNotFound,
  type Task,
  type TaskDraft,
  type TaskId,
  type TaskPriority,
  type TaskStatus,
  type UserId,
} from '@worklane/core';
import type { Clock } from '../directory/types.js';

// ============================================================================
// Contract
// ============================================================================

export interface TaskChildCounts {
  comments: number;
  attachments: number;
}

export interface TaskStore {
  /**
   * Inserts a draft with links to `task.assignees`, or updates the scalar
   * fields of an existing task. An update never touches assignment links.
   * Maintains the audit fields.
   */
  save(task: TaskDraft | Task): Task;
  /** Replaces the task's assignment links with `userIds` (duplicates collapse) */
  replaceAssignees(id: TaskId, userIds: readonly UserId[]): void;
  /** Scalar fields only; `assignees` is always empty */
  findById(id: TaskId): Task | undefined;
  /** Removes the task with its links, comments and attachments */
  delete(task: Task): void;
  countChildren(id: TaskId): TaskChildCounts;
}

// ============================================================================
// Row Mapping
// ============================================================================

interface TaskRow {
  id: number;
  title: string;
  description: string;
  status: string;
  priority: string;
  due_date: string;
  start_date: string | null;
  completed_at: string | null;
  estimated_hours: number | null;
  notes: string | null;
  project_id: number;
  created_at: string;
  updated_at: string;
  [key: string]: unknown;
}

function parseStatus(row: TaskRow): TaskStatus {
  if (!isValidTaskStatus(row.status)) {
    throw databaseError(`task ${row.id} has unknown status '${row.status}'`);
  }
  return row.status;
}

function parsePriority(row: TaskRow): TaskPriority {
  if (!isValidTaskPriority(row.priority)) {
    throw databaseError(`task ${row.id} has unknown priority '${row.priority}'`);
  }
  return row.priority;
}

function rowToTask(row: TaskRow): Task {
  return {
    id: asTaskId(row.id),
    title: row.title,
    description: row.description,
    status: parseStatus(row),
    priority: parsePriority(row),
    dueDate: row.due_date,
    startDate: row.start_date ?? undefined,
    completedAt: row.completed_at ?? undefined,
    estimatedHours: row.estimated_hours ?? undefined,
    notes: row.notes ?? undefined,
    projectId: asProjectId(row.project_id),
    assignees: [],
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function scalarParams(task: TaskDraft): unknown[] {
  return [
    task.title,
    task.description,
    task.status,
    task.priority,
    task.dueDate,
    task.startDate,
    task.completedAt,
    task.estimatedHours,
    task.notes,
    task.projectId,
  ];
}

// ============================================================================
// SqliteTaskStore
// ============================================================================

export class SqliteTaskStore implements TaskStore {
  constructor(
    private readonly db: StorageBackend,
    private readonly now: Clock = () => createTimestamp()
  ) {}

  save(task: TaskDraft | Task): Task {
    return this.db.transaction(() => ('id' in task ? this.update(task) : this.insert(task)));
  }

  replaceAssignees(id: TaskId, userIds: readonly UserId[]): void {
    this.db.transaction(() => {
      if (!this.db.queryOne('SELECT id FROM tasks WHERE id = ?', [id])) {
        throw taskNotFound(id);
      }
      this.db.run('DELETE FROM task_assignees WHERE task_id = ?', [id]);
      this.writeLinks(id, userIds);
    });
  }

  findById(id: TaskId): Task | undefined {
    const row = this.db.queryOne<TaskRow>('SELECT * FROM tasks WHERE id = ?', [id]);
    return row ? rowToTask(row) : undefined;
  }

  delete(task: Task): void {
    const result = this.db.run('DELETE FROM tasks WHERE id = ?', [task.id]);
    if (result.changes === 0) {
      throw taskNotFound(task.id);
    }
  }

  countChildren(id: TaskId): TaskChildCounts {
    const row = this.db.queryOne<{ comments: number; attachments: number }>(
      `SELECT
         (SELECT COUNT(*) FROM comments WHERE task_id = ?) AS comments,
         (SELECT COUNT(*) FROM attachments WHERE task_id = ?) AS attachments`,
      [id, id]
    );
    return { comments: row?.comments ?? 0, attachments: row?.attachments ?? 0 };
  }

  // --------------------------------------------------------------------------
  // Private helpers
  // --------------------------------------------------------------------------

  private insert(draft: TaskDraft): Task {
    const now = this.now();
    const result = this.db.run(
      `INSERT INTO tasks (title, description, status, priority, due_date, start_date, completed_at,
                          estimated_hours, notes, project_id, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [...scalarParams(draft), now, now]
    );
    const id = asTaskId(Number(result.lastInsertRowid));
    this.writeLinks(id, draft.assignees.map((user) => user.id));
    return { ...draft, id, createdAt: now, updatedAt: now };
  }

  private update(task: Task): Task {
    const now = this.now();
    const result = this.db.run(
      `UPDATE tasks
       SET title = ?, description = ?, status = ?, priority = ?, due_date = ?, start_date = ?,
           completed_at = ?, estimated_hours = ?, notes = ?, project_id = ?, updated_at = ?
       WHERE id = ?`,
      [...scalarParams(task), now, task.id]
    );
    if (result.changes === 0) {
      throw taskNotFound(task.id);
    }
    return { ...task, updatedAt: now };
  }

  private writeLinks(id: TaskId, userIds: readonly UserId[]): void {
    for (const userId of new Set(userIds)) {
      this.db.run('INSERT INTO task_assignees (task_id, user_id) VALUES (?, ?)', [id, userId]);
    }
  }
}

export function createTaskStore(db: StorageBackend, now?: Clock): SqliteTaskStore {
  return new SqliteTaskStore(db, now);
}
