/**
 * Task Activity Store
 *
 * Comments and attachments hang off a task and are removed with it.
 */

import type { StorageBackend } from '@worklane/storage';
import {
  ErrorCode,
  ValidationError,
  asTaskId,
  asUserId,
  createTimestamp,
  databaseError,
  taskNotFound,
  userNotFound,
  type TaskId,
  type Timestamp,
  type UserId,
} from '@worklane/core';
import type { Clock } from '../directory/types.js';

// ============================================================================
// Constants
// ============================================================================

export const MAX_COMMENT_LENGTH = 2000;
export const MAX_FILENAME_LENGTH = 255;
/** 50 MiB */
export const MAX_ATTACHMENT_SIZE = 50 * 1024 * 1024;

// ============================================================================
// Types
// ============================================================================

export interface Comment {
  readonly id: number;
  taskId: TaskId;
  authorId: UserId;
  text: string;
  readonly createdAt: Timestamp;
}

export interface Attachment {
  readonly id: number;
  taskId: TaskId;
  originalFilename: string;
  contentType?: string;
  /** Size in bytes */
  fileSize: number;
  uploadedBy: UserId;
  readonly uploadedAt: Timestamp;
}

export interface AddAttachmentInput {
  originalFilename: string;
  contentType?: string;
  fileSize: number;
  uploadedBy: UserId;
}

interface CommentRow {
  id: number;
  task_id: number;
  author_id: number;
  text: string;
  created_at: string;
  [key: string]: unknown;
}

interface AttachmentRow {
  id: number;
  task_id: number;
  original_filename: string;
  content_type: string | null;
  file_size: number;
  uploaded_by: number;
  uploaded_at: string;
  [key: string]: unknown;
}

function rowToComment(row: CommentRow): Comment {
  return {
    id: row.id,
    taskId: asTaskId(row.task_id),
    authorId: asUserId(row.author_id),
    text: row.text,
    createdAt: row.created_at,
  };
}

function rowToAttachment(row: AttachmentRow): Attachment {
  return {
    id: row.id,
    taskId: asTaskId(row.task_id),
    originalFilename: row.original_filename,
    contentType: row.content_type ?? undefined,
    fileSize: row.file_size,
    uploadedBy: asUserId(row.uploaded_by),
    uploadedAt: row.uploaded_at,
  };
}

// ============================================================================
// Validation
// ============================================================================

export function validateCommentText(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError('Comment text is required', ErrorCode.MISSING_REQUIRED_FIELD, {
      field: 'text',
      value,
    });
  }
  const text = value.trim();
  if (text.length > MAX_COMMENT_LENGTH) {
    throw new ValidationError(
      `text exceeds maximum length of ${MAX_COMMENT_LENGTH} characters`,
      ErrorCode.INVALID_INPUT,
      { field: 'text', expected: `<= ${MAX_COMMENT_LENGTH} characters`, actual: text.length }
    );
  }
  return text;
}

export function validateAttachment(input: AddAttachmentInput): AddAttachmentInput {
  const filename = typeof input.originalFilename === 'string' ? input.originalFilename.trim() : '';
  if (filename.length === 0 || filename.length > MAX_FILENAME_LENGTH) {
    throw new ValidationError(
      `originalFilename must be between 1 and ${MAX_FILENAME_LENGTH} characters`,
      ErrorCode.INVALID_INPUT,
      { field: 'originalFilename', value: input.originalFilename }
    );
  }
  if (!Number.isInteger(input.fileSize) || input.fileSize < 1 || input.fileSize > MAX_ATTACHMENT_SIZE) {
    throw new ValidationError(
      `fileSize must be between 1 and ${MAX_ATTACHMENT_SIZE} bytes`,
      ErrorCode.INVALID_INPUT,
      { field: 'fileSize', value: input.fileSize }
    );
  }
  const result: AddAttachmentInput = {
    originalFilename: filename,
    fileSize: input.fileSize,
    uploadedBy: input.uploadedBy,
  };
  if (input.contentType !== undefined) result.contentType = input.contentType;
  return result;
}

// ============================================================================
// TaskActivityStore
// ============================================================================

export class TaskActivityStore {
  constructor(
    private readonly db: StorageBackend,
    private readonly now: Clock = () => createTimestamp()
  ) {}

  addComment(taskId: TaskId, authorId: UserId, text: string): Comment {
    const validated = validateCommentText(text);
    this.requireTask(taskId);
    this.requireUser(authorId);
    const result = this.db.run(
      'INSERT INTO comments (task_id, author_id, text, created_at) VALUES (?, ?, ?, ?)',
      [taskId, authorId, validated, this.now()]
    );
    return this.requireComment(Number(result.lastInsertRowid));
  }

  addAttachment(taskId: TaskId, input: AddAttachmentInput): Attachment {
    const validated = validateAttachment(input);
    this.requireTask(taskId);
    this.requireUser(validated.uploadedBy);
    const result = this.db.run(
      `INSERT INTO attachments (task_id, original_filename, content_type, file_size, uploaded_by, uploaded_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [taskId, validated.originalFilename, validated.contentType, validated.fileSize, validated.uploadedBy, this.now()]
    );
    return this.requireAttachment(Number(result.lastInsertRowid));
  }

  listComments(taskId: TaskId): Comment[] {
    return this.db
      .query<CommentRow>('SELECT * FROM comments WHERE task_id = ? ORDER BY id', [taskId])
      .map(rowToComment);
  }

  listAttachments(taskId: TaskId): Attachment[] {
    return this.db
      .query<AttachmentRow>('SELECT * FROM attachments WHERE task_id = ? ORDER BY id', [taskId])
      .map(rowToAttachment);
  }

  // --------------------------------------------------------------------------
  // Private helpers
  // --------------------------------------------------------------------------

  private requireTask(taskId: TaskId): void {
    if (!this.db.queryOne('SELECT id FROM tasks WHERE id = ?', [taskId])) {
      throw taskNotFound(taskId);
    }
  }

  private requireUser(userId: UserId): void {
    if (!this.db.queryOne('SELECT id FROM users WHERE id = ? AND deleted = 0', [userId])) {
      throw userNotFound(userId);
    }
  }

  private requireComment(id: number): Comment {
    const row = this.db.queryOne<CommentRow>('SELECT * FROM comments WHERE id = ?', [id]);
    if (!row) {
      throw databaseError(`comment ${id} missing after insert`);
    }
    return rowToComment(row);
  }

  private requireAttachment(id: number): Attachment {
    const row = this.db.queryOne<AttachmentRow>('SELECT * FROM attachments WHERE id = ?', [id]);
    if (!row) {
      throw databaseError(`attachment ${id} missing after insert`);
    }
    return rowToAttachment(row);
  }
}

export function createActivityStore(db: StorageBackend, now?: Clock): TaskActivityStore {
  return new TaskActivityStore(db, now);
}
