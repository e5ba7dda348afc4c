/**
 * Task Type - Work tracking primitive
 *
 * Tasks represent units of work placed in a project and assigned to zero or
 * more users. Status moves through a small state machine; the guarded
 * workflow functions below are the only way to advance it outside the
 * administrative partial-update path.
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import { dueDateInPast, invalidTransition } from '../errors/factories.js';
import {
  type ProjectId,
  type TaskId,
  type Timestamp,
  type UserId,
  createTimestamp,
  validateId,
  validateTimestamp,
  asProjectId,
  asUserId,
} from './common.js';
import type { User } from './user.js';

// ============================================================================
// Task Status
// ============================================================================

/**
 * All valid task status values
 */
export const TaskStatus = {
  /** Created, not started */
  PENDING: 'PENDING',
  /** Currently being worked on */
  IN_PROGRESS: 'IN_PROGRESS',
  /** Waiting on something outside the task */
  BLOCKED: 'BLOCKED',
  /** Work done, awaiting review */
  IN_REVIEW: 'IN_REVIEW',
  /** Finished and delivered */
  COMPLETED: 'COMPLETED',
  /** No longer needed */
  CANCELLED: 'CANCELLED',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Statuses with no workflow transition out of them */
export const TERMINAL_STATUSES: readonly TaskStatus[] = [TaskStatus.COMPLETED, TaskStatus.CANCELLED];

/** Statuses in which work can proceed */
export const ACTIONABLE_STATUSES: readonly TaskStatus[] = [TaskStatus.PENDING, TaskStatus.IN_PROGRESS];

/**
 * Statuses each workflow action may be taken from
 */
export const WORKFLOW_ALLOWED_FROM = {
  start: [TaskStatus.PENDING, TaskStatus.BLOCKED],
  complete: [TaskStatus.IN_PROGRESS],
  block: [TaskStatus.PENDING, TaskStatus.IN_PROGRESS, TaskStatus.BLOCKED, TaskStatus.IN_REVIEW],
  cancel: [
    TaskStatus.PENDING,
    TaskStatus.IN_PROGRESS,
    TaskStatus.BLOCKED,
    TaskStatus.IN_REVIEW,
    TaskStatus.CANCELLED,
  ],
} as const satisfies Record<string, readonly TaskStatus[]>;

export type WorkflowAction = keyof typeof WORKFLOW_ALLOWED_FROM;

// ============================================================================
// Priority
// ============================================================================

/**
 * Priority values, lowest to highest
 */
export const TaskPriority = {
  LOW: 'LOW',
  MEDIUM: 'MEDIUM',
  HIGH: 'HIGH',
  CRITICAL: 'CRITICAL',
} as const;

export type TaskPriority = (typeof TaskPriority)[keyof typeof TaskPriority];

/** Numeric level of each priority (higher is more urgent) */
export const PRIORITY_LEVELS: Record<TaskPriority, number> = {
  [TaskPriority.LOW]: 1,
  [TaskPriority.MEDIUM]: 2,
  [TaskPriority.HIGH]: 3,
  [TaskPriority.CRITICAL]: 4,
};

/** Default priority for new tasks */
export const DEFAULT_PRIORITY: TaskPriority = TaskPriority.MEDIUM;

// ============================================================================
// Validation Constants
// ============================================================================

export const MIN_TITLE_LENGTH = 3;
export const MAX_TITLE_LENGTH = 255;
export const MIN_DESCRIPTION_LENGTH = 10;
export const MAX_DESCRIPTION_LENGTH = 2000;
export const MAX_ESTIMATED_HOURS = 999;
export const MAX_NOTES_LENGTH = 1000;

const MS_PER_HOUR = 60 * 60 * 1000;

// ============================================================================
// Task Interface
// ============================================================================

/**
 * Task - a unit of work in a project
 *
 * Invariant: `completedAt` is set exactly when `status` is COMPLETED.
 */
export interface Task {
  /** Storage-assigned identifier */
  readonly id: TaskId;
  /** Task title, 3-255 characters */
  title: string;
  /** Task description, 10-2000 characters */
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  /** Deadline; checked against "now" only at creation */
  dueDate: Timestamp;
  /** When work last started */
  startDate?: Timestamp;
  /** When the task was completed */
  completedAt?: Timestamp;
  /** Whole-hour estimate, 0-999 */
  estimatedHours?: number;
  /** Free-text notes, blocking reasons are appended here */
  notes?: string;
  /** Project the task is placed in */
  projectId: ProjectId;
  /** Assigned users, unique by id */
  assignees: User[];
  readonly createdAt: Timestamp;
  updatedAt: Timestamp;
}

/**
 * A task that has not been persisted yet
 */
export type TaskDraft = Omit<Task, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Input for creating a new task
 */
export interface CreateTaskInput {
  /** Task title, 3-255 characters */
  title: string;
  /** Task description, 10-2000 characters */
  description: string;
  /** Deadline, must not be in the past */
  dueDate: Timestamp;
  /** Project to place the task in */
  projectId: ProjectId;
  /** Optional: Priority (default: MEDIUM) */
  priority?: TaskPriority;
  /** Optional: Whole-hour estimate */
  estimatedHours?: number;
  /** Optional: Notes */
  notes?: string;
  /** Optional: Users to assign */
  assigneeIds?: UserId[];
}

/**
 * Creation input after field validation, ready for lookups
 */
export interface ValidatedCreateTaskInput {
  title: string;
  description: string;
  dueDate: Timestamp;
  projectId: ProjectId;
  priority: TaskPriority;
  estimatedHours?: number;
  notes?: string;
  assigneeIds: UserId[];
}

/**
 * Partial update; absent fields are left unchanged
 */
export interface UpdateTaskInput {
  title?: string;
  description?: string;
  priority?: TaskPriority;
  dueDate?: Timestamp;
  estimatedHours?: number;
  notes?: string;
  status?: TaskStatus;
  projectId?: ProjectId;
  /** Replaces the whole assignee set; `[]` unassigns everyone */
  assigneeIds?: UserId[];
}

/**
 * Scalar fields a partial update may overwrite directly
 */
export type TaskFieldUpdate = Pick<
  UpdateTaskInput,
  'title' | 'description' | 'priority' | 'dueDate' | 'estimatedHours' | 'notes'
>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validates a task status value
 */
export function isValidTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && Object.values<string>(TaskStatus).includes(value);
}

/**
 * Validates task status and throws if invalid
 */
export function validateTaskStatus(value: unknown): TaskStatus {
  if (!isValidTaskStatus(value)) {
    throw new ValidationError(
      `Invalid status: ${String(value)}. Must be one of: ${Object.values(TaskStatus).join(', ')}`,
      ErrorCode.INVALID_STATUS,
      { field: 'status', value, expected: Object.values(TaskStatus) }
    );
  }
  return value;
}

/**
 * Validates a priority value
 */
export function isValidTaskPriority(value: unknown): value is TaskPriority {
  return typeof value === 'string' && Object.values<string>(TaskPriority).includes(value);
}

/**
 * Validates priority and throws if invalid
 */
export function validateTaskPriority(value: unknown): TaskPriority {
  if (!isValidTaskPriority(value)) {
    throw new ValidationError(
      `Invalid priority: ${String(value)}. Must be one of: ${Object.values(TaskPriority).join(', ')}`,
      ErrorCode.INVALID_PRIORITY,
      { field: 'priority', value, expected: Object.values(TaskPriority) }
    );
  }
  return value;
}

/**
 * Validates a task title
 */
export function isValidTitle(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  const trimmed = value.trim();
  return trimmed.length >= MIN_TITLE_LENGTH && trimmed.length <= MAX_TITLE_LENGTH;
}

/**
 * Validates task title and returns it trimmed
 */
export function validateTitle(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError(
      'Task title must be a string',
      ErrorCode.INVALID_INPUT,
      { field: 'title', value, expected: 'string' }
    );
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(
      'Task title cannot be empty',
      ErrorCode.MISSING_REQUIRED_FIELD,
      { field: 'title', value }
    );
  }

  if (trimmed.length < MIN_TITLE_LENGTH) {
    throw new ValidationError(
      `Task title must be at least ${MIN_TITLE_LENGTH} characters`,
      ErrorCode.TITLE_TOO_SHORT,
      { field: 'title', expected: `>= ${MIN_TITLE_LENGTH} characters`, actual: trimmed.length }
    );
  }

  if (trimmed.length > MAX_TITLE_LENGTH) {
    throw new ValidationError(
      `Task title exceeds maximum length of ${MAX_TITLE_LENGTH} characters`,
      ErrorCode.TITLE_TOO_LONG,
      { field: 'title', expected: `<= ${MAX_TITLE_LENGTH} characters`, actual: trimmed.length }
    );
  }

  return trimmed;
}

/**
 * Validates task description and returns it trimmed
 */
export function validateDescription(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(
      'Task description is required',
      ErrorCode.MISSING_REQUIRED_FIELD,
      { field: 'description', value }
    );
  }

  const trimmed = value.trim();
  if (trimmed.length < MIN_DESCRIPTION_LENGTH || trimmed.length > MAX_DESCRIPTION_LENGTH) {
    throw new ValidationError(
      `Task description must be between ${MIN_DESCRIPTION_LENGTH} and ${MAX_DESCRIPTION_LENGTH} characters`,
      ErrorCode.INVALID_INPUT,
      {
        field: 'description',
        expected: `${MIN_DESCRIPTION_LENGTH}-${MAX_DESCRIPTION_LENGTH} characters`,
        actual: trimmed.length,
      }
    );
  }

  return trimmed;
}

/**
 * Validates an optional hour estimate
 */
export function validateEstimatedHours(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < 0 ||
    value > MAX_ESTIMATED_HOURS
  ) {
    throw new ValidationError(
      `Estimated hours must be an integer from 0 to ${MAX_ESTIMATED_HOURS}`,
      ErrorCode.INVALID_INPUT,
      { field: 'estimatedHours', value, expected: `0-${MAX_ESTIMATED_HOURS}` }
    );
  }
  return value;
}

/**
 * Validates optional text fields with max length
 */
export function validateOptionalText(
  value: unknown,
  field: string,
  maxLength: number
): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new ValidationError(
      `${field} must be a string`,
      ErrorCode.INVALID_INPUT,
      { field, value, expected: 'string' }
    );
  }

  if (value.length > maxLength) {
    throw new ValidationError(
      `${field} exceeds maximum length of ${maxLength} characters`,
      ErrorCode.INVALID_INPUT,
      { field, expected: `<= ${maxLength} characters`, actual: value.length }
    );
  }

  return value;
}

/**
 * Validates a due date. When `now` is given the date must not lie before it.
 */
export function validateDueDate(value: unknown, now?: Timestamp): Timestamp {
  const dueDate = validateTimestamp(value, 'dueDate');
  if (now !== undefined && Date.parse(dueDate) < Date.parse(now)) {
    throw dueDateInPast(dueDate, now);
  }
  return dueDate;
}

/**
 * Validates a blocking reason and returns it trimmed
 */
export function validateBlockReason(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(
      'Block reason is required',
      ErrorCode.MISSING_REQUIRED_FIELD,
      { field: 'reason', value }
    );
  }
  return value.trim();
}

/**
 * Validates a list of user IDs, keeping its order
 */
export function validateAssigneeIds(value: unknown): UserId[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ValidationError(
      'assigneeIds must be an array',
      ErrorCode.INVALID_INPUT,
      { field: 'assigneeIds', value, expected: 'array of positive integers' }
    );
  }
  return value.map((id: unknown) => asUserId(validateId(id, 'assigneeIds')));
}

/**
 * Validates every field of a creation request before any lookup happens
 *
 * @param input - Raw creation input
 * @param now - Reference instant for the due-date check
 */
export function validateCreateTaskInput(
  input: CreateTaskInput,
  now: Timestamp = createTimestamp()
): ValidatedCreateTaskInput {
  const result: ValidatedCreateTaskInput = {
    title: validateTitle(input.title),
    description: validateDescription(input.description),
    dueDate: validateDueDate(input.dueDate, now),
    projectId: asProjectId(validateId(input.projectId, 'projectId')),
    priority: input.priority === undefined ? DEFAULT_PRIORITY : validateTaskPriority(input.priority),
    assigneeIds: validateAssigneeIds(input.assigneeIds),
  };

  const estimatedHours = validateEstimatedHours(input.estimatedHours);
  if (estimatedHours !== undefined) {
    result.estimatedHours = estimatedHours;
  }
  const notes = validateOptionalText(input.notes, 'notes', MAX_NOTES_LENGTH);
  if (notes !== undefined) {
    result.notes = notes;
  }

  return result;
}

/**
 * Validates the fields present in a partial update.
 * The due date is not compared with "now" here.
 */
export function validateUpdateTaskInput(fields: UpdateTaskInput): UpdateTaskInput {
  const result: UpdateTaskInput = {};
  if (fields.title !== undefined) result.title = validateTitle(fields.title);
  if (fields.description !== undefined) result.description = validateDescription(fields.description);
  if (fields.priority !== undefined) result.priority = validateTaskPriority(fields.priority);
  if (fields.dueDate !== undefined) result.dueDate = validateDueDate(fields.dueDate);
  if (fields.estimatedHours !== undefined) {
    result.estimatedHours = validateEstimatedHours(fields.estimatedHours);
  }
  if (fields.notes !== undefined) {
    result.notes = validateOptionalText(fields.notes, 'notes', MAX_NOTES_LENGTH);
  }
  if (fields.status !== undefined) result.status = validateTaskStatus(fields.status);
  if (fields.projectId !== undefined) {
    result.projectId = asProjectId(validateId(fields.projectId, 'projectId'));
  }
  if (fields.assigneeIds !== undefined) result.assigneeIds = validateAssigneeIds(fields.assigneeIds);
  return result;
}

// ============================================================================
// Factory & Updates
// ============================================================================

/**
 * Builds an unsaved task from validated input.
 * The status is always PENDING regardless of what the caller sent.
 *
 * @param input - Validated creation input
 * @param assignees - Users already verified as assignable
 */
export function createTaskDraft(input: ValidatedCreateTaskInput, assignees: readonly User[]): TaskDraft {
  const draft: TaskDraft = {
    title: input.title,
    description: input.description,
    status: TaskStatus.PENDING,
    priority: input.priority,
    dueDate: input.dueDate,
    projectId: input.projectId,
    assignees: uniqueById(assignees),
  };
  if (input.estimatedHours !== undefined) draft.estimatedHours = input.estimatedHours;
  if (input.notes !== undefined) draft.notes = input.notes;
  return draft;
}

/**
 * Overwrites the scalar fields present in `fields`
 */
export function updateTaskFields(task: Task, fields: TaskFieldUpdate): Task {
  const updated: Task = { ...task };
  if (fields.title !== undefined) updated.title = fields.title;
  if (fields.description !== undefined) updated.description = fields.description;
  if (fields.priority !== undefined) updated.priority = fields.priority;
  if (fields.dueDate !== undefined) updated.dueDate = fields.dueDate;
  if (fields.estimatedHours !== undefined) updated.estimatedHours = fields.estimatedHours;
  if (fields.notes !== undefined) updated.notes = fields.notes;
  return updated;
}

/**
 * Replaces the assignee set. Duplicates by user id are dropped.
 */
export function assignUsers(task: Task, users: readonly User[]): Task {
  return { ...task, assignees: uniqueById(users) };
}

// ============================================================================
// Workflow Transitions
// ============================================================================

function requireAllowed(task: Task, action: WorkflowAction): void {
  const allowedFrom: readonly TaskStatus[] = WORKFLOW_ALLOWED_FROM[action];
  if (!allowedFrom.includes(task.status)) {
    throw invalidTransition(action, task.status, allowedFrom);
  }
}

/**
 * Starts work on a task (PENDING or BLOCKED -> IN_PROGRESS)
 */
export function startTask(task: Task, now: Timestamp = createTimestamp()): Task {
  requireAllowed(task, 'start');
  return { ...task, status: TaskStatus.IN_PROGRESS, startDate: now };
}

/**
 * Completes a task (IN_PROGRESS -> COMPLETED)
 */
export function completeTask(task: Task, now: Timestamp = createTimestamp()): Task {
  requireAllowed(task, 'complete');
  return { ...task, status: TaskStatus.COMPLETED, completedAt: now };
}

/**
 * Blocks a task and appends a timestamped reason line to its notes
 *
 * @throws ValidationError when the reason is blank or the notes would overflow
 * @throws BusinessRuleViolation when the task is already terminal
 */
export function blockTask(
  task: Task,
  reason: string,
  now: Timestamp = createTimestamp()
): Task {
  const trimmed = validateBlockReason(reason);
  requireAllowed(task, 'block');

  const line = `[${now}] BLOCKED: ${trimmed}`;
  const notes = task.notes ? `${task.notes}\n${line}` : line;
  if (notes.length > MAX_NOTES_LENGTH) {
    throw new ValidationError(
      `notes exceeds maximum length of ${MAX_NOTES_LENGTH} characters`,
      ErrorCode.INVALID_INPUT,
      { field: 'notes', expected: `<= ${MAX_NOTES_LENGTH} characters`, actual: notes.length }
    );
  }

  return { ...task, status: TaskStatus.BLOCKED, notes };
}

/**
 * Cancels a task. Cancelling a cancelled task is a no-op.
 */
export function cancelTask(task: Task): Task {
  requireAllowed(task, 'cancel');
  return { ...task, status: TaskStatus.CANCELLED };
}

/**
 * Sets the status without a transition check.
 * Keeps `completedAt` in step with the COMPLETED status.
 */
export function assignStatus(
  task: Task,
  status: TaskStatus,
  now: Timestamp = createTimestamp()
): Task {
  const updated: Task = { ...task, status };
  if (status === TaskStatus.COMPLETED) {
    if (task.status !== TaskStatus.COMPLETED || task.completedAt === undefined) {
      updated.completedAt = now;
    }
  } else {
    updated.completedAt = undefined;
  }
  return updated;
}

// ============================================================================
// Derived Queries
// ============================================================================

/**
 * Checks if a status is terminal (COMPLETED or CANCELLED)
 */
export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Checks if work can proceed in a status (PENDING or IN_PROGRESS)
 */
export function isActionableStatus(status: TaskStatus): boolean {
  return ACTIONABLE_STATUSES.includes(status);
}

/**
 * Checks if a task is past its due date and still open
 */
export function isOverdue(task: Pick<TaskDraft, 'status' | 'dueDate'>, now: Timestamp = createTimestamp()): boolean {
  return !isTerminalStatus(task.status) && Date.parse(now) > Date.parse(task.dueDate);
}

/**
 * Whole hours until the due date, negative once overdue
 */
export function hoursUntilDue(task: Pick<TaskDraft, 'dueDate'>, now: Timestamp = createTimestamp()): number {
  const hours = Math.trunc((Date.parse(task.dueDate) - Date.parse(now)) / MS_PER_HOUR);
  // Math.trunc yields -0 for small negative spans
  return hours === 0 ? 0 : hours;
}

/**
 * Checks if priority `a` outranks priority `b`
 */
export function isHigherPriority(a: TaskPriority, b: TaskPriority): boolean {
  return PRIORITY_LEVELS[a] > PRIORITY_LEVELS[b];
}

// ============================================================================
// Display
// ============================================================================

/**
 * Gets display name for a status
 */
export function getStatusDisplayName(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.PENDING:
      return 'Pending';
    case TaskStatus.IN_PROGRESS:
      return 'In Progress';
    case TaskStatus.BLOCKED:
      return 'Blocked';
    case TaskStatus.IN_REVIEW:
      return 'In Review';
    case TaskStatus.COMPLETED:
      return 'Completed';
    case TaskStatus.CANCELLED:
      return 'Cancelled';
  }
}

/**
 * Gets display name for a priority
 */
export function getPriorityDisplayName(priority: TaskPriority): string {
  switch (priority) {
    case TaskPriority.LOW:
      return 'Low';
    case TaskPriority.MEDIUM:
      return 'Medium';
    case TaskPriority.HIGH:
      return 'High';
    case TaskPriority.CRITICAL:
      return 'Critical';
  }
}

// ============================================================================
// Helpers
// ============================================================================

function uniqueById(users: readonly User[]): User[] {
  const seen = new Set<number>();
  const result: User[] = [];
  for (const user of users) {
    if (!seen.has(user.id)) {
      seen.add(user.id);
      result.push(user);
    }
  }
  return result;
}
