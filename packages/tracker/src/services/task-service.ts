/**
 * Task Service
 *
 * Orchestrates the task lifecycle: validation, assignee resolution, the
 * project gate, state transitions and persistence. Each public operation
 * runs inside one storage transaction, so a failure at any step leaves no
 * partial writes behind.
 *
 * Concurrent updates to the same task are not locked against each other;
 * the last committed write wins.
 */

import type { StorageBackend } from '@worklane/storage';
import {
  assignStatus,
  assignUsers,
  blockTask,
  cancelTask,
  completeTask,
  createTaskDraft,
  createTimestamp,
  isWorklaneError,
  notFound,
  startTask,
  taskNotFound,
  updateTaskFields,
  validateCreateTaskInput,
  validateUpdateTaskInput,
  type CreateTaskInput,
  type Task,
  type TaskId,
  type UpdateTaskInput,
} from '@worklane/core';
import { openStorageFromConfig } from '../config/config.js';
import type { Configuration } from '../config/types.js';
import { createProjectDirectory } from '../directory/project-directory.js';
import type { Clock, ProjectDirectory, UserDirectory } from '../directory/types.js';
import { createUserDirectory } from '../directory/user-directory.js';
import { createTaskStore, type TaskStore } from '../store/task-store.js';
import { createLogger, type Logger, type LogLevel } from '../utils/logger.js';
import { AssignmentResolver } from './assignment-resolver.js';
import { ProjectGate } from './project-gate.js';
import { TaskReader } from './task-reader.js';
import { toTaskView, type TaskView } from './task-view.js';

/** Actor used in log lines when none is configured */
export const DEFAULT_ACTOR = 'system';

type UpdatableField = keyof UpdateTaskInput;

const UPDATABLE_FIELDS: readonly UpdatableField[] = [
  'title',
  'description',
  'priority',
  'dueDate',
  'estimatedHours',
  'notes',
  'status',
  'projectId',
  'assigneeIds',
];

function describeField(task: Task, field: UpdatableField): string {
  if (field === 'assigneeIds') {
    return `[${task.assignees.map((user) => user.id).join(', ')}]`;
  }
  const value = task[field];
  return value === undefined ? 'unset' : JSON.stringify(value);
}

// ============================================================================
// Interface
// ============================================================================

export interface TaskService {
  /**
   * Creates a task in PENDING status
   *
   * @throws ValidationError before any lookup when a field is invalid
   * @throws NotFoundError when an assignee or the active project is missing
   * @throws BusinessRuleViolation when an assignee is inactive
   */
  createTask(input: CreateTaskInput): Promise<TaskView>;

  /**
   * Reads a task; soft-deleted assignees are left out
   */
  getTaskById(id: TaskId): Promise<TaskView>;

  /**
   * Overwrites the fields present in `fields`.
   * `assigneeIds` replaces the whole set, and `status` skips the workflow
   * transition checks.
   */
  updateTask(id: TaskId, fields: UpdateTaskInput): Promise<TaskView>;

  /**
   * Removes the task with its assignment links, comments and attachments
   */
  deleteTask(id: TaskId): Promise<void>;

  startTask(id: TaskId): Promise<TaskView>;
  completeTask(id: TaskId): Promise<TaskView>;
  blockTask(id: TaskId, reason: string): Promise<TaskView>;
  cancelTask(id: TaskId): Promise<TaskView>;
}

// ============================================================================
// Dependencies
// ============================================================================

export interface TaskServiceDeps {
  storage: StorageBackend;
  tasks: TaskStore;
  users: UserDirectory;
  projects: ProjectDirectory;
  /** Caller identity used to attribute log lines */
  actor?: string;
  now?: Clock;
  logger?: Logger;
}

// ============================================================================
// Implementation
// ============================================================================

export class TaskServiceImpl implements TaskService {
  private readonly storage: StorageBackend;
  private readonly tasks: TaskStore;
  private readonly projects: ProjectDirectory;
  private readonly resolver: AssignmentResolver;
  private readonly gate: ProjectGate;
  private readonly reader: TaskReader;
  private readonly actor: string;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(deps: TaskServiceDeps) {
    this.storage = deps.storage;
    this.tasks = deps.tasks;
    this.projects = deps.projects;
    this.resolver = new AssignmentResolver(deps.users);
    this.gate = new ProjectGate(deps.projects);
    this.reader = new TaskReader(deps.tasks, deps.users);
    this.actor = deps.actor ?? DEFAULT_ACTOR;
    this.now = deps.now ?? (() => createTimestamp());
    this.logger = deps.logger ?? createLogger('task-service');
  }

  // --------------------------------------------------------------------------
  // CRUD
  // --------------------------------------------------------------------------

  async createTask(input: CreateTaskInput): Promise<TaskView> {
    return this.unitOfWork('createTask', () => {
      const now = this.now();
      const validated = validateCreateTaskInput(input, now);
      const assignees = this.resolver.resolveAssignees(validated.assigneeIds);
      this.gate.requireActiveProject(validated.projectId);

      const saved = this.tasks.save(createTaskDraft(validated, assignees));
      this.logger.info(
        `${this.actor} created task ${saved.id} '${saved.title}' in project ${saved.projectId} ` +
          `with ${assignees.length} assignee(s)`
      );
      return this.toView(this.reader.loadTaskWithAssignees(saved.id), now);
    });
  }

  async getTaskById(id: TaskId): Promise<TaskView> {
    return this.unitOfWork('getTaskById', () => this.toView(this.reader.loadTaskWithAssignees(id), this.now()));
  }

  async updateTask(id: TaskId, fields: UpdateTaskInput): Promise<TaskView> {
    return this.unitOfWork('updateTask', () => {
      const now = this.now();
      const existing = this.reader.loadTaskWithAssignees(id);
      const validated = validateUpdateTaskInput(fields);

      let task = updateTaskFields(existing, validated);

      if (validated.assigneeIds !== undefined) {
        if (validated.assigneeIds.length === 0) {
          this.logger.warn(`${this.actor} is removing every assignee from task ${id}`);
        }
        task = assignUsers(task, this.resolver.resolveAssignees(validated.assigneeIds));
      }

      if (validated.projectId !== undefined && validated.projectId !== existing.projectId) {
        this.gate.requireActiveProject(validated.projectId);
        task = { ...task, projectId: validated.projectId };
      }

      if (validated.status !== undefined) {
        task = assignStatus(task, validated.status, now);
      }

      for (const field of UPDATABLE_FIELDS) {
        if (validated[field] !== undefined) {
          this.logger.debug(
            `task ${id}: ${field} ${describeField(existing, field)} -> ${describeField(task, field)} by ${this.actor}`
          );
        }
      }

      // links to soft-deleted users survive unless the caller replaces the set
      const saved = this.tasks.save(task);
      if (validated.assigneeIds !== undefined) {
        this.tasks.replaceAssignees(id, saved.assignees.map((user) => user.id));
      }
      this.logger.info(`${this.actor} updated task ${id}`);
      return this.toView(saved, now);
    });
  }

  async deleteTask(id: TaskId): Promise<void> {
    return this.unitOfWork('deleteTask', () => {
      const task = this.tasks.findById(id);
      if (!task) {
        throw taskNotFound(id);
      }
      this.tasks.delete(task);
      this.logger.info(`${this.actor} deleted task ${id}`);
    });
  }

  // --------------------------------------------------------------------------
  // Workflow
  // --------------------------------------------------------------------------

  async startTask(id: TaskId): Promise<TaskView> {
    return this.transition('startTask', id, (task, now) => startTask(task, now));
  }

  async completeTask(id: TaskId): Promise<TaskView> {
    return this.transition('completeTask', id, (task, now) => completeTask(task, now));
  }

  async blockTask(id: TaskId, reason: string): Promise<TaskView> {
    return this.transition('blockTask', id, (task, now) => blockTask(task, reason, now));
  }

  async cancelTask(id: TaskId): Promise<TaskView> {
    return this.transition('cancelTask', id, (task) => cancelTask(task));
  }

  // --------------------------------------------------------------------------
  // Private helpers
  // --------------------------------------------------------------------------

  private transition(
    operation: string,
    id: TaskId,
    apply: (task: Task, now: string) => Task
  ): Promise<TaskView> {
    return this.unitOfWork(operation, () => {
      const now = this.now();
      const current = this.reader.loadTaskWithAssignees(id);
      const saved = this.tasks.save(apply(current, now));
      this.logger.info(`${this.actor} moved task ${id} from ${current.status} to ${saved.status}`);
      return this.toView(saved, now);
    });
  }

  /**
   * Runs `work` in one transaction. Failures are logged against the actor and
   * rethrown unchanged.
   */
  private async unitOfWork<T>(operation: string, work: () => T): Promise<T> {
    try {
      return this.storage.transaction(() => work());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isWorklaneError(error)) {
        this.logger.error(`${operation} by ${this.actor} failed [${error.code}]: ${message}`);
      } else {
        this.logger.error(`${operation} by ${this.actor} failed: ${message}`, error);
      }
      throw error;
    }
  }

  private toView(task: Task, now: string): TaskView {
    const project = this.projects.findById(task.projectId);
    if (!project) {
      throw notFound('project', task.projectId);
    }
    return toTaskView(task, project, this.tasks.countChildren(task.id), now);
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateTaskServiceOptions {
  storage: StorageBackend;
  /** Supplies the actor and log level not given here */
  config?: Pick<Configuration, 'actor' | 'logLevel'>;
  actor?: string;
  logLevel?: LogLevel;
  now?: Clock;
}

/**
 * Wires the SQLite collaborators around one storage backend
 */
export function createTaskService(options: CreateTaskServiceOptions): TaskService {
  const { storage, now } = options;
  return new TaskServiceImpl({
    storage,
    tasks: createTaskStore(storage, now),
    users: createUserDirectory(storage, now),
    projects: createProjectDirectory(storage, now),
    actor: options.actor ?? options.config?.actor,
    now,
    logger: createLogger('task-service', options.logLevel ?? options.config?.logLevel),
  });
}

export interface OpenedTaskService {
  storage: StorageBackend;
  service: TaskService;
}

/**
 * Opens the configured database and builds a service that logs as the
 * configured actor. The caller owns the returned storage and closes it.
 */
export function openTaskService(config: Configuration, now?: Clock): OpenedTaskService {
  const storage = openStorageFromConfig(config);
  return { storage, service: createTaskService({ storage, config, now }) };
}
