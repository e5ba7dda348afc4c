/**
 * Task Reader
 *
 * Loads a task and its assignees in three separate reads. The assignment
 * relation is read unfiltered, then the linked IDs go through the filtered
 * user lookup, so a soft-deleted user drops out of the list without hiding
 * the task or any other assignee.
 */

import { taskNotFound, type Task, type TaskId } from '@worklane/core';
import type { UserDirectory } from '../directory/types.js';
import type { TaskStore } from '../store/task-store.js';

export class TaskReader {
  constructor(
    private readonly tasks: TaskStore,
    private readonly users: UserDirectory
  ) {}

  /**
   * @throws NotFoundError (TASK_NOT_FOUND) when no task has this ID
   */
  loadTaskWithAssignees(taskId: TaskId): Task {
    const task = this.tasks.findById(taskId);
    if (!task) {
      throw taskNotFound(taskId);
    }
    const linkedIds = this.users.findAssignmentIds(taskId);
    const assignees = linkedIds.length > 0 ? this.users.findAllById(linkedIds) : [];
    return { ...task, assignees };
  }
}
