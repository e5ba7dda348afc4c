import {
  hoursUntilDue,
  isOverdue,
  toProjectSummary,
  toUserSummary,
  type Project,
  type ProjectSummary,
  type Task,
  type Timestamp,
  type UserSummary,
} from '@worklane/core';
import type { TaskChildCounts } from '../store/task-store.js';

/**
 * Read model returned by every task operation
 */
export interface TaskView extends Omit<Task, 'assignees'> {
  assignees: UserSummary[];
  project: ProjectSummary;
  commentCount: number;
  attachmentCount: number;
  overdue: boolean;
  /** Signed whole hours, negative once overdue */
  hoursUntilDue: number;
}

export function toTaskView(
  task: Task,
  project: Project,
  counts: TaskChildCounts,
  now: Timestamp
): TaskView {
  const { assignees, ...fields } = task;
  return {
    ...fields,
    assignees: assignees.map(toUserSummary),
    project: toProjectSummary(project),
    commentCount: counts.comments,
    attachmentCount: counts.attachments,
    overdue: isOverdue(task, now),
    hoursUntilDue: hoursUntilDue(task, now),
  };
}
