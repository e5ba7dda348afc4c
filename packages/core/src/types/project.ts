/**
 * Project Type - the container every task belongs to
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import type { ProjectId, Timestamp } from './common.js';

export const MIN_PROJECT_NAME_LENGTH = 3;
export const MAX_PROJECT_NAME_LENGTH = 100;
export const MAX_PROJECT_DESCRIPTION_LENGTH = 1000;

/**
 * A project known to the project directory.
 * Archived projects have `active === false` and accept no new tasks.
 */
export interface Project {
  readonly id: ProjectId;
  name: string;
  description?: string;
  active: boolean;
  readonly createdAt: Timestamp;
  updatedAt: Timestamp;
}

/**
 * Compact projection of a project embedded in task views
 */
export interface ProjectSummary {
  id: ProjectId;
  name: string;
  active: boolean;
}

export interface CreateProjectInput {
  name: string;
  description?: string;
}

/**
 * Validates a project name and returns it trimmed
 */
export function validateProjectName(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError('Project name is required', ErrorCode.MISSING_REQUIRED_FIELD, {
      field: 'name',
      value,
    });
  }
  const trimmed = value.trim();
  if (trimmed.length < MIN_PROJECT_NAME_LENGTH || trimmed.length > MAX_PROJECT_NAME_LENGTH) {
    throw new ValidationError(
      `Project name must be between ${MIN_PROJECT_NAME_LENGTH} and ${MAX_PROJECT_NAME_LENGTH} characters`,
      ErrorCode.INVALID_INPUT,
      { field: 'name', actual: trimmed.length }
    );
  }
  return trimmed;
}

export function toProjectSummary(project: Project): ProjectSummary {
  return {
    id: project.id,
    name: project.name,
    active: project.active,
  };
}
