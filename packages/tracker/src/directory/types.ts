/**
 * Directory Contracts
 *
 * Users and projects are owned by their directories. The task engine depends
 * only on the lookup contracts; the administration contracts add the
 * operations that maintain directory state.
 */

import type {
  CreateProjectInput,
  CreateUserInput,
  Project,
  ProjectId,
  TaskId,
  User,
  UserId,
} from '@worklane/core';

// ============================================================================
// Lookup Contracts
// ============================================================================

/**
 * User lookups used by assignment and task reads
 */
export interface UserDirectory {
  /**
   * Batch lookup. Deleted users are excluded; inactive users are returned.
   * Unknown IDs are simply absent from the result.
   */
  findAllById(ids: readonly UserId[]): User[];

  /**
   * Every user linked to the task, read straight from the assignment
   * relation without any filtering.
   */
  findAssignmentIds(taskId: TaskId): UserId[];
}

/**
 * Project lookups used by the project gate
 */
export interface ProjectDirectory {
  /** The project when it exists and is active */
  findActiveById(id: ProjectId): Project | undefined;

  /** The project regardless of its active flag */
  findById(id: ProjectId): Project | undefined;
}

// ============================================================================
// Administration Contracts
// ============================================================================

export interface UserAdministration extends UserDirectory {
  /** @throws ConflictError when the username or email is taken */
  create(input: CreateUserInput): User;
  /** Excludes deleted users */
  findById(id: UserId): User | undefined;
  findByIdIncludingDeleted(id: UserId): User | undefined;
  setActive(id: UserId, active: boolean): User;
  /** Assignment links are kept; reads hide the user */
  softDelete(id: UserId): User;
  restore(id: UserId): User;
}

export interface ProjectAdministration extends ProjectDirectory {
  create(input: CreateProjectInput): Project;
  /** @throws NotFoundError when the project is missing or already archived */
  archive(id: ProjectId): Project;
  reactivate(id: ProjectId): Project;
}

/**
 * Source of timestamps for records written by directories and stores
 */
export type Clock = () => string;
