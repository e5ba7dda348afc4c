/**
 * Assignment Resolver
 *
 * Turns candidate user IDs into verified, assignable users. Every offender is
 * collected before anything is thrown, so one failed call reports the whole
 * problem.
 */

import {
  inactiveAssignees,
  usersNotFound,
  type User,
  type UserId,
} from '@worklane/core';
import type { UserDirectory } from '../directory/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('assignment-resolver');

export class AssignmentResolver {
  constructor(private readonly users: UserDirectory) {}

  /**
   * Resolves candidate IDs to users, in candidate order with duplicates dropped.
   *
   * @throws NotFoundError (USER_NOT_FOUND) when any ID is unknown or deleted;
   *   inactive usernames found in the same call are named in it too
   * @throws BusinessRuleViolation (INACTIVE_ASSIGNEE) when every ID exists but
   *   some users are inactive
   */
  resolveAssignees(candidateIds: readonly UserId[]): User[] {
    const unique = [...new Set(candidateIds)];
    if (unique.length === 0) {
      return [];
    }

    const byId = new Map(this.users.findAllById(unique).map((user) => [user.id, user]));
    const resolved: User[] = [];
    const missingIds: UserId[] = [];
    const inactiveUsernames: string[] = [];

    for (const id of unique) {
      const user = byId.get(id);
      if (!user) {
        missingIds.push(id);
      } else if (!user.active) {
        inactiveUsernames.push(user.username);
      } else {
        resolved.push(user);
      }
    }

    if (missingIds.length > 0) {
      logger.error(`Assignees not found: [${missingIds.join(', ')}]`);
      throw usersNotFound(missingIds, inactiveUsernames);
    }
    if (inactiveUsernames.length > 0) {
      logger.error(`Inactive assignees: ${inactiveUsernames.join(', ')}`);
      throw inactiveAssignees(inactiveUsernames);
    }

    return resolved;
  }
}
