/**
 * SQLite Project Directory
 *
 * Archiving clears `active`; archived projects stay readable but accept no
 * new tasks.
 */

import type { StorageBackend } from '@worklane/storage';
import {
  MAX_PROJECT_DESCRIPTION_LENGTH,
  asProjectId,
  createTimestamp,
  notFound,
  projectNotFound,
  validateOptionalText,
  validateProjectName,
  type CreateProjectInput,
  type Project,
  type ProjectId,
} from '@worklane/core';
import type { Clock, ProjectAdministration } from './types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('project-directory');

interface ProjectRow {
  id: number;
  name: string;
  description: string | null;
  active: number;
  created_at: string;
  updated_at: string;
  [key: string]: unknown;
}

function rowToProject(row: ProjectRow): Project {
  return {
    id: asProjectId(row.id),
    name: row.name,
    description: row.description ?? undefined,
    active: row.active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SqliteProjectDirectory implements ProjectAdministration {
  constructor(
    private readonly db: StorageBackend,
    private readonly now: Clock = () => createTimestamp()
  ) {}

  findActiveById(id: ProjectId): Project | undefined {
    const row = this.db.queryOne<ProjectRow>('SELECT * FROM projects WHERE id = ? AND active = 1', [id]);
    return row ? rowToProject(row) : undefined;
  }

  findById(id: ProjectId): Project | undefined {
    const row = this.db.queryOne<ProjectRow>('SELECT * FROM projects WHERE id = ?', [id]);
    return row ? rowToProject(row) : undefined;
  }

  create(input: CreateProjectInput): Project {
    const name = validateProjectName(input.name);
    const description = validateOptionalText(input.description, 'description', MAX_PROJECT_DESCRIPTION_LENGTH);
    const now = this.now();
    const result = this.db.run(
      'INSERT INTO projects (name, description, active, created_at, updated_at) VALUES (?, ?, 1, ?, ?)',
      [name, description, now, now]
    );
    const id = asProjectId(Number(result.lastInsertRowid));
    logger.info(`Created project ${id} (${name})`);
    return this.require(id);
  }

  archive(id: ProjectId): Project {
    if (!this.findActiveById(id)) {
      throw projectNotFound(id);
    }
    this.db.run('UPDATE projects SET active = 0, updated_at = ? WHERE id = ?', [this.now(), id]);
    logger.info(`Archived project ${id}`);
    return this.require(id);
  }

  /**
   * Makes an archived project active again; an active project is returned as is
   */
  reactivate(id: ProjectId): Project {
    const project = this.require(id);
    if (project.active) {
      return project;
    }
    this.db.run('UPDATE projects SET active = 1, updated_at = ? WHERE id = ?', [this.now(), id]);
    logger.info(`Reactivated project ${id}`);
    return this.require(id);
  }

  private require(id: ProjectId): Project {
    const project = this.findById(id);
    if (!project) {
      throw notFound('project', id);
    }
    return project;
  }
}

export function createProjectDirectory(db: StorageBackend, now?: Clock): SqliteProjectDirectory {
  return new SqliteProjectDirectory(db, now);
}
