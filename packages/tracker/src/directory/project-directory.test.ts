import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createStorage, initializeSchema, type StorageBackend } from '@worklane/storage';
import { ErrorCode, asProjectId } from '@worklane/core';
import { createProjectDirectory, type SqliteProjectDirectory } from './project-directory.js';

const T0 = '2030-01-01T09:00:00.000Z';

describe('SqliteProjectDirectory', () => {
  let db: StorageBackend;
  let projects: SqliteProjectDirectory;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    db = createStorage(':memory:');
    initializeSchema(db);
    projects = createProjectDirectory(db, () => T0);
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  it('creates an active project', () => {
    const project = projects.create({ name: '  Platform ', description: 'Backend work' });
    expect(project).toEqual({
      id: 1,
      name: 'Platform',
      description: 'Backend work',
      active: true,
      createdAt: T0,
      updatedAt: T0,
    });
    expect(projects.findActiveById(asProjectId(1))?.name).toBe('Platform');
  });

  it('rejects a short name', () => {
    expect(() => projects.create({ name: 'ab' })).toThrow(
      expect.objectContaining({ code: ErrorCode.INVALID_INPUT, details: { field: 'name', actual: 2 } })
    );
  });

  it('rejects an over-long description', () => {
    expect(() => projects.create({ name: 'Platform', description: 'x'.repeat(1001) })).toThrow(
      expect.objectContaining({
        code: ErrorCode.INVALID_INPUT,
        message: 'description exceeds maximum length of 1000 characters',
      })
    );
  });

  it('hides archived projects from the active lookup only', () => {
    projects.create({ name: 'Platform' });
    const archived = projects.archive(asProjectId(1));

    expect(archived.active).toBe(false);
    expect(projects.findActiveById(asProjectId(1))).toBeUndefined();
    expect(projects.findById(asProjectId(1))?.active).toBe(false);
  });

  it('treats archiving an archived or missing project as not found', () => {
    projects.create({ name: 'Platform' });
    projects.archive(asProjectId(1));

    expect(() => projects.archive(asProjectId(1))).toThrow(
      expect.objectContaining({
        code: ErrorCode.PROJECT_NOT_FOUND,
        message: 'Active project not found with ID: 1',
      })
    );
    expect(() => projects.archive(asProjectId(9))).toThrow(
      expect.objectContaining({ code: ErrorCode.PROJECT_NOT_FOUND })
    );
  });

  it('reactivates an archived project and leaves an active one as is', () => {
    projects.create({ name: 'Platform' });
    projects.archive(asProjectId(1));

    expect(projects.reactivate(asProjectId(1)).active).toBe(true);
    expect(projects.reactivate(asProjectId(1))).toEqual(projects.findById(asProjectId(1)));
  });

  it('fails to reactivate an unknown project', () => {
    expect(() => projects.reactivate(asProjectId(4))).toThrow(
      expect.objectContaining({ code: ErrorCode.NOT_FOUND, message: 'Project not found: 4' })
    );
  });
});
