import { projectNotFound, type Project, type ProjectId } from '@worklane/core';
import type { ProjectDirectory } from '../directory/types.js';

/**
 * Admits a project as a task's home only while it is active.
 * Missing and archived projects fail the same way.
 */
export class ProjectGate {
  constructor(private readonly projects: ProjectDirectory) {}

  requireActiveProject(projectId: ProjectId): Project {
    const project = this.projects.findActiveById(projectId);
    if (!project) {
      throw projectNotFound(projectId);
    }
    return project;
  }
}
