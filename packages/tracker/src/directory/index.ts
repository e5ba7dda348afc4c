export type {
  UserDirectory,
  ProjectDirectory,
  UserAdministration,
  ProjectAdministration,
  Clock,
} from './types.js';
export { SqliteUserDirectory, createUserDirectory } from './user-directory.js';
export { SqliteProjectDirectory, createProjectDirectory } from './project-directory.js';
