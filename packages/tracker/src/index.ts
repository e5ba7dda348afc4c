/**
 * @worklane/tracker
 *
 * Task orchestration on top of @worklane/core and @worklane/storage:
 * directories, the task store, the task service and configuration.
 */

// Services - task orchestration, assignee resolution and the read path
export * from './services/index.js';

// Directories - users and projects
export * from './directory/index.js';

// Stores - task rows, assignment links, comments and attachments
export * from './store/index.js';

// Configuration
export * from './config/index.js';

// Logging
export type { Logger, LogLevel } from './utils/logger.js';
export { createLogger, getLogLevel, isLogLevel, LOG_LEVELS } from './utils/logger.js';
