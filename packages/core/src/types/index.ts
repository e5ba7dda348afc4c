/**
 * Worklane Type Definitions
 */

export * from './common.js';
export * from './user.js';
export * from './project.js';
export * from './task.js';
