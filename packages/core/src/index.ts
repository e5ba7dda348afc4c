/**
 * @worklane/core
 *
 * Core types, errors, and the task lifecycle for Worklane.
 * This package provides the foundational building blocks used across
 * all Worklane packages.
 */

// Types - identifiers, users, projects, tasks and the task state machine
export * from './types/index.js';

// Errors - structured error handling
export * from './errors/index.js';
