export { AssignmentResolver } from './assignment-resolver.js';
export { ProjectGate } from './project-gate.js';
export { TaskReader } from './task-reader.js';
export type { TaskView } from './task-view.js';
export { toTaskView } from './task-view.js';
export type { TaskService, TaskServiceDeps, CreateTaskServiceOptions, OpenedTaskService } from './task-service.js';
export { DEFAULT_ACTOR, TaskServiceImpl, createTaskService, openTaskService } from './task-service.js';
