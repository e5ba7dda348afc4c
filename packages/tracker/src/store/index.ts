export type { TaskStore, TaskChildCounts } from './task-store.js';
export { SqliteTaskStore, createTaskStore } from './task-store.js';
export type { Comment, Attachment, AddAttachmentInput } from './activity-store.js';
export {
  MAX_COMMENT_LENGTH,
  MAX_FILENAME_LENGTH,
  MAX_ATTACHMENT_SIZE,
  TaskActivityStore,
  createActivityStore,
  validateCommentText,
  validateAttachment,
} from './activity-store.js';
