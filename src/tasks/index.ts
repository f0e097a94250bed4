export { JsonTaskStore, TaskExistsError, closeTask, TASKS_FILE } from './store.js';
export type { TaskStore } from './store.js';
export { sling, done, nudge, nudgeBanner, TaskStatusConflictError, NUDGE_MAIL_SUBJECT } from './dispatch.js';
export type { SlingInput, SlingResult, DoneResult, NudgeResult } from './dispatch.js';
export { addTask, deleteTask } from './admin.js';
export { peek, readAgentLog, listAgentFiles, taskHistory, tailLines } from './inspect.js';
export type { PeekResult } from './inspect.js';
export { systemSummary } from './summary.js';
export type { SystemSummary } from './summary.js';
export {
  TaskStatus,
  TaskSchema,
  TaskIdSchema,
  AgentNameSchema,
  PromptNameSchema,
  CreateTaskInputSchema,
} from './types.js';
export type { Task, CreateTaskInput, TaskPatch, UpdateOptions, UpdateResult } from './types.js';
