import { z } from 'zod';

export const TaskStatus = z.enum(['open', 'in_progress', 'closed']);
export type TaskStatus = z.infer<typeof TaskStatus>;

/** Task ids name directories under the log root, so they must be a single path segment. */
export const TaskIdSchema = z
  .string()
  .min(1)
  .refine((id) => !/[\\/]/.test(id) && id !== '.' && id !== '..', {
    message: 'must be a single path segment',
  });

/** Agent names form session names and directory names. */
export const AgentNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'letters, digits, "-" and "_" only');

/** Prompt template names (`prompts/<name>.md`, `prompts/roles/<name>.md`). */
export const PromptNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'letters, digits, "-" and "_" only');

export const TaskSchema = z.object({
  id: TaskIdSchema,
  title: z.string(),
  status: TaskStatus,
  /** Agent the task was last dispatched to; kept after closure. */
  assignee: z.string().optional(),
  engine: z.string().optional(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  dispatchedAt: z.string().datetime().optional(),
  closedAt: z.string().datetime().optional(),
});

export type Task = z.infer<typeof TaskSchema>;

export const CreateTaskInputSchema = z.object({
  id: TaskIdSchema,
  title: z.string().min(1),
});

export type CreateTaskInput = z.infer<typeof CreateTaskInputSchema>;

export type TaskPatch = Partial<Pick<Task, 'title' | 'status' | 'assignee' | 'engine' | 'dispatchedAt' | 'closedAt'>>;

export interface UpdateOptions {
  /** Apply only if the task currently has this status. */
  expectedStatus?: TaskStatus;
}

export type UpdateResult =
  | { applied: true; task: Task; previous: Task }
  | { applied: false; reason: 'not_found' }
  | { applied: false; reason: 'status_mismatch'; task: Task };
