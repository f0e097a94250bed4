import { z } from 'zod';

export const ConfigSchema = z.object({
  /** Engine used when a task names none, or names one that is not registered. */
  defaultEngine: z.string().default('gemini'),
  /** Extra or overriding engines: tag -> argv prefix; the mission is appended as the last argument. */
  engines: z.record(z.array(z.string()).nonempty()).default({}),
  pollIntervalSeconds: z.number().positive().default(3),
  sentinel: z.string().min(1).default('[TASK_DONE]'),
  dashboardPort: z.number().int().positive().default(3100),
  /** Directories appended to PATH inside worker sessions. */
  extraPath: z.array(z.string()).default([]),
  tmuxBinary: z.string().default('tmux'),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
