import { z } from 'zod';

export const AuditAction = z.enum([
  'task.add',
  'task.delete',
  'task.dispatch',
  'task.close',
  'worker.spawn',
  'worker.nuke',
  'nudge.sent',
  'nudge.mailed',
  'mail.send',
  'admin.start',
  'admin.stop',
  'cost.add',
]);

export type AuditAction = z.infer<typeof AuditAction>;

export const AuditEntrySchema = z.object({
  id: z.string().uuid(),
  timestamp: z.string().datetime(),
  action: AuditAction,
  /** Who acted: "cli", "web", "monitor" or an agent name. */
  actor: z.string().default('cli'),
  /** Task id or agent name the action applied to. */
  target: z.string(),
  detail: z.record(z.unknown()).optional(),
  success: z.boolean(),
  error: z.string().optional(),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export const AuditQuerySchema = z.object({
  action: AuditAction.optional(),
  target: z.string().optional(),
  actor: z.string().optional(),
  since: z.string().datetime().optional(),
  limit: z.number().int().positive().default(50),
});

export type AuditQuery = z.input<typeof AuditQuerySchema>;
