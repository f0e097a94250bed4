import { z } from 'zod';

export const CostEntrySchema = z.object({
  id: z.number().int().positive(),
  taskId: z.string(),
  agent: z.string(),
  model: z.string(),
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
  costUsd: z.number().nonnegative(),
  timestamp: z.string().datetime(),
});

export type CostEntry = z.infer<typeof CostEntrySchema>;

export const AddCostInputSchema = CostEntrySchema.omit({ id: true, timestamp: true }).extend({
  taskId: z.string().min(1),
  agent: z.string().min(1),
  model: z.string().min(1),
});

export type AddCostInput = z.infer<typeof AddCostInputSchema>;

export interface ModelCostSummary {
  model: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}
