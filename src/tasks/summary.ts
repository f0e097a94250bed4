import type { AuditEntry } from '../audit/index.js';
import type { CrewContext } from '../context.js';

export interface SystemSummary {
  total: number;
  open: number;
  inProgress: number;
  closed: number;
  /** Whole percent of tasks closed; 0 for an empty store. */
  progress: number;
  /** In-progress tasks and the agent working each. */
  active: Array<{ taskId: string; agent: string }>;
  recent: AuditEntry[];
  totalCost: number;
}

export async function systemSummary(ctx: CrewContext, recentLimit = 3): Promise<SystemSummary> {
  const tasks = await ctx.tasks.list();
  const count = (status: string) => tasks.filter((t) => t.status === status).length;
  const closed = count('closed');

  const active: SystemSummary['active'] = [];
  for (const t of tasks) {
    if (t.status === 'in_progress' && t.assignee) active.push({ taskId: t.id, agent: t.assignee });
  }

  return {
    total: tasks.length,
    open: count('open'),
    inProgress: count('in_progress'),
    closed,
    progress: tasks.length === 0 ? 0 : Math.round((closed / tasks.length) * 100),
    active,
    recent: await ctx.auditStore.query({ limit: recentLimit }),
    totalCost: await ctx.costs.total(),
  };
}
