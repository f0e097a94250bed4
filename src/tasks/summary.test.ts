import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestWorkspace } from '../testing.js';
import type { TestWorkspace } from '../testing.js';
import { addTask } from './admin.js';
import { done, sling } from './dispatch.js';
import { systemSummary } from './summary.js';

describe('systemSummary', () => {
  let ws: TestWorkspace;

  beforeEach(async () => {
    ws = await createTestWorkspace();
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('is all zeros for an empty work dir', async () => {
    expect(await systemSummary(ws.ctx)).toEqual({
      total: 0,
      open: 0,
      inProgress: 0,
      closed: 0,
      progress: 0,
      active: [],
      recent: [],
      totalCost: 0,
    });
  });

  it('counts tasks, active workers, recent activity and spend', async () => {
    const { ctx } = ws;
    await addTask(ctx, { id: 'T1', title: 'Fix bug' });
    await addTask(ctx, { id: 'T2', title: 'Write docs' });
    await addTask(ctx, { id: 'T3', title: 'Ship it' });
    await sling(ctx, { taskId: 'T1', agent: 'alice' });
    await sling(ctx, { taskId: 'T2', agent: 'bob' });
    await done(ctx, { taskId: 'T2' });
    await ctx.costs.add({ taskId: 'T1', agent: 'alice', model: 'sonnet', inputTokens: 10, outputTokens: 5, costUsd: 0.5 });

    const summary = await systemSummary(ctx);

    expect(summary).toMatchObject({
      total: 3,
      open: 1,
      inProgress: 1,
      closed: 1,
      progress: 33,
      active: [{ taskId: 'T1', agent: 'alice' }],
      totalCost: 0.5,
    });
    expect(summary.recent).toHaveLength(3);
    expect(summary.recent[0]).toMatchObject({ action: 'task.close', target: 'T2' });
  });
});
