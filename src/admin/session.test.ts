import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SessionError } from '../errors.js';
import { addTask } from '../tasks/index.js';
import { createTestWorkspace } from '../testing.js';
import type { TestWorkspace } from '../testing.js';
import { ADMIN_SESSION, startAdmin, stopAdmin } from './session.js';

describe('admin session', () => {
  let ws: TestWorkspace;

  beforeEach(async () => {
    ws = await createTestWorkspace();
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('briefs the admin with its prompt and the open tasks', async () => {
    const { ctx, sessions, root } = ws;
    await mkdir(join(root, 'prompts'), { recursive: true });
    await writeFile(join(root, 'prompts', 'admin.md'), 'Run the crew.\n');
    await addTask(ctx, { id: 'T1', title: 'Fix bug' });
    await addTask(ctx, { id: 'T2', title: 'Write docs' });
    await addTask(ctx, { id: 'T3', title: 'Ship it' });
    await ctx.tasks.update('T3', { status: 'in_progress', assignee: 'alice' });

    const result = await startAdmin(ctx);

    expect(result).toEqual({
      alreadyRunning: false,
      session: 'hq-admin',
      engine: 'gemini',
      workDir: join(root, 'admin'),
      openTasks: 2,
    });
    expect(existsSync(join(root, 'admin'))).toBe(true);
    expect(sessions.sessions.get(ADMIN_SESSION)).toEqual({
      argv: ['gemini', '--approval-mode', 'yolo', 'Run the crew.\n\nPending Tasks:\n- [T1] Fix bug\n- [T2] Write docs'],
      cwd: join(root, 'admin'),
    });
  });

  it('uses the default prompt and the requested engine', async () => {
    await startAdmin(ws.ctx, { engine: 'claude' });

    expect(ws.sessions.sessions.get(ADMIN_SESSION)?.argv).toEqual([
      'claude',
      'You are the crew admin.\n\nPending Tasks:',
    ]);
  });

  it('leaves a running admin alone', async () => {
    await startAdmin(ws.ctx, { engine: 'claude' });

    expect(await startAdmin(ws.ctx)).toEqual({ alreadyRunning: true, session: 'hq-admin' });
    expect(ws.sessions.sessions.get(ADMIN_SESSION)?.argv[0]).toBe('claude');
    expect(await ws.ctx.auditStore.query({ action: 'admin.start' })).toHaveLength(1);
  });

  it('records a failed start and propagates the error', async () => {
    ws.sessions.failing.add(ADMIN_SESSION);

    await expect(startAdmin(ws.ctx)).rejects.toBeInstanceOf(SessionError);
    const [entry] = await ws.ctx.auditStore.query({ action: 'admin.start' });
    expect(entry).toMatchObject({ target: 'hq-admin', success: false });
  });

  it('stops the session once', async () => {
    await startAdmin(ws.ctx);

    expect(await stopAdmin(ws.ctx)).toBe(true);
    expect(await ws.sessions.exists(ADMIN_SESSION)).toBe(false);
    expect(await stopAdmin(ws.ctx)).toBe(false);
    expect(await ws.ctx.auditStore.query({ action: 'admin.stop' })).toHaveLength(1);
  });
});
