import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createTestWorkspace } from '../testing.js';
import type { TestWorkspace } from '../testing.js';
import { addTask, deleteTask } from './admin.js';
import { sling } from './dispatch.js';
import { listAgentFiles, peek, readAgentLog, tailLines, taskHistory } from './inspect.js';

describe('tailLines', () => {
  it('returns the last lines without the trailing newline', () => {
    expect(tailLines('a\nb\nc\n', 2)).toEqual(['b', 'c']);
    expect(tailLines('a\nb', 5)).toEqual(['a', 'b']);
    expect(tailLines('a\nb\n', 0)).toEqual([]);
  });
});

describe('inspection', () => {
  let ws: TestWorkspace;

  beforeEach(async () => {
    ws = await createTestWorkspace();
    await addTask(ws.ctx, { id: 'T1', title: 'Fix bug' });
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('reports an agent with no task in progress', async () => {
    expect(await peek(ws.ctx, 'alice')).toEqual({ found: false, reason: 'no_task' });
  });

  it('reports a missing log for a dispatched agent', async () => {
    const { spawn } = await sling(ws.ctx, { taskId: 'T1', agent: 'alice', engine: 'claude' });
    expect(await peek(ws.ctx, 'alice')).toEqual({ found: false, reason: 'no_log', taskId: 'T1', path: spawn.logFile });
  });

  it('tails the log of the current task', async () => {
    const { spawn } = await sling(ws.ctx, { taskId: 'T1', agent: 'alice', engine: 'claude' });
    await writeFile(spawn.logFile, 'one\ntwo\nthree\n');

    expect(await peek(ws.ctx, 'alice', 2)).toEqual({
      found: true,
      taskId: 'T1',
      path: spawn.logFile,
      lines: ['two', 'three'],
    });
    expect(await readAgentLog(ws.ctx, 'T1', 'alice')).toEqual({ path: spawn.logFile, content: 'one\ntwo\nthree\n' });
  });

  it('lists an agent working directory without hidden clutter', async () => {
    const dir = join(ws.root, 'workers', 'alice');
    await mkdir(join(dir, '.git'), { recursive: true });
    await writeFile(join(dir, 'notes.md'), '');
    await writeFile(join(dir, 'a.txt'), '');

    expect(await listAgentFiles(ws.ctx, 'alice')).toEqual(['a.txt', 'notes.md']);
    expect(await listAgentFiles(ws.ctx, 'nobody')).toEqual([]);
  });

  it('collects the history of a task and its assignee', async () => {
    await addTask(ws.ctx, { id: 'T2', title: 'Other' });
    await sling(ws.ctx, { taskId: 'T1', agent: 'alice', engine: 'claude' });
    await deleteTask(ws.ctx, 'T2');

    const actions = (await taskHistory(ws.ctx, 'T1')).map((e) => `${e.action}:${e.target}`);

    expect(actions.sort()).toEqual(['task.add:T1', 'task.dispatch:T1', 'worker.spawn:alice']);
  });
});
