import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import type { Server } from 'node:http';
import { join } from 'node:path';
import { createTestWorkspace } from '../testing.js';
import type { TestWorkspace } from '../testing.js';
import { createDashboardServer } from './server.js';

describe('dashboard API', () => {
  let ws: TestWorkspace;
  let server: Server;
  let base: string;

  function post(path: string, body?: unknown) {
    return fetch(`${base}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body ?? {}),
    });
  }

  beforeEach(async () => {
    ws = await createTestWorkspace();
    server = createDashboardServer(ws.ctx);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await ws.cleanup();
  });

  it('reports health', async () => {
    const res = await fetch(`${base}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('creates tasks and refuses duplicates', async () => {
    const created = await post('/api/tasks', { id: 'T1', title: 'Fix bug' });
    expect(created.status).toBe(200);
    expect(await created.json()).toMatchObject({ status: 'success', task: { id: 'T1', status: 'open' } });

    const duplicate = await post('/api/tasks', { id: 'T1', title: 'Fix bug' });
    expect(duplicate.status).toBe(409);
    expect(await duplicate.json()).toEqual({ status: 'error', message: 'Task T1 already exists.' });
  });

  it('dispatches, reports and closes a task', async () => {
    await post('/api/tasks', { id: 'T1', title: 'Fix bug' });

    const started = await post('/api/start', { task_id: 'T1', agent_name: 'alice', engine: 'claude' });
    expect(await started.json()).toMatchObject({
      status: 'success',
      session: 'worker-alice',
      reopened: false,
      task: { status: 'in_progress', assignee: 'alice', engine: 'claude' },
    });
    expect(await ws.sessions.exists('worker-alice')).toBe(true);

    const dashboard = await fetch(`${base}/api/dashboard`);
    expect(await dashboard.json()).toMatchObject({
      agents: ['alice'],
      stats: { tasks_total: 1, tasks_done: 0, tasks_open: 0, tasks_in_progress: 1 },
    });

    const finished = await post('/api/done/T1');
    expect(await finished.json()).toMatchObject({ status: 'success', task: { status: 'closed' } });
    expect(await ws.sessions.exists('worker-alice')).toBe(false);
  });

  it('serves agent logs', async () => {
    const logFile = join(ws.root, '.logs', 'tasks', 'T1', 'alice.log');

    const missing = await fetch(`${base}/api/logs/T1/alice`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ content: `Log file not found at: ${logFile}`, path: logFile });

    await mkdir(join(ws.root, '.logs', 'tasks', 'T1'), { recursive: true });
    await writeFile(logFile, 'hello\n');
    const found = await fetch(`${base}/api/logs/T1/alice`);
    expect(await found.json()).toEqual({ content: 'hello\n', path: logFile });
  });

  it('serves prompt templates by name', async () => {
    const missing = await fetch(`${base}/api/prompts/admin`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ content: 'Prompt not found.' });

    await mkdir(join(ws.root, 'prompts', 'roles'), { recursive: true });
    await writeFile(join(ws.root, 'prompts', 'admin.md'), 'Run the crew.');
    await writeFile(join(ws.root, 'prompts', 'roles', 'reviewer.md'), 'Review carefully.');

    const admin = await fetch(`${base}/api/prompts/admin`);
    expect(admin.status).toBe(200);
    expect(await admin.json()).toEqual({ content: 'Run the crew.' });
    expect(await (await fetch(`${base}/api/prompts/reviewer`)).json()).toEqual({ content: 'Review carefully.' });
  });

  it('answers 400 to a malformed escape in the path', async () => {
    const res = await fetch(`${base}/api/logs/%E0%A4%A/alice`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ status: 'error', message: 'Malformed URL' });
  });

  it('refuses encoded slashes that would leave the work dir', async () => {
    const log = await fetch(`${base}/api/logs/..%2F..%2Fsecret/x`);
    expect(log.status).toBe(400);
    expect(await log.json()).toEqual({ status: 'error', message: 'must be a single path segment' });

    const files = await fetch(`${base}/api/agents/..%2F.crewctl/files`);
    expect(files.status).toBe(400);
    expect(await files.json()).toEqual({ status: 'error', message: 'letters, digits, "-" and "_" only' });

    const prompt = await fetch(`${base}/api/prompts/..%2F.crewctl%2Fconfig`);
    expect(prompt.status).toBe(400);

    const history = await fetch(`${base}/api/tasks/..%2F..%2Fetc/history`);
    expect(history.status).toBe(400);
  });

  it('reports total spend in the dashboard stats', async () => {
    await ws.ctx.costs.add({
      taskId: 'T1',
      agent: 'alice',
      model: 'gemini-pro',
      inputTokens: 100,
      outputTokens: 50,
      costUsd: 0.25,
    });
    await ws.ctx.costs.add({
      taskId: 'T2',
      agent: 'bob',
      model: 'gemini-pro',
      inputTokens: 10,
      outputTokens: 5,
      costUsd: 0.5,
    });

    const res = await fetch(`${base}/api/dashboard`);
    expect(await res.json()).toMatchObject({ stats: { tasks_total: 0, total_cost: 0.75 } });
  });

  it('mails a nudge for an agent without a session', async () => {
    const res = await post('/api/nudge', { agent_name: 'carol', message: 'ping' });
    expect(await res.json()).toEqual({ status: 'success', delivery: 'mail' });
    expect((await ws.ctx.mail.inbox('carol'))[0]).toMatchObject({ sender: 'web', body: 'ping' });
  });

  it('maps errors to status codes', async () => {
    const invalid = await post('/api/start', { agent_name: 'alice' });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({ status: 'error', message: 'task_id: Required' });

    const notFound = await post('/api/done/nope');
    expect(notFound.status).toBe(404);
    expect(await notFound.json()).toEqual({ status: 'error', message: 'Task nope not found.' });

    const deleted = await fetch(`${base}/api/tasks/nope`, { method: 'DELETE' });
    expect(deleted.status).toBe(404);

    const unknown = await fetch(`${base}/api/unknown`);
    expect(unknown.status).toBe(404);
  });

  it('serves the UI from the work dir with a fallback to index.html', async () => {
    await mkdir(join(ws.root, 'ui'), { recursive: true });
    await writeFile(join(ws.root, 'ui', 'index.html'), '<h1>crew</h1>');

    const root = await fetch(`${base}/`);
    expect(root.headers.get('content-type')).toBe('text/html');
    expect(await root.text()).toBe('<h1>crew</h1>');
    expect(await (await fetch(`${base}/tasks/T1`)).text()).toBe('<h1>crew</h1>');
  });
});
