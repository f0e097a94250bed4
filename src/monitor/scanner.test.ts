import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JsonAuditStore, setAuditStore } from '../audit/index.js';
import { JsonTaskStore } from '../tasks/store.js';
import { scanOnce, taskLogsContain } from './scanner.js';

const SENTINEL = '[TASK_DONE]';

describe('scanOnce', () => {
  let root: string;
  let logRoot: string;
  let tasks: JsonTaskStore;
  let auditStore: JsonAuditStore;

  async function writeLog(taskId: string, agent: string, content: string): Promise<void> {
    await mkdir(join(logRoot, taskId), { recursive: true });
    await writeFile(join(logRoot, taskId, `${agent}.log`), content);
  }

  async function dispatched(id: string, agent: string): Promise<void> {
    await tasks.add({ id, title: `task ${id}` });
    await tasks.update(id, { status: 'in_progress', assignee: agent });
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'crewctl-scan-'));
    logRoot = join(root, '.logs', 'tasks');
    tasks = new JsonTaskStore(join(root, '.crewctl'));
    auditStore = new JsonAuditStore(join(root, '.crewctl'));
    setAuditStore(auditStore);
  });

  afterEach(async () => {
    setAuditStore(undefined);
    await rm(root, { recursive: true, force: true });
  });

  it('closes tasks whose log contains the sentinel', async () => {
    await dispatched('T1', 'alice');
    await dispatched('T2', 'bob');
    await writeLog('T1', 'alice', `compiling\nall green\n${SENTINEL}\n`);
    await writeLog('T2', 'bob', 'still going\n');

    const result = await scanOnce({ logRoot, sentinel: SENTINEL, tasks });

    expect(result).toEqual({ scanned: 2, detected: ['T1'], closed: ['T1'] });
    expect((await tasks.get('T1'))?.status).toBe('closed');
    expect((await tasks.get('T2'))?.status).toBe('in_progress');
  });

  it('stops reading a task directory at the first file with the sentinel', async () => {
    await dispatched('T1', 'alice');
    await writeLog('T1', 'alice', `${SENTINEL}\n`);
    await writeLog('T1', 'bob', `${SENTINEL}\n`);

    expect(await scanOnce({ logRoot, sentinel: SENTINEL, tasks })).toEqual({
      scanned: 1,
      detected: ['T1'],
      closed: ['T1'],
    });
  });

  it('matches the sentinel anywhere in the content', async () => {
    await dispatched('T1', 'alice');
    await writeLog('T1', 'alice', `output${SENTINEL}trailing`);

    expect((await scanOnce({ logRoot, sentinel: SENTINEL, tasks })).closed).toEqual(['T1']);
  });

  it('leaves a task alone over many ticks without the sentinel', async () => {
    await dispatched('T1', 'alice');
    await writeLog('T1', 'alice', 'TASK_DONE without brackets\n');

    for (let i = 0; i < 3; i++) {
      expect(await scanOnce({ logRoot, sentinel: SENTINEL, tasks })).toEqual({ scanned: 1, detected: [], closed: [] });
    }
    expect((await tasks.get('T1'))?.status).toBe('in_progress');
  });

  it('audits a close once, however many ticks see it', async () => {
    await dispatched('T1', 'alice');
    await writeLog('T1', 'alice', `${SENTINEL}\n`);

    await scanOnce({ logRoot, sentinel: SENTINEL, tasks });
    const second = await scanOnce({ logRoot, sentinel: SENTINEL, tasks });

    expect(second).toEqual({ scanned: 1, detected: ['T1'], closed: [] });
    const entries = await auditStore.query({ action: 'task.close' });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      actor: 'monitor',
      target: 'T1',
      success: true,
      detail: { reason: 'sentinel', assignee: 'alice' },
    });
  });

  it('ignores logs of unknown tasks and stray files', async () => {
    await writeLog('ghost', 'alice', `${SENTINEL}\n`);
    await mkdir(logRoot, { recursive: true });
    await writeFile(join(logRoot, 'README'), SENTINEL);

    expect(await scanOnce({ logRoot, sentinel: SENTINEL, tasks })).toEqual({
      scanned: 1,
      detected: ['ghost'],
      closed: [],
    });
    expect(await tasks.list()).toEqual([]);
  });

  it('returns an empty result when the log root does not exist', async () => {
    expect(await scanOnce({ logRoot, sentinel: SENTINEL, tasks })).toEqual({ scanned: 0, detected: [], closed: [] });
  });

  it('uses a configured sentinel', async () => {
    await dispatched('T1', 'alice');
    await writeLog('T1', 'alice', `${SENTINEL}\n`);

    const result = await scanOnce({ logRoot, sentinel: '<<finished>>', tasks });

    expect(result.closed).toEqual([]);
  });
});

describe('taskLogsContain', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'crewctl-logs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('checks every agent log of a task', async () => {
    await writeFile(join(dir, 'alice.log'), 'nothing\n');
    await writeFile(join(dir, 'bob.log'), `${SENTINEL}\n`);
    expect(await taskLogsContain(dir, SENTINEL)).toBe(true);
  });

  it('is false for a missing directory', async () => {
    expect(await taskLogsContain(join(dir, 'missing'), SENTINEL)).toBe(false);
  });
});
