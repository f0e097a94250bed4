import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { randomUUID } from 'node:crypto';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JsonAuditStore } from './json-store.js';
import { audit, setAuditFailureHandler, setAuditStore } from './logger.js';
import type { AuditStore } from './store.js';
import type { AuditAction, AuditEntry } from './types.js';

function entry(action: AuditAction, target: string, timestamp: string, actor = 'cli'): AuditEntry {
  return { id: randomUUID(), timestamp, action, actor, target, success: true };
}

describe('JsonAuditStore', () => {
  let dir: string;
  let store: JsonAuditStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'crewctl-audit-'));
    store = new JsonAuditStore(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns entries newest first', async () => {
    await store.append(entry('task.add', 'T1', '2026-01-01T10:00:00.000Z'));
    await store.append(entry('task.dispatch', 'T1', '2026-01-01T11:00:00.000Z'));
    await store.append(entry('task.close', 'T1', '2026-01-01T12:00:00.000Z', 'monitor'));

    const actions = (await store.query({})).map((e) => e.action);
    expect(actions).toEqual(['task.close', 'task.dispatch', 'task.add']);
  });

  it('keeps append order reversed for equal timestamps', async () => {
    const ts = '2026-01-01T10:00:00.000Z';
    await store.append(entry('task.add', 'T1', ts));
    await store.append(entry('task.add', 'T2', ts));

    expect((await store.query({})).map((e) => e.target)).toEqual(['T2', 'T1']);
  });

  it('filters and limits', async () => {
    await store.append(entry('task.add', 'T1', '2026-01-01T10:00:00.000Z'));
    await store.append(entry('task.add', 'T2', '2026-01-02T10:00:00.000Z'));
    await store.append(entry('task.close', 'T1', '2026-01-03T10:00:00.000Z', 'monitor'));

    expect((await store.query({ action: 'task.add' })).map((e) => e.target)).toEqual(['T2', 'T1']);
    expect((await store.query({ target: 'T1' })).map((e) => e.action)).toEqual(['task.close', 'task.add']);
    expect((await store.query({ actor: 'monitor' })).map((e) => e.target)).toEqual(['T1']);
    expect((await store.query({ since: '2026-01-02T00:00:00.000Z' })).length).toBe(2);
    expect((await store.query({ limit: 1 })).map((e) => e.action)).toEqual(['task.close']);
  });

  it('finds an entry by id', async () => {
    const e = entry('mail.send', 'alice', '2026-01-01T10:00:00.000Z');
    await store.append(e);
    expect(await store.get(e.id)).toEqual(e);
    expect(await store.get(randomUUID())).toBeUndefined();
  });
});

describe('audit', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'crewctl-audit-log-'));
  });

  afterEach(async () => {
    setAuditStore(undefined);
    await rm(dir, { recursive: true, force: true });
  });

  it('writes to the configured store', async () => {
    setAuditStore(new JsonAuditStore(dir));
    await audit('task.add', 'T1', { detail: { title: 'Fix bug' } });

    const written: unknown = JSON.parse(await readFile(join(dir, 'audit.json'), 'utf-8'));
    expect(written).toMatchObject([
      { action: 'task.add', target: 'T1', actor: 'cli', success: true, detail: { title: 'Fix bug' } },
    ]);
  });

  it('reports a failed write instead of throwing', async () => {
    const broken: AuditStore = {
      append: () => Promise.reject(new Error('disk full')),
      query: () => Promise.resolve([]),
      get: () => Promise.resolve(undefined),
    };
    const handler = vi.fn();
    setAuditStore(broken);
    setAuditFailureHandler(handler);

    await expect(audit('worker.nuke', 'alice')).resolves.toBeUndefined();

    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0][1]).toMatchObject({ action: 'worker.nuke', target: 'alice' });
  });

  it('reports a missing store instead of throwing', async () => {
    const handler = vi.fn();
    setAuditFailureHandler(handler);

    await audit('task.add', 'T1');

    expect(handler).toHaveBeenCalledOnce();
  });
});
