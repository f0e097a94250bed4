import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setAuditStore } from './audit/index.js';
import { createContext } from './context.js';
import type { CrewContext } from './context.js';
import { InMemorySessionManager } from './session/index.js';

/** Scratch work dir plus a context on it whose sessions live in memory. */
export interface TestWorkspace {
  root: string;
  ctx: CrewContext;
  sessions: InMemorySessionManager;
  cleanup(): Promise<void>;
}

export async function createTestWorkspace(): Promise<TestWorkspace> {
  const root = await mkdtemp(join(tmpdir(), 'crewctl-test-'));
  const sessions = new InMemorySessionManager();
  const ctx = await createContext(root, { sessions });
  return {
    root,
    ctx,
    sessions,
    async cleanup() {
      setAuditStore(undefined);
      await rm(root, { recursive: true, force: true });
    },
  };
}
