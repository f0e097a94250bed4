import { readdir, readFile } from 'node:fs/promises';
import type { AuditEntry } from '../audit/index.js';
import { taskLogFile, workerDir } from '../config/index.js';
import type { CrewContext } from '../context.js';

export type PeekResult =
  | { found: true; taskId: string; path: string; lines: string[] }
  | { found: false; reason: 'no_task' }
  | { found: false; reason: 'no_log'; taskId: string; path: string };

export function tailLines(content: string, count: number): string[] {
  const lines = content.split('\n');
  if (lines.at(-1) === '') lines.pop();
  return count > 0 ? lines.slice(-count) : [];
}

export async function readAgentLog(
  ctx: CrewContext,
  taskId: string,
  agent: string,
): Promise<{ path: string; content: string | undefined }> {
  const path = taskLogFile(ctx.paths, taskId, agent);
  try {
    return { path, content: await readFile(path, 'utf-8') };
  } catch {
    return { path, content: undefined };
  }
}

/** Last lines of the log for the task the agent is currently working on. */
export async function peek(ctx: CrewContext, agent: string, lines = 10): Promise<PeekResult> {
  const [task] = await ctx.tasks.list({ status: 'in_progress', assignee: agent });
  if (!task) return { found: false, reason: 'no_task' };

  const log = await readAgentLog(ctx, task.id, agent);
  if (log.content === undefined) {
    return { found: false, reason: 'no_log', taskId: task.id, path: log.path };
  }
  return { found: true, taskId: task.id, path: log.path, lines: tailLines(log.content, lines) };
}

const HIDDEN_FILES = new Set(['.git', '.DS_Store']);

/** Top-level entries of an agent's working directory; empty when it does not exist. */
export async function listAgentFiles(ctx: CrewContext, agent: string): Promise<string[]> {
  try {
    const names = await readdir(workerDir(ctx.paths, agent));
    return names.filter((n) => !HIDDEN_FILES.has(n)).sort();
  } catch {
    return [];
  }
}

/**
 * Audit entries about a task: those targeting it, plus those acted or
 * targeted by its assignee.
 */
export async function taskHistory(ctx: CrewContext, taskId: string, limit = 200): Promise<AuditEntry[]> {
  const task = await ctx.tasks.get(taskId);
  const entries = await ctx.auditStore.query({ limit: 10_000 });
  const assignee = task?.assignee;
  return entries
    .filter(
      (e) => e.target === taskId || (assignee !== undefined && (e.actor === assignee || e.target === assignee)),
    )
    .slice(0, limit);
}
