import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { audit } from '../audit/index.js';
import { closeTask } from '../tasks/store.js';
import type { TaskStore } from '../tasks/store.js';

export interface ScanResult {
  /**
   * Log files read this tick. Reading a task's directory stops at the first
   * file that carries the sentinel, so later files there are not counted.
   */
  scanned: number;
  /** Tasks whose log carried the sentinel. */
  detected: string[];
  /** Subset of `detected` that actually moved to closed this tick. */
  closed: string[];
}

/** Entries of a directory, or none if it cannot be listed. */
async function listDir(path: string) {
  try {
    return await readdir(path, { withFileTypes: true });
  } catch {
    return [];
  }
}

async function readLog(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    return undefined;
  }
}

/** True if any log file under `<logRoot>/<taskId>/` contains the sentinel. */
export async function taskLogsContain(
  taskDir: string,
  sentinel: string,
  onRead: () => void = () => {},
): Promise<boolean> {
  for (const entry of await listDir(taskDir)) {
    if (!entry.isFile()) continue;
    const content = await readLog(join(taskDir, entry.name));
    if (content === undefined) continue;
    onRead();
    if (content.includes(sentinel)) return true;
  }
  return false;
}

/**
 * One full pass over the log tree. Holds no state between calls: every
 * tick rereads every file, so repeating a pass or restarting is harmless.
 * Unreadable entries are skipped.
 */
export async function scanOnce(opts: {
  logRoot: string;
  sentinel: string;
  tasks: TaskStore;
}): Promise<ScanResult> {
  const result: ScanResult = { scanned: 0, detected: [], closed: [] };

  for (const dir of await listDir(opts.logRoot)) {
    if (!dir.isDirectory()) continue;
    const taskId = dir.name;
    const done = await taskLogsContain(join(opts.logRoot, taskId), opts.sentinel, () => {
      result.scanned++;
    });
    if (!done) continue;

    result.detected.push(taskId);
    const closed = await closeTask(opts.tasks, taskId);
    if (closed?.changed) {
      result.closed.push(taskId);
      await audit('task.close', taskId, {
        actor: 'monitor',
        detail: { reason: 'sentinel', assignee: closed.task.assignee },
      });
    }
  }

  return result;
}
