import { join, resolve } from 'node:path';

export const STATE_DIR_NAME = '.crewctl';

/** On-disk layout shared by every component that runs against one work dir. */
export interface WorkspacePaths {
  root: string;
  /** Task store, audit trail, mail and config. */
  stateDir: string;
  /** `<root>/.logs/tasks`: one directory per task id, one log per agent. */
  logRoot: string;
  /** `<root>/workers`: one private working directory per agent. */
  workersDir: string;
  /** `<root>/prompts`: base.md and roles/<role>.md. */
  promptsDir: string;
}

export function resolvePaths(root: string): WorkspacePaths {
  const abs = resolve(root);
  return {
    root: abs,
    stateDir: join(abs, STATE_DIR_NAME),
    logRoot: join(abs, '.logs', 'tasks'),
    workersDir: join(abs, 'workers'),
    promptsDir: join(abs, 'prompts'),
  };
}

export function workerDir(paths: WorkspacePaths, agent: string): string {
  return join(paths.workersDir, agent);
}

export function taskLogDir(paths: WorkspacePaths, taskId: string): string {
  return join(paths.logRoot, taskId);
}

export function taskLogFile(paths: WorkspacePaths, taskId: string, agent: string): string {
  return join(taskLogDir(paths, taskId), `${agent}.log`);
}
