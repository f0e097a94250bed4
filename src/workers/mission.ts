import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

export const DEFAULT_ROLE = 'worker';
export const DEFAULT_ROLE_PROMPT = 'You are a specialized agent.';
export const DEFAULT_ADMIN_PROMPT = 'You are the crew admin.';

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    return undefined;
  }
}

export async function loadBasePrompt(promptsDir: string): Promise<string> {
  return (await readOptional(join(promptsDir, 'base.md'))) ?? '';
}

export async function loadRolePrompt(promptsDir: string, role: string): Promise<string> {
  return (await readOptional(join(promptsDir, 'roles', `${role}.md`))) ?? DEFAULT_ROLE_PROMPT;
}

/**
 * A template by name, as the dashboard shows it: `prompts/<name>.md`
 * (base, admin), then `prompts/roles/<name>.md`.
 */
export async function loadPrompt(promptsDir: string, name: string): Promise<string | undefined> {
  return (
    (await readOptional(join(promptsDir, `${name}.md`))) ??
    (await readOptional(join(promptsDir, 'roles', `${name}.md`)))
  );
}

export function buildMission(opts: {
  basePrompt: string;
  rolePrompt: string;
  taskId: string;
  sentinel: string;
}): string {
  return [
    opts.basePrompt.trim(),
    opts.rolePrompt.trim(),
    `MISSION ID: ${opts.taskId}`,
    `When the mission is complete, print ${opts.sentinel} on its own line.`,
    'EXECUTE NOW.',
  ]
    .filter(Boolean)
    .join('\n\n');
}

export async function composeMission(opts: {
  promptsDir: string;
  role: string;
  taskId: string;
  sentinel: string;
}): Promise<string> {
  const [basePrompt, rolePrompt] = await Promise.all([
    loadBasePrompt(opts.promptsDir),
    loadRolePrompt(opts.promptsDir, opts.role),
  ]);
  return buildMission({ basePrompt, rolePrompt, taskId: opts.taskId, sentinel: opts.sentinel });
}

/** Admin prompt followed by the backlog it should work through. */
export function buildAdminBrief(adminPrompt: string, tasks: ReadonlyArray<{ id: string; title: string }>): string {
  return [adminPrompt.trim(), '', 'Pending Tasks:', ...tasks.map((t) => `- [${t.id}] ${t.title}`)].join('\n');
}

export async function composeAdminBrief(opts: {
  promptsDir: string;
  tasks: ReadonlyArray<{ id: string; title: string }>;
}): Promise<string> {
  const prompt = (await readOptional(join(opts.promptsDir, 'admin.md'))) ?? DEFAULT_ADMIN_PROMPT;
  return buildAdminBrief(prompt, opts.tasks);
}
