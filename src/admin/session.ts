import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { audit } from '../audit/index.js';
import type { CrewContext } from '../context.js';
import { errorMessage } from '../errors.js';
import type { LaunchSpec } from '../session/index.js';
import { composeAdminBrief, pathEnv } from '../workers/index.js';

export const ADMIN_SESSION = 'hq-admin';

export type AdminStartResult =
  | { alreadyRunning: true; session: string }
  | { alreadyRunning: false; session: string; engine: string; workDir: string; openTasks: number };

export function adminWorkDir(ctx: CrewContext): string {
  return join(ctx.paths.root, 'admin');
}

/**
 * Start the admin agent in its own session, briefed with `prompts/admin.md`
 * and the open backlog. Starting while it runs leaves the live session alone.
 */
export async function startAdmin(
  ctx: CrewContext,
  opts: { engine?: string; actor?: string } = {},
): Promise<AdminStartResult> {
  if (await ctx.sessions.exists(ADMIN_SESSION)) {
    return { alreadyRunning: true, session: ADMIN_SESSION };
  }

  const workDir = adminWorkDir(ctx);
  await mkdir(workDir, { recursive: true });

  const open = await ctx.tasks.list({ status: 'open' });
  const brief = await composeAdminBrief({ promptsDir: ctx.paths.promptsDir, tasks: open });
  const resolved = ctx.engines.resolve(opts.engine, brief);

  const launch: LaunchSpec = { argv: resolved.argv, cwd: workDir };
  const env = pathEnv(ctx.config.extraPath);
  if (env) launch.env = env;

  try {
    await ctx.sessions.create(ADMIN_SESSION, launch);
  } catch (err) {
    await audit('admin.start', ADMIN_SESSION, {
      actor: opts.actor,
      success: false,
      error: errorMessage(err),
      detail: { engine: resolved.engine },
    });
    throw err;
  }
  await audit('admin.start', ADMIN_SESSION, {
    actor: opts.actor,
    detail: { engine: resolved.engine, openTasks: open.length },
  });

  return { alreadyRunning: false, session: ADMIN_SESSION, engine: resolved.engine, workDir, openTasks: open.length };
}

/** Kill the admin session. Returns false when it was not running. */
export async function stopAdmin(ctx: CrewContext, actor?: string): Promise<boolean> {
  const running = await ctx.sessions.exists(ADMIN_SESSION);
  if (!running) return false;
  await ctx.sessions.kill(ADMIN_SESSION);
  await audit('admin.stop', ADMIN_SESSION, { actor });
  return true;
}
