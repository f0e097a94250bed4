import { audit } from '../audit/index.js';
import type { CrewContext } from '../context.js';
import { workerEnv } from '../context.js';
import { CrewctlError, SessionError, TaskNotFoundError, errorMessage } from '../errors.js';
import { workerSessionName } from '../session/index.js';
import { Worker } from '../workers/index.js';
import type { SpawnResult } from '../workers/index.js';
import { closeTask } from './store.js';
import { AgentNameSchema, PromptNameSchema } from './types.js';
import type { Task, TaskStatus } from './types.js';

export class TaskStatusConflictError extends CrewctlError {
  constructor(
    readonly taskId: string,
    readonly expected: TaskStatus,
    readonly actual: TaskStatus,
  ) {
    super(`Task ${taskId} is ${actual}, expected ${expected}.`);
  }
}

export interface SlingInput {
  taskId: string;
  agent: string;
  engine?: string;
  role?: string;
  actor?: string;
  /** Refuse unless the task is still open (compare-and-set on status). */
  ifOpen?: boolean;
}

export interface SlingResult {
  task: Task;
  spawn: SpawnResult;
  /** The task was closed before this dispatch put it back in progress. */
  reopened: boolean;
}

/**
 * Bind a task to an agent and start the agent's worker. The task row is
 * written only after the session has started; a spawn failure leaves it as
 * it was.
 *
 * Without `ifOpen` this does not guard against a concurrent close: the
 * monitor and this write race, and whichever lands last wins.
 */
export async function sling(ctx: CrewContext, input: SlingInput): Promise<SlingResult> {
  const agent = AgentNameSchema.parse(input.agent);
  const role = input.role === undefined ? undefined : PromptNameSchema.parse(input.role);
  const actor = input.actor ?? 'cli';

  const task = await ctx.tasks.get(input.taskId);
  if (!task) throw new TaskNotFoundError(input.taskId);
  if (input.ifOpen && task.status !== 'open') {
    throw new TaskStatusConflictError(task.id, 'open', task.status);
  }

  const worker = new Worker(workerEnv(ctx), {
    taskId: task.id,
    agent,
    engine: input.engine ?? task.engine,
    role,
  });

  let spawn: SpawnResult;
  try {
    spawn = await worker.spawn();
  } catch (err) {
    await audit('worker.spawn', agent, {
      actor,
      success: false,
      error: errorMessage(err),
      detail: { taskId: task.id },
    });
    throw err;
  }
  await audit('worker.spawn', agent, {
    actor,
    detail: { taskId: task.id, engine: spawn.engine, alreadyRunning: spawn.alreadyRunning },
  });

  const result = await ctx.tasks.update(
    task.id,
    {
      status: 'in_progress',
      assignee: agent,
      engine: spawn.engine,
      dispatchedAt: new Date().toISOString(),
    },
    input.ifOpen ? { expectedStatus: 'open' } : {},
  );

  if (!result.applied) {
    // Lost the task between read and write; don't leave a worker we started running for nothing
    if (!spawn.alreadyRunning) await Worker.nuke(ctx, agent);
    if (result.reason === 'not_found') throw new TaskNotFoundError(task.id);
    throw new TaskStatusConflictError(task.id, 'open', result.task.status);
  }

  const reopened = result.previous.status === 'closed';
  await audit('task.dispatch', task.id, {
    actor,
    detail: {
      agent,
      engine: spawn.engine,
      ...(spawn.requestedEngine ? { requestedEngine: spawn.requestedEngine } : {}),
      ...(reopened ? { reopened } : {}),
    },
  });

  return { task: result.task, spawn, reopened };
}

export interface DoneResult {
  task: Task;
  /** Agent whose worker was torn down, if the task had one. */
  nuked?: string;
  /** False when the task was already closed. */
  changed: boolean;
}

/**
 * Close a task and tear down its worker. The assignee is kept on the task.
 */
export async function done(
  ctx: CrewContext,
  input: { taskId: string; actor?: string },
): Promise<DoneResult> {
  const actor = input.actor ?? 'cli';
  const task = await ctx.tasks.get(input.taskId);
  if (!task) throw new TaskNotFoundError(input.taskId);

  if (task.assignee) {
    await Worker.nuke(ctx, task.assignee);
    await audit('worker.nuke', task.assignee, { actor, detail: { taskId: task.id } });
  }

  const closed = await closeTask(ctx.tasks, task.id);
  if (!closed) throw new TaskNotFoundError(task.id);

  await audit('task.close', task.id, {
    actor,
    detail: { assignee: task.assignee, alreadyClosed: !closed.changed },
  });

  return { task: closed.task, nuked: task.assignee, changed: closed.changed };
}

export interface NudgeResult {
  delivery: 'session' | 'mail';
  session: string;
}

export const NUDGE_MAIL_SUBJECT = 'NUDGE: Action Required';

export function nudgeBanner(message: string): string {
  return `!!! NUDGE: ${message} !!!`;
}

/**
 * Flash a message in the agent's live session, or leave it in the agent's
 * inbox when there is none.
 */
export async function nudge(
  ctx: CrewContext,
  input: { agent: string; message: string; actor?: string },
): Promise<NudgeResult> {
  const actor = input.actor ?? 'cli';
  const session = workerSessionName(input.agent);

  if (await ctx.sessions.exists(session)) {
    try {
      await ctx.sessions.signal(session, nudgeBanner(input.message));
      await audit('nudge.sent', input.agent, { actor });
      return { delivery: 'session', session };
    } catch (err) {
      // Session went away between the check and the message: use the inbox
      if (!(err instanceof SessionError)) throw err;
    }
  }

  await ctx.mail.send({
    sender: actor,
    receiver: input.agent,
    subject: NUDGE_MAIL_SUBJECT,
    body: input.message,
  });
  await audit('nudge.mailed', input.agent, { actor });
  return { delivery: 'mail', session };
}
