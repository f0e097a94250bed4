import { Command } from 'commander';
import chalk from 'chalk';
import { audit } from '../../audit/index.js';
import { workerEnv } from '../../context.js';
import { errorMessage } from '../../errors.js';
import { workerSessionName } from '../../session/index.js';
import { AgentNameSchema, TaskIdSchema } from '../../tasks/index.js';
import { Worker } from '../../workers/index.js';
import type { SpawnResult } from '../../workers/index.js';
import { contextFor, reportError } from '../context.js';

export function createWorkerCommand(): Command {
  const worker = new Command('worker').description('Start, stop and list agent workers');

  worker
    .command('spawn')
    .description('Start a worker session for a task without changing the task')
    .argument('<task-id>', 'Task ID the worker logs under')
    .argument('<name>', 'Agent name')
    .option('--engine <engine>', 'Engine tag (claude, opencode, gemini, ...)')
    .option('--role <role>', 'Role prompt to load from prompts/roles/', 'worker')
    .action(async (taskId: string, name: string, opts: { engine?: string; role: string }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const agent = AgentNameSchema.parse(name);
        const w = new Worker(workerEnv(ctx), {
          taskId: TaskIdSchema.parse(taskId),
          agent,
          engine: opts.engine,
          role: opts.role,
        });
        let result: SpawnResult;
        try {
          result = await w.spawn();
        } catch (err) {
          await audit('worker.spawn', agent, { success: false, error: errorMessage(err), detail: { taskId } });
          throw err;
        }
        await audit('worker.spawn', agent, { detail: { taskId, engine: result.engine } });
        if (result.requestedEngine) {
          console.log(chalk.yellow(`Unknown engine "${result.requestedEngine}", using ${result.engine}.`));
        }
        if (result.alreadyRunning) {
          console.log(chalk.dim(`Session ${result.session} is already running.`));
        } else {
          console.log(chalk.green(`Worker ${chalk.bold(agent)} dispatched with engine ${result.engine}.`));
        }
        console.log(chalk.dim(`  Log: ${result.logFile}`));
      } catch (err) {
        reportError(err, 'Spawn failed');
      }
    });

  worker
    .command('nuke')
    .description('Kill a worker session and delete its working directory')
    .argument('<name>', 'Agent name')
    .action(async (name: string, _opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const agent = AgentNameSchema.parse(name);
        await Worker.nuke(ctx, agent);
        await audit('worker.nuke', agent);
        console.log(chalk.dim(`Worker ${name} nuked.`));
      } catch (err) {
        reportError(err);
      }
    });

  worker
    .command('list')
    .description('Show agents with in-progress tasks and whether their session is live')
    .action(async (_opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const tasks = await ctx.tasks.list({ status: 'in_progress' });
        if (tasks.length === 0) {
          console.log('(No active workers currently)');
          return;
        }
        for (const t of tasks) {
          if (!t.assignee) continue;
          const session = workerSessionName(t.assignee);
          const live = await ctx.sessions.exists(session);
          const state = live ? chalk.green('live') : chalk.red('gone');
          console.log(`→ ${chalk.bold(t.assignee)} on [${t.id}] ${session} ${state}`);
        }
      } catch (err) {
        reportError(err);
      }
    });

  return worker;
}
