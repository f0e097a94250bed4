import { Command } from 'commander';
import chalk from 'chalk';
import { done, nudge, sling } from '../../tasks/index.js';
import { contextFor, reportError } from '../context.js';

export function createSlingCommand(): Command {
  return new Command('sling')
    .description('Dispatch a task to an agent: start its worker and mark the task in progress')
    .argument('<task-id>', 'Task ID')
    .argument('<agent>', 'Agent name')
    .option('--engine <engine>', 'Engine tag; defaults to the task\'s last engine, then the configured default')
    .option('--role <role>', 'Role prompt to load from prompts/roles/', 'worker')
    .option('--if-open', 'Only dispatch if the task is still open')
    .action(async (
      taskId: string,
      agent: string,
      opts: { engine?: string; role: string; ifOpen?: boolean },
      cmd: Command,
    ) => {
      try {
        const ctx = await contextFor(cmd);
        console.log(`Dispatching task '${taskId}' to agent '${agent}'...`);
        const result = await sling(ctx, { taskId, agent, engine: opts.engine, role: opts.role, ifOpen: opts.ifOpen });

        if (result.spawn.requestedEngine) {
          console.log(chalk.yellow(`Unknown engine "${result.spawn.requestedEngine}", using ${result.spawn.engine}.`));
        }
        if (result.spawn.alreadyRunning) {
          console.log(chalk.yellow(`Session ${result.spawn.session} was already running; no new process started.`));
        }
        if (result.reopened) {
          console.log(chalk.yellow(`Task '${taskId}' was closed and has been reopened.`));
        }
        console.log(chalk.green(`Agent '${agent}' is now on the hook for '${taskId}' (${result.spawn.engine}).`));
        console.log(chalk.dim(`  Session: ${result.spawn.session}`));
        console.log(chalk.dim(`  Log: ${result.spawn.logFile}`));
      } catch (err) {
        reportError(err, 'Dispatch failed');
      }
    });
}

export function createDoneCommand(): Command {
  return new Command('done')
    .description('Close a task and tear down its worker')
    .argument('<task-id>', 'Task ID')
    .action(async (taskId: string, _opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const result = await done(ctx, { taskId });
        if (result.nuked) console.log(chalk.dim(`Cleaned up worker '${result.nuked}'.`));
        console.log(chalk.green(`Task '${taskId}' is now marked as DONE.`));
      } catch (err) {
        reportError(err);
      }
    });
}

export function createNudgeCommand(): Command {
  return new Command('nudge')
    .description('Flash a message in an agent\'s session, or mail it if the agent has none')
    .argument('<agent>', 'Agent name')
    .argument('<message>', 'Message text')
    .action(async (agent: string, message: string, _opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const result = await nudge(ctx, { agent, message });
        if (result.delivery === 'session') {
          console.log(chalk.green(`Message displayed in ${result.session}.`));
        } else {
          console.log(chalk.yellow(`Agent '${agent}' has no live session. Nudge sent to its inbox.`));
        }
      } catch (err) {
        reportError(err);
      }
    });
}
