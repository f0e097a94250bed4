import { Command } from 'commander';
import chalk from 'chalk';
import { peek } from '../../tasks/index.js';
import { contextFor, reportError } from '../context.js';

export function createPeekCommand(): Command {
  return new Command('peek')
    .description('Show the tail of the log for the task an agent is working on')
    .argument('<agent>', 'Agent name')
    .option('--lines <n>', 'Number of lines', '10')
    .action(async (agent: string, opts: { lines: string }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const result = await peek(ctx, agent, parseInt(opts.lines, 10) || 10);
        if (!result.found) {
          if (result.reason === 'no_task') console.log(chalk.yellow(`No active task found for agent '${agent}'.`));
          else console.log(chalk.yellow(`Log file not found at ${result.path}`));
          return;
        }
        console.log(chalk.dim(`--- ${result.taskId}: last ${result.lines.length} lines ---`));
        for (const line of result.lines) console.log(line);
      } catch (err) {
        reportError(err);
      }
    });
}

export function createTrailCommand(): Command {
  return new Command('trail')
    .description('Recent activity from the audit trail')
    .option('--limit <n>', 'Number of entries', '15')
    .option('--target <target>', 'Only entries about this task or agent')
    .action(async (opts: { limit: string; target?: string }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const entries = await ctx.auditStore.query({
          limit: parseInt(opts.limit, 10) || 15,
          target: opts.target,
        });
        if (entries.length === 0) {
          console.log('No activity recorded.');
          return;
        }
        for (const e of entries) {
          const outcome = e.success ? chalk.green('ok') : chalk.red(`failed${e.error ? `: ${e.error}` : ''}`);
          console.log(`${chalk.dim(`[${e.timestamp}]`)} ${e.actor} -> ${chalk.cyan(e.action)} on ${e.target} (${outcome})`);
        }
      } catch (err) {
        reportError(err);
      }
    });
}
