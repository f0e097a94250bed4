import { spawn } from 'node:child_process';
import { Command } from 'commander';
import chalk from 'chalk';
import { ADMIN_SESSION, startAdmin, stopAdmin } from '../../admin/index.js';
import { TmuxSessionManager } from '../../session/index.js';
import { contextFor, reportError } from '../context.js';

export function createAdminCommand(): Command {
  const admin = new Command('admin').description(`The admin agent session (${ADMIN_SESSION})`);

  admin
    .command('start')
    .description('Start the admin agent with prompts/admin.md and the open tasks')
    .option('--engine <engine>', 'Engine tag (default: the configured default engine)')
    .action(async (opts: { engine?: string }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const result = await startAdmin(ctx, { engine: opts.engine });
        if (result.alreadyRunning) {
          console.log(chalk.dim(`Session ${result.session} is already running.`));
          return;
        }
        console.log(
          chalk.green(`Admin started in ${chalk.bold(result.session)} with engine ${result.engine}`) +
            chalk.dim(` (${result.openTasks} open tasks).`),
        );
      } catch (err) {
        reportError(err, 'Admin start failed');
      }
    });

  admin
    .command('attach')
    .description('Attach this terminal to the admin session')
    .action(async (_opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        if (!(await ctx.sessions.exists(ADMIN_SESSION))) {
          console.error(chalk.red(`Admin is not running. Start it with: crewctl admin start`));
          process.exitCode = 1;
          return;
        }
        const child = spawn(ctx.config.tmuxBinary, TmuxSessionManager.attachArgs(ADMIN_SESSION), {
          stdio: 'inherit',
        });
        const code = await new Promise<number | null>((resolve, reject) => {
          child.once('error', reject);
          child.once('exit', resolve);
        });
        if (code !== 0) process.exitCode = code ?? 1;
      } catch (err) {
        reportError(err, 'Attach failed');
      }
    });

  admin
    .command('stop')
    .description('Kill the admin session')
    .action(async (_opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const stopped = await stopAdmin(ctx);
        console.log(chalk.dim(stopped ? 'Admin stopped.' : 'Admin was not running.'));
      } catch (err) {
        reportError(err);
      }
    });

  return admin;
}
