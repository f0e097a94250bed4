import { Command } from 'commander';
import chalk from 'chalk';
import { Monitor } from '../../monitor/index.js';
import { contextFor, reportError } from '../context.js';

export function createMonitorCommand(): Command {
  const monitor = new Command('monitor').description('Completion detector');

  monitor
    .command('start')
    .description('Poll task logs and close tasks whose log contains the completion sentinel')
    .option('--interval <seconds>', 'Poll interval in seconds (default: config pollIntervalSeconds)')
    .option('--once', 'Run a single scan and exit')
    .action(async (opts: { interval?: string; once?: boolean }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const seconds = opts.interval ? Number(opts.interval) : ctx.config.pollIntervalSeconds;
        if (!Number.isFinite(seconds) || seconds <= 0) {
          throw new Error(`Invalid interval: ${opts.interval}`);
        }

        const m = new Monitor({
          logRoot: ctx.paths.logRoot,
          sentinel: ctx.config.sentinel,
          tasks: ctx.tasks,
          intervalMs: seconds * 1000,
          log: (msg) => console.log(chalk.dim(`[${new Date().toLocaleTimeString()}] [monitor]`), msg),
        });

        if (opts.once) {
          const result = await m.tick();
          console.log(`Scanned ${result.scanned} log(s); closed ${result.closed.length} task(s).`);
          for (const id of result.closed) console.log(chalk.green(`  ${id}`));
          return;
        }

        console.log(chalk.bold('crewctl monitor'));
        console.log(chalk.dim(`Looking for ${ctx.config.sentinel}. Ctrl+C to stop.\n`));

        const controller = new AbortController();
        const stop = () => controller.abort();
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);
        try {
          await m.run(controller.signal);
        } finally {
          process.off('SIGINT', stop);
          process.off('SIGTERM', stop);
        }
      } catch (err) {
        reportError(err);
      }
    });

  return monitor;
}
