import { Command } from 'commander';
import chalk from 'chalk';
import { systemSummary } from '../../tasks/index.js';
import { contextFor, reportError } from '../context.js';

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Progress, active workers, recent activity and spend')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const s = await systemSummary(ctx);
        if (opts.json) {
          console.log(JSON.stringify(s, null, 2));
          return;
        }
        console.log(chalk.bold(`Progress: ${s.progress}% (${s.closed}/${s.total} closed)`));
        console.log(`  open ${s.open}  in progress ${s.inProgress}`);
        console.log(chalk.bold('Active workers:'));
        if (s.active.length === 0) console.log(chalk.dim('  (none)'));
        for (const a of s.active) console.log(`  → ${a.agent} on [${a.taskId}]`);
        console.log(chalk.bold('Recent activity:'));
        if (s.recent.length === 0) console.log(chalk.dim('  (none)'));
        for (const e of s.recent) {
          console.log(`  ${chalk.dim(e.timestamp)} ${e.actor} ${e.action} ${e.target}`);
        }
        console.log(chalk.bold(`Total cost: $${s.totalCost.toFixed(4)}`));
      } catch (err) {
        reportError(err);
      }
    });
}
