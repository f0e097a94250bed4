import { Command } from 'commander';
import chalk from 'chalk';
import { audit } from '../../audit/index.js';
import { contextFor, reportError } from '../context.js';

function usd(amount: number): string {
  return `$${amount.toFixed(4)}`;
}

export function createCostsCommand(): Command {
  const costs = new Command('costs').description('Token and spend ledger');

  costs
    .command('add')
    .description('Record token usage and spend for an agent on a task')
    .argument('<task-id>', 'Task ID')
    .argument('<agent>', 'Agent name')
    .argument('<model>', 'Model the tokens were spent on')
    .argument('<input-tokens>', 'Prompt tokens')
    .argument('<output-tokens>', 'Completion tokens')
    .argument('<cost>', 'Spend in USD')
    .action(
      async (
        taskId: string,
        agent: string,
        model: string,
        input: string,
        output: string,
        cost: string,
        _opts: unknown,
        cmd: Command,
      ) => {
        try {
          const ctx = await contextFor(cmd);
          const entry = await ctx.costs.add({
            taskId,
            agent,
            model,
            inputTokens: Number(input),
            outputTokens: Number(output),
            costUsd: Number(cost),
          });
          await audit('cost.add', taskId, { detail: { agent, model, costUsd: entry.costUsd } });
          console.log(chalk.green(`Cost #${entry.id} recorded: ${usd(entry.costUsd)} on ${model}.`));
        } catch (err) {
          reportError(err);
        }
      },
    );

  costs
    .command('list')
    .description('List ledger entries, newest first')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const entries = await ctx.costs.list();
        if (opts.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }
        if (entries.length === 0) {
          console.log('No costs recorded.');
          return;
        }
        for (const e of entries) {
          console.log(
            `[${e.id}] ${chalk.bold(e.taskId)} @${e.agent} ${e.model} ` +
              `in=${e.inputTokens} out=${e.outputTokens} ${usd(e.costUsd)} ${chalk.dim(e.timestamp)}`,
          );
        }
      } catch (err) {
        reportError(err);
      }
    });

  costs
    .command('summary')
    .description('Totals per model')
    .action(async (_opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const rows = await ctx.costs.summary();
        if (rows.length === 0) {
          console.log('No costs recorded.');
          return;
        }
        let total = 0;
        for (const r of rows) {
          total += r.costUsd;
          console.log(`${chalk.bold(r.model)}: in=${r.inputTokens} out=${r.outputTokens} ${usd(r.costUsd)}`);
        }
        console.log(chalk.bold(`Total: ${usd(total)}`));
      } catch (err) {
        reportError(err);
      }
    });

  return costs;
}
