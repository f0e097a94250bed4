import { Command, Option } from 'commander';
import chalk from 'chalk';
import { addTask, deleteTask, TaskStatus } from '../../tasks/index.js';
import { contextFor, reportError, statusColor } from '../context.js';

export function createTaskCommand(): Command {
  const task = new Command('task').description('Manage tasks');

  task
    .command('add')
    .description('Register a new open task')
    .argument('<id>', 'Task ID (used for log directories)')
    .argument('<title>', 'Task title')
    .action(async (id: string, title: string, _opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const created = await addTask(ctx, { id, title });
        console.log(chalk.green(`Task [${created.id}] registered.`));
      } catch (err) {
        reportError(err);
      }
    });

  task
    .command('list')
    .description('List tasks')
    .addOption(new Option('--status <status>', 'Filter by status').choices(TaskStatus.options))
    .option('--agent <agent>', 'Filter by assignee')
    .option('--json', 'Output as JSON')
    .action(async (opts: { status?: TaskStatus; agent?: string; json?: boolean }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const tasks = await ctx.tasks.list({ status: opts.status, assignee: opts.agent });

        if (opts.json) {
          console.log(JSON.stringify(tasks, null, 2));
          return;
        }
        if (tasks.length === 0) {
          console.log('No tasks found.');
          return;
        }
        for (const t of tasks) {
          const who = t.assignee ? chalk.dim(` @${t.assignee}${t.engine ? ` (${t.engine})` : ''}`) : '';
          console.log(`- [${chalk.bold(t.id)}] ${t.title} ${statusColor(t.status)}${who}`);
        }
      } catch (err) {
        reportError(err);
      }
    });

  task
    .command('info')
    .description('Show task details')
    .argument('<id>', 'Task ID')
    .action(async (id: string, _opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const found = await ctx.tasks.get(id);
        if (!found) {
          console.error('Task not found.');
          process.exitCode = 1;
          return;
        }
        console.log(JSON.stringify(found, null, 2));
      } catch (err) {
        reportError(err);
      }
    });

  task
    .command('delete')
    .description('Remove a task from the store (its worker and logs are kept)')
    .argument('<id>', 'Task ID')
    .action(async (id: string, _opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        if (await deleteTask(ctx, id)) console.log(chalk.dim(`Task [${id}] deleted.`));
        else {
          console.error('Task not found.');
          process.exitCode = 1;
        }
      } catch (err) {
        reportError(err);
      }
    });

  return task;
}
