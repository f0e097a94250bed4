import { Command } from 'commander';
import { startDashboard } from '../../dashboard/server.js';
import { contextFor, reportError } from '../context.js';

export function createDashboardCommand(): Command {
  const dashboard = new Command('dashboard').description('Web dashboard API');

  dashboard
    .command('start')
    .description('Start the dashboard API server')
    .option('--port <port>', 'Port to listen on (default: config dashboardPort)')
    .action(async (opts: { port?: string }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const port = opts.port ? parseInt(opts.port, 10) : ctx.config.dashboardPort;
        await startDashboard(ctx, port);
      } catch (err) {
        reportError(err);
      }
    });

  return dashboard;
}
