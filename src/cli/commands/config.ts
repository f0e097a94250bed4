import { Command } from 'commander';
import chalk from 'chalk';
import { applyConfigValue, getConfigPath, saveConfig } from '../../config/index.js';
import { contextFor, reportError } from '../context.js';

export function createConfigCommand(): Command {
  const config = new Command('config').description('Show or change the work dir configuration');

  config
    .command('show')
    .description('Print the effective configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        if (opts.json) {
          console.log(JSON.stringify(ctx.config, null, 2));
          return;
        }
        const labelWidth = 22;
        const fmt = (label: string, value: string) => `  ${(label + ':').padEnd(labelWidth)} ${value}`;
        console.log(chalk.dim(getConfigPath(ctx.paths)));
        const unknown = ctx.engines.unknownDefault;
        const engineLabel = unknown
          ? chalk.red(`${unknown} (not registered, using ${ctx.engines.defaultEngine})`)
          : ctx.config.defaultEngine;
        console.log(fmt('defaultEngine', engineLabel));
        console.log(fmt('engines', ctx.engines.list().join(', ')));
        console.log(fmt('pollIntervalSeconds', String(ctx.config.pollIntervalSeconds)));
        console.log(fmt('sentinel', ctx.config.sentinel));
        console.log(fmt('dashboardPort', String(ctx.config.dashboardPort)));
        console.log(fmt('extraPath', ctx.config.extraPath.join(', ') || chalk.dim('(none)')));
        console.log(fmt('tmuxBinary', ctx.config.tmuxBinary));
      } catch (err) {
        reportError(err);
      }
    });

  config
    .command('set')
    .description('Set a config key; JSON values such as 5 or ["/opt/bin"] are parsed')
    .argument('<key>', 'Config key')
    .argument('<value>', 'New value')
    .action(async (key: string, value: string, _opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const next = applyConfigValue(ctx.config, key, value);
        await saveConfig(ctx.paths, next);
        console.log(chalk.green(`${key} updated.`));
      } catch (err) {
        reportError(err);
      }
    });

  return config;
}
