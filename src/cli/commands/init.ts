import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import chalk from 'chalk';
import { getConfigPath } from '../../config/index.js';
import { DEFAULT_ROLE, DEFAULT_ROLE_PROMPT } from '../../workers/index.js';
import { contextFor, reportError } from '../context.js';

const BASE_PROMPT = `You are one of several agents working in a shared repository.
Work only inside your own working directory unless the mission says otherwise.
`;

async function writeIfMissing(path: string, content: string): Promise<boolean> {
  if (existsSync(path)) return false;
  await writeFile(path, content, 'utf-8');
  return true;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create the state, log, worker and prompt directories in the work dir')
    .action(async (_opts: unknown, cmd: Command) => {
      try {
        // Loading the context writes the default config on first run
        const ctx = await contextFor(cmd);
        const { paths } = ctx;

        await mkdir(paths.logRoot, { recursive: true });
        await mkdir(paths.workersDir, { recursive: true });
        await mkdir(join(paths.promptsDir, 'roles'), { recursive: true });

        const created: string[] = [];
        const basePath = join(paths.promptsDir, 'base.md');
        if (await writeIfMissing(basePath, BASE_PROMPT)) created.push(basePath);
        const rolePath = join(paths.promptsDir, 'roles', `${DEFAULT_ROLE}.md`);
        if (await writeIfMissing(rolePath, `${DEFAULT_ROLE_PROMPT}\n`)) created.push(rolePath);

        console.log(`Config: ${getConfigPath(paths)}`);
        for (const path of created) console.log(chalk.dim(`  created ${path}`));
        console.log(chalk.green(`\nWork dir ${paths.root} is ready.`));
      } catch (err) {
        reportError(err);
      }
    });
}
