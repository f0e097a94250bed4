import type { Command } from 'commander';
import chalk from 'chalk';
import { ZodError } from 'zod';
import { createContext } from '../context.js';
import type { CrewContext } from '../context.js';
import { errorMessage } from '../errors.js';
import type { TaskStatus } from '../tasks/index.js';

/** Context for the work dir named by the global `--dir` option, or the cwd. */
export async function contextFor(cmd: Command): Promise<CrewContext> {
  const { dir } = cmd.optsWithGlobals<{ dir?: string }>();
  return createContext(dir ?? process.cwd());
}

export function formatZodError(err: ZodError): string[] {
  return err.issues.map((issue) => `Error: ${issue.path.join('.') || 'input'}: ${issue.message}`);
}

/** Print a failed action and mark the process as failed. */
export function reportError(err: unknown, prefix?: string): void {
  const lines = err instanceof ZodError ? formatZodError(err) : [errorMessage(err)];
  for (const line of lines) console.error(chalk.red(prefix ? `${prefix}: ${line}` : line));
  process.exitCode = 1;
}

export function statusColor(s: TaskStatus): string {
  switch (s) {
    case 'closed': return chalk.green(s);
    case 'in_progress': return chalk.yellow(s);
    default: return chalk.cyan(s);
  }
}
