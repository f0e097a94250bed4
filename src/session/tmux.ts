import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { DuplicateSessionError, SessionError, errorMessage } from '../errors.js';
import type { LaunchSpec, SessionManager } from './types.js';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs a program with an argument vector; rejects on a non-zero exit. */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, { encoding: 'utf-8' });
  return { stdout, stderr };
};

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string' && stderr.trim()) return stderr.trim();
  }
  return errorMessage(err);
}

export class TmuxSessionManager implements SessionManager {
  constructor(
    private readonly binary = 'tmux',
    private readonly run: CommandRunner = execFileRunner,
  ) {}

  /**
   * `new-session` with the command given as separate arguments: tmux execs
   * them directly instead of handing a string to the shell.
   */
  static newSessionArgs(name: string, launch: LaunchSpec): string[] {
    const args = ['new-session', '-d', '-s', name];
    if (launch.cwd) args.push('-c', launch.cwd);
    for (const [key, value] of Object.entries(launch.env ?? {})) {
      args.push('-e', `${key}=${value}`);
    }
    args.push('--', ...launch.argv);
    return args;
  }

  /** Arguments for an interactive `attach-session`; the caller runs it with an inherited terminal. */
  static attachArgs(name: string): string[] {
    return ['attach-session', '-t', `=${name}`];
  }

  private async tmux(session: string, args: string[]): Promise<string> {
    try {
      const { stdout } = await this.run(this.binary, args);
      return stdout.trim();
    } catch (err) {
      const detail = stderrOf(err);
      if (detail.includes('duplicate session')) throw new DuplicateSessionError(session);
      throw new SessionError(session, detail, { cause: err });
    }
  }

  async create(name: string, launch: LaunchSpec): Promise<void> {
    if (launch.argv.length === 0) {
      throw new SessionError(name, 'empty command');
    }
    try {
      await this.tmux(name, TmuxSessionManager.newSessionArgs(name, launch));
    } catch (err) {
      if (err instanceof DuplicateSessionError) return;
      throw err;
    }
  }

  async exists(name: string): Promise<boolean> {
    try {
      await this.run(this.binary, ['has-session', '-t', `=${name}`]);
      return true;
    } catch {
      return false;
    }
  }

  async kill(name: string): Promise<void> {
    try {
      await this.run(this.binary, ['kill-session', '-t', `=${name}`]);
    } catch {
      // Already gone, or no server running
    }
  }

  async signal(name: string, text: string): Promise<void> {
    await this.tmux(name, ['display-message', '-t', `=${name}`, text]);
  }
}
