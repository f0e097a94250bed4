import { delimiter } from 'node:path';
import type { LaunchSpec } from '../session/index.js';

/**
 * Fixed wrapper run by `sh -c`. Everything that varies (directory, log path,
 * the engine and its mission) arrives as positional parameters, so no value
 * is ever parsed as shell syntax.
 */
export const TEE_SCRIPT = 'cd "$1" || exit 1; log="$2"; shift 2; "$@" 2>&1 | tee -a "$log"';

/** Session environment that appends `extraPath` to PATH; undefined when there is nothing to add. */
export function pathEnv(extraPath?: string[], basePath?: string): Record<string, string> | undefined {
  if (!extraPath?.length) return undefined;
  const base = basePath ?? process.env.PATH ?? '';
  return { PATH: [base, ...extraPath].filter(Boolean).join(delimiter) };
}

export function buildLaunchSpec(opts: {
  workDir: string;
  logFile: string;
  engineArgv: string[];
  extraPath?: string[];
  basePath?: string;
}): LaunchSpec {
  const spec: LaunchSpec = {
    argv: ['sh', '-c', TEE_SCRIPT, 'crewctl-worker', opts.workDir, opts.logFile, ...opts.engineArgv],
    cwd: opts.workDir,
  };
  const env = pathEnv(opts.extraPath, opts.basePath);
  if (env) spec.env = env;
  return spec;
}
