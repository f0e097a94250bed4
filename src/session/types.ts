/**
 * What a session runs. `argv[0]` is the program; the rest are passed to it
 * verbatim, never through a shell.
 */
export interface LaunchSpec {
  argv: string[];
  /** Start directory of the session. */
  cwd?: string;
  /** Variables set in the session environment. */
  env?: Record<string, string>;
}

/**
 * Gateway to a terminal multiplexer's session table.
 * Implementations: TmuxSessionManager (real), InMemorySessionManager (tests).
 */
export interface SessionManager {
  /**
   * Start a detached session. Succeeds without effect when a session with
   * this name already exists; throws SessionError on any other failure.
   */
  create(name: string, launch: LaunchSpec): Promise<void>;

  /** Never throws; an unreachable multiplexer counts as "no session". */
  exists(name: string): Promise<boolean>;

  /** Best-effort; never throws, also when the session is already gone. */
  kill(name: string): Promise<void>;

  /** Flash a short notice in a live session. Throws SessionError if it is not accepted. */
  signal(name: string, text: string): Promise<void>;
}

export const WORKER_SESSION_PREFIX = 'worker-';

export function workerSessionName(agent: string): string {
  return `${WORKER_SESSION_PREFIX}${agent}`;
}
