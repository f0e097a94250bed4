export { TmuxSessionManager, execFileRunner } from './tmux.js';
export type { CommandRunner, CommandResult } from './tmux.js';
export { InMemorySessionManager } from './memory.js';
export { workerSessionName, WORKER_SESSION_PREFIX } from './types.js';
export type { LaunchSpec, SessionManager } from './types.js';
