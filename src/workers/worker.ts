import { mkdir, rm } from 'node:fs/promises';
import { taskLogDir, taskLogFile, workerDir } from '../config/index.js';
import type { WorkspacePaths } from '../config/index.js';
import { workerSessionName } from '../session/index.js';
import type { SessionManager } from '../session/index.js';
import type { EngineRegistry } from './engines.js';
import { buildLaunchSpec } from './launch.js';
import { composeMission, DEFAULT_ROLE } from './mission.js';

export interface WorkerEnv {
  paths: WorkspacePaths;
  sessions: SessionManager;
  engines: EngineRegistry;
  sentinel: string;
  extraPath?: string[];
}

export interface SpawnRequest {
  taskId: string;
  agent: string;
  /** Engine tag; unknown tags fall back to the registry default. */
  engine?: string;
  role?: string;
}

export interface SpawnResult {
  session: string;
  engine: string;
  /** Set when `engine` differs from the tag that was asked for. */
  requestedEngine?: string;
  workDir: string;
  logFile: string;
  /** A session with this name was already live; nothing new was started. */
  alreadyRunning: boolean;
}

async function ensureDir(path: string): Promise<void> {
  // Launch proceeds even if this fails; tee reports a missing log dir in the session
  await mkdir(path, { recursive: true }).catch(() => undefined);
}

/**
 * One agent name bound to one session, one working directory and one
 * log file per task.
 */
export class Worker {
  readonly session: string;
  readonly workDir: string;
  readonly logFile: string;

  constructor(
    private readonly env: WorkerEnv,
    readonly request: SpawnRequest,
  ) {
    this.session = workerSessionName(request.agent);
    this.workDir = workerDir(env.paths, request.agent);
    this.logFile = taskLogFile(env.paths, request.taskId, request.agent);
  }

  /**
   * Start the agent. A second spawn for a live agent is a no-op; a
   * gateway failure propagates as SessionError.
   */
  async spawn(): Promise<SpawnResult> {
    const { paths, sessions, engines, sentinel, extraPath } = this.env;
    const { taskId, engine, role = DEFAULT_ROLE } = this.request;

    await ensureDir(this.workDir);

    const mission = await composeMission({ promptsDir: paths.promptsDir, role, taskId, sentinel });
    const resolved = engines.resolve(engine, mission);

    await ensureDir(taskLogDir(paths, taskId));

    const launch = buildLaunchSpec({
      workDir: this.workDir,
      logFile: this.logFile,
      engineArgv: resolved.argv,
      extraPath,
    });

    const alreadyRunning = await sessions.exists(this.session);
    await sessions.create(this.session, launch);

    return {
      session: this.session,
      engine: resolved.engine,
      requestedEngine: resolved.requested,
      workDir: this.workDir,
      logFile: this.logFile,
      alreadyRunning,
    };
  }

  /**
   * Kill the agent's session and delete its working directory. Safe to call
   * repeatedly; logs are left in place.
   */
  static async nuke(
    env: Pick<WorkerEnv, 'paths' | 'sessions'>,
    agent: string,
  ): Promise<void> {
    await env.sessions.kill(workerSessionName(agent));
    await rm(workerDir(env.paths, agent), { recursive: true, force: true }).catch(() => undefined);
  }
}
