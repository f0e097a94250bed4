import { JsonAuditStore, setAuditStore } from './audit/index.js';
import type { AuditStore } from './audit/index.js';
import { loadConfig, resolvePaths } from './config/index.js';
import type { WorkspacePaths } from './config/index.js';
import { JsonCostStore } from './costs/index.js';
import type { CostStore } from './costs/index.js';
import { JsonMailStore } from './mail/index.js';
import type { MailStore } from './mail/index.js';
import { TmuxSessionManager } from './session/index.js';
import type { SessionManager } from './session/index.js';
import { JsonTaskStore } from './tasks/store.js';
import type { TaskStore } from './tasks/store.js';
import type { Config } from './types/index.js';
import { EngineRegistry } from './workers/index.js';
import type { WorkerEnv } from './workers/index.js';

/** Everything a command, the dashboard or the monitor needs for one work dir. */
export interface CrewContext {
  paths: WorkspacePaths;
  config: Config;
  tasks: TaskStore;
  auditStore: AuditStore;
  mail: MailStore;
  costs: CostStore;
  sessions: SessionManager;
  engines: EngineRegistry;
}

export async function createContext(
  root: string,
  overrides: Partial<Omit<CrewContext, 'paths'>> = {},
): Promise<CrewContext> {
  const paths = resolvePaths(root);
  const config = overrides.config ?? (await loadConfig(paths));
  const auditStore = overrides.auditStore ?? new JsonAuditStore(paths.stateDir);
  setAuditStore(auditStore);

  return {
    paths,
    config,
    auditStore,
    tasks: overrides.tasks ?? new JsonTaskStore(paths.stateDir),
    mail: overrides.mail ?? new JsonMailStore(paths.stateDir),
    costs: overrides.costs ?? new JsonCostStore(paths.stateDir),
    sessions: overrides.sessions ?? new TmuxSessionManager(config.tmuxBinary),
    engines: overrides.engines ?? new EngineRegistry(config.engines, config.defaultEngine),
  };
}

export function workerEnv(ctx: CrewContext): WorkerEnv {
  return {
    paths: ctx.paths,
    sessions: ctx.sessions,
    engines: ctx.engines,
    sentinel: ctx.config.sentinel,
    extraPath: ctx.config.extraPath,
  };
}
