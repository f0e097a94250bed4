export { Worker } from './worker.js';
export type { WorkerEnv, SpawnRequest, SpawnResult } from './worker.js';
export { EngineRegistry, BUILTIN_ENGINES, FALLBACK_ENGINE } from './engines.js';
export type { ResolvedEngine } from './engines.js';
export { buildLaunchSpec, pathEnv, TEE_SCRIPT } from './launch.js';
export {
  composeMission,
  buildMission,
  loadBasePrompt,
  loadRolePrompt,
  loadPrompt,
  DEFAULT_ROLE,
  DEFAULT_ROLE_PROMPT,
  DEFAULT_ADMIN_PROMPT,
  buildAdminBrief,
  composeAdminBrief,
} from './mission.js';
