export { loadConfig, saveConfig, ensureStateDir, getConfigPath, applyConfigValue, CONFIG_KEYS } from './loader.js';
export {
  resolvePaths,
  workerDir,
  taskLogDir,
  taskLogFile,
  STATE_DIR_NAME,
} from './paths.js';
export type { WorkspacePaths } from './paths.js';
