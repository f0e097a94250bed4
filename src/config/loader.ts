import { join } from 'node:path';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { isNotFound } from '../json-file.js';
import { ConfigSchema, DEFAULT_CONFIG } from '../types/index.js';
import { EngineRegistry } from '../workers/engines.js';
import type { Config } from '../types/index.js';
import type { WorkspacePaths } from './paths.js';

const CONFIG_FILE_NAME = 'config.json';

export async function ensureStateDir(paths: WorkspacePaths): Promise<string> {
  await mkdir(paths.stateDir, { recursive: true });
  return paths.stateDir;
}

export function getConfigPath(paths: WorkspacePaths): string {
  return join(paths.stateDir, CONFIG_FILE_NAME);
}

export async function loadConfig(paths: WorkspacePaths): Promise<Config> {
  await ensureStateDir(paths);
  const configPath = getConfigPath(paths);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (!isNotFound(err)) throw err;
    // First run: persist the defaults so they can be edited
    await saveConfig(paths, DEFAULT_CONFIG);
    return DEFAULT_CONFIG;
  }
  return ConfigSchema.parse(JSON.parse(raw));
}

export async function saveConfig(paths: WorkspacePaths, config: Config): Promise<void> {
  await ensureStateDir(paths);
  const validated = ConfigSchema.parse(config);
  await writeFile(getConfigPath(paths), JSON.stringify(validated, null, 2) + '\n', 'utf-8');
}

export const CONFIG_KEYS = Object.keys(ConfigSchema.shape);

/**
 * Set one top-level key from command-line text. JSON values (numbers, arrays,
 * objects) are parsed; anything else is taken as a plain string.
 */
export function applyConfigValue(config: Config, key: string, raw: string): Config {
  if (!CONFIG_KEYS.includes(key)) {
    throw new Error(`Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    value = raw;
  }
  const next = ConfigSchema.parse({ ...config, [key]: value });
  const engines = new EngineRegistry(next.engines);
  if (!engines.has(next.defaultEngine)) {
    throw new Error(
      `Default engine "${next.defaultEngine}" is not registered. Available: ${engines.list().join(', ')}`,
    );
  }
  return next;
}
