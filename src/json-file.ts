import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { PersistenceError, errorMessage } from './errors.js';

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read and validate a JSON file. A missing file yields `fallback`; anything
 * else that goes wrong is a PersistenceError.
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  fallback: z.output<S>,
): Promise<z.output<S>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return fallback;
    throw new PersistenceError(path, `Cannot read: ${errorMessage(err)}`, { cause: err });
  }
  try {
    return schema.parse(JSON.parse(raw));
  } catch (err) {
    throw new PersistenceError(path, `Invalid contents: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Write through a temp file and rename it into place, so a concurrent
 * reader sees either the old file or the new one.
 */
export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  const tmp = `${path}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    await rename(tmp, path);
  } catch (err) {
    throw new PersistenceError(path, `Cannot write: ${errorMessage(err)}`, { cause: err });
  }
}
