import { join } from 'node:path';
import { z } from 'zod';
import { readJsonFile, writeJsonFile } from '../json-file.js';
import { AuditEntrySchema, AuditQuerySchema } from './types.js';
import type { AuditEntry, AuditQuery } from './types.js';
import type { AuditStore } from './store.js';

const AUDIT_FILE = 'audit.json';

const AuditFileSchema = z.array(AuditEntrySchema);

export class JsonAuditStore implements AuditStore {
  private readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = join(stateDir, AUDIT_FILE);
  }

  private async readAll(): Promise<AuditEntry[]> {
    return readJsonFile(this.filePath, AuditFileSchema, []);
  }

  private async writeAll(entries: AuditEntry[]): Promise<void> {
    await writeJsonFile(this.filePath, entries);
  }

  async append(entry: AuditEntry): Promise<void> {
    const entries = await this.readAll();
    entries.push(AuditEntrySchema.parse(entry));
    await this.writeAll(entries);
  }

  async query(input: AuditQuery): Promise<AuditEntry[]> {
    const query = AuditQuerySchema.parse(input);
    let entries = await this.readAll();

    if (query.action) entries = entries.filter((e) => e.action === query.action);
    if (query.target) entries = entries.filter((e) => e.target === query.target);
    if (query.actor) entries = entries.filter((e) => e.actor === query.actor);
    const since = query.since;
    if (since) entries = entries.filter((e) => e.timestamp >= since);

    // Most recent first; appends are chronological, so ties keep reverse file order
    entries = entries
      .map((e, i) => ({ e, i }))
      .sort((a, b) => b.e.timestamp.localeCompare(a.e.timestamp) || b.i - a.i)
      .map(({ e }) => e);

    return entries.slice(0, query.limit);
  }

  async get(id: string): Promise<AuditEntry | undefined> {
    const entries = await this.readAll();
    return entries.find((e) => e.id === id);
  }
}
