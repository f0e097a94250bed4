import { join } from 'node:path';
import { z } from 'zod';
import { readJsonFile, writeJsonFile } from '../json-file.js';
import { AddCostInputSchema, CostEntrySchema } from './types.js';
import type { AddCostInput, CostEntry, ModelCostSummary } from './types.js';

const CostsFileSchema = z.array(CostEntrySchema);

/** Token and spend ledger, filled in by hand or by agents reporting usage. */
export interface CostStore {
  add(input: AddCostInput): Promise<CostEntry>;
  /** Newest first. */
  list(): Promise<CostEntry[]>;
  /** Totals per model, in order of first appearance. */
  summary(): Promise<ModelCostSummary[]>;
  total(): Promise<number>;
}

export class JsonCostStore implements CostStore {
  private readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = join(stateDir, 'costs.json');
  }

  private async readAll(): Promise<CostEntry[]> {
    return readJsonFile(this.filePath, CostsFileSchema, []);
  }

  async add(input: AddCostInput): Promise<CostEntry> {
    const parsed = AddCostInputSchema.parse(input);
    const entries = await this.readAll();
    const entry: CostEntry = {
      ...parsed,
      id: entries.reduce((max, e) => Math.max(max, e.id), 0) + 1,
      timestamp: new Date().toISOString(),
    };
    entries.push(entry);
    await writeJsonFile(this.filePath, entries);
    return entry;
  }

  async list(): Promise<CostEntry[]> {
    return (await this.readAll()).reverse();
  }

  async summary(): Promise<ModelCostSummary[]> {
    const byModel = new Map<string, ModelCostSummary>();
    for (const e of await this.readAll()) {
      const row = byModel.get(e.model) ?? { model: e.model, inputTokens: 0, outputTokens: 0, costUsd: 0 };
      row.inputTokens += e.inputTokens;
      row.outputTokens += e.outputTokens;
      row.costUsd += e.costUsd;
      byModel.set(e.model, row);
    }
    return [...byModel.values()];
  }

  async total(): Promise<number> {
    return (await this.readAll()).reduce((sum, e) => sum + e.costUsd, 0);
  }
}
