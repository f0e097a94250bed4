export { JsonCostStore } from './store.js';
export type { CostStore } from './store.js';
export { AddCostInputSchema, CostEntrySchema } from './types.js';
export type { AddCostInput, CostEntry, ModelCostSummary } from './types.js';
