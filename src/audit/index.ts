export { audit, getAuditStore, setAuditStore, setAuditFailureHandler } from './logger.js';
export { JsonAuditStore } from './json-store.js';
export type { AuditStore } from './store.js';
export { AuditAction, AuditEntrySchema, AuditQuerySchema } from './types.js';
export type { AuditEntry, AuditQuery } from './types.js';
