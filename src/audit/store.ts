import type { AuditEntry, AuditQuery } from './types.js';

/**
 * Append-only audit log store interface.
 */
export interface AuditStore {
  /** Append a new audit entry. */
  append(entry: AuditEntry): Promise<void>;

  /** Query audit entries, newest first. */
  query(query: AuditQuery): Promise<AuditEntry[]>;

  /** Get a single entry by ID. */
  get(id: string): Promise<AuditEntry | undefined>;
}
