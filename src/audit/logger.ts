import { randomUUID } from 'node:crypto';
import { errorMessage } from '../errors.js';
import type { AuditStore } from './store.js';
import type { AuditAction, AuditEntry } from './types.js';

let _store: AuditStore | undefined;

export function getAuditStore(): AuditStore {
  if (!_store) {
    throw new Error('Audit store not configured; call setAuditStore() first');
  }
  return _store;
}

export function setAuditStore(store: AuditStore | undefined): void {
  _store = store;
}

/** Overridable so tests can silence or capture audit write failures. */
let onAuditFailure: (err: unknown, entry: AuditEntry) => void = (err, entry) => {
  console.error(`[audit] failed to record ${entry.action} on ${entry.target}: ${errorMessage(err)}`);
};

export function setAuditFailureHandler(handler: (err: unknown, entry: AuditEntry) => void): void {
  onAuditFailure = handler;
}

/**
 * Log an audit event. Never throws: the trail is advisory, and a failed
 * write must not undo or block the action it describes.
 */
export async function audit(
  action: AuditAction,
  target: string,
  opts: {
    detail?: Record<string, unknown>;
    success?: boolean;
    error?: string;
    actor?: string;
  } = {},
): Promise<void> {
  const entry: AuditEntry = {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    action,
    actor: opts.actor ?? 'cli',
    target,
    detail: opts.detail,
    success: opts.success ?? true,
    error: opts.error,
  };

  try {
    await getAuditStore().append(entry);
  } catch (err) {
    onAuditFailure(err, entry);
  }
}
