import { SessionError } from '../errors.js';
import type { LaunchSpec, SessionManager } from './types.js';

/**
 * Process-table stand-in: sessions are map entries, nothing is executed.
 */
export class InMemorySessionManager implements SessionManager {
  readonly sessions = new Map<string, LaunchSpec>();
  readonly notices: Array<{ name: string; text: string }> = [];
  /** Names for which `create` fails, to exercise error paths. */
  readonly failing = new Set<string>();

  async create(name: string, launch: LaunchSpec): Promise<void> {
    if (this.failing.has(name)) throw new SessionError(name, 'server exited unexpectedly');
    if (this.sessions.has(name)) return;
    this.sessions.set(name, launch);
  }

  async exists(name: string): Promise<boolean> {
    return this.sessions.has(name);
  }

  async kill(name: string): Promise<void> {
    this.sessions.delete(name);
  }

  async signal(name: string, text: string): Promise<void> {
    if (!this.sessions.has(name)) throw new SessionError(name, "can't find session");
    this.notices.push({ name, text });
  }
}
