import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from '../errors.js';
import type { TaskStore } from '../tasks/store.js';
import { scanOnce } from './scanner.js';
import type { ScanResult } from './scanner.js';

export interface MonitorOptions {
  logRoot: string;
  sentinel: string;
  tasks: TaskStore;
  intervalMs: number;
  /** Progress lines; defaults to silent. */
  log?: (msg: string) => void;
  onTick?: (result: ScanResult) => void;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Completion detector. Polls the log tree on a fixed cadence until the
 * signal aborts; the wait between ticks ends as soon as it does.
 */
export class Monitor {
  constructor(private readonly opts: MonitorOptions) {}

  tick(): Promise<ScanResult> {
    const { logRoot, sentinel, tasks } = this.opts;
    return scanOnce({ logRoot, sentinel, tasks });
  }

  async run(signal?: AbortSignal): Promise<void> {
    const log = this.opts.log ?? (() => {});
    log(`watching ${this.opts.logRoot} every ${this.opts.intervalMs / 1000}s`);

    while (!signal?.aborted) {
      try {
        const result = await this.tick();
        for (const id of result.closed) log(`task ${id} closed (sentinel found)`);
        this.opts.onTick?.(result);
      } catch (err) {
        // A bad tick (store unreadable, say) must not end the watch
        log(`scan failed: ${errorMessage(err)}`);
      }

      try {
        await sleep(this.opts.intervalMs, undefined, { signal });
      } catch (err) {
        if (isAbort(err)) break;
        throw err;
      }
    }
    log('stopped');
  }
}
