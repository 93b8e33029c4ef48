import type { FileWatcher } from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import type { Session } from "../ports/session";
import { describeError } from "../application/errors";
import type { ReconcileResult } from "./reconcile";

export const DEFAULT_RESYNC_INTERVAL_MS = 5000;
export const DEFAULT_WATCH_DEBOUNCE_MS = 250;

export type ResyncSchedulerOptions = {
  logger: Logger;
  intervalMs?: number;
  debounceMs?: number;
  onResync?: (result: ReconcileResult) => void;
};

type Refreshable = {
  refresh(): Promise<ReconcileResult>;
};

/**
 * Periodic resync plus debounced resyncs on filesystem events. A tick that
 * arrives while the previous one is still running, or while paused, is
 * dropped; the next interval picks the changes up.
 */
export class ResyncScheduler {
  private interval: ReturnType<typeof setInterval> | null = null;
  private debounce: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private paused = false;

  private readonly intervalMs: number;
  private readonly debounceMs: number;

  constructor(
    private readonly target: Refreshable,
    private readonly options: ResyncSchedulerOptions
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_RESYNC_INTERVAL_MS;
    this.debounceMs = options.debounceMs ?? DEFAULT_WATCH_DEBOUNCE_MS;
  }

  get active(): boolean {
    return this.interval !== null;
  }

  async start(): Promise<void> {
    if (this.interval) return;

    this.interval = setInterval(() => {
      void this.tick();
    }, this.intervalMs);

    await this.tick();
  }

  stop(): void {
    if (this.interval) clearInterval(this.interval);
    this.interval = null;
    this.clearDebounce();
  }

  pause(): void {
    this.paused = true;
    this.clearDebounce();
  }

  resume(): void {
    this.paused = false;
  }

  notifyChange(): void {
    if (!this.interval || this.paused) return;

    this.clearDebounce();
    this.debounce = setTimeout(() => {
      this.debounce = null;
      void this.tick();
    }, this.debounceMs);
  }

  attach(watcher: FileWatcher): void {
    watcher.onEvent((event) => {
      this.options.logger.debug("Store changed", {
        type: event.type,
        target: event.target,
        path: event.path,
      });
      this.notifyChange();
    });
  }

  /** Runs one resync now; false if it was skipped or failed. */
  async tick(): Promise<boolean> {
    if (this.paused || this.running) return false;

    this.running = true;
    try {
      const result = await this.target.refresh();
      this.options.onResync?.(result);
      return true;
    } catch (err) {
      this.options.logger.error("Resync failed", { error: describeError(err) });
      return false;
    } finally {
      this.running = false;
    }
  }

  private clearDebounce() {
    if (this.debounce) clearTimeout(this.debounce);
    this.debounce = null;
  }
}

/** Session whose suspension also holds back scheduled resyncs. */
export function createSchedulerSession(scheduler: ResyncScheduler): Session {
  return {
    async suspend<T>(work: () => Promise<T>): Promise<T> {
      scheduler.pause();
      try {
        return await work();
      } finally {
        scheduler.resume();
      }
    },
  };
}
