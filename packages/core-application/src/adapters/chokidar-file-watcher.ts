import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "node:path";

import type {
  FileChangeEvent,
  FileChangeTarget,
  FileChangeType,
  FileWatcher,
  FileWatcherOptions,
} from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import { describeError } from "../application/errors";

export type ChokidarEventName = "add" | "addDir" | "change" | "unlink" | "unlinkDir";

const EVENT_KINDS: Record<ChokidarEventName, { type: FileChangeType; target: FileChangeTarget }> = {
  add: { type: "created", target: "file" },
  addDir: { type: "created", target: "directory" },
  change: { type: "modified", target: "file" },
  unlink: { type: "deleted", target: "file" },
  unlinkDir: { type: "deleted", target: "directory" },
};

/**
 * Maps a raw chokidar event to a store change. File events only count for
 * names ending in `entryExtension` (when one is given); directory events
 * always count, since a moved category arrives as unlinkDir + addDir.
 */
export function toChangeEvent(
  eventName: ChokidarEventName,
  filePath: string,
  entryExtension?: string,
  now: Date = new Date()
): FileChangeEvent | null {
  const { type, target } = EVENT_KINDS[eventName];
  if (target === "file" && entryExtension && !filePath.endsWith(entryExtension)) return null;

  return { type, target, path: path.resolve(filePath), occurredAt: now };
}

export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: FileChangeEvent) => void) | null = null;

  constructor(private readonly logger?: Logger) {}

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  /** Resolves once the initial scan is done, so no change is missed after it. */
  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const rootDir = path.resolve(options.rootDir);
    const watcher = chokidar.watch(rootDir, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 250,
        pollInterval: 50,
      },
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });
    this.watcher = watcher;

    watcher.on("all", (eventName, p) => {
      const event = toChangeEvent(eventName, p, options.entryExtension);
      if (event) this.handler?.(event);
    });
    watcher.on("error", (err) => {
      this.logger?.warn("Store watcher error", { rootDir, error: describeError(err) });
    });

    await new Promise<void>((resolve) => {
      watcher.once("ready", () => resolve());
    });
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
