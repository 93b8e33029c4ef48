export type FileChangeType = "created" | "modified" | "deleted";

/** Entries are files, categories and profiles are directories. */
export type FileChangeTarget = "file" | "directory";

export type FileChangeEvent = {
  type: FileChangeType;
  target: FileChangeTarget;
  /** Absolute path. */
  path: string;
  occurredAt: Date;
};

export type FileWatcherOptions = {
  rootDir: string;
  /** Receives absolute paths; true keeps the path (and anything below it) quiet. */
  ignore: (path: string) => boolean;
  /** When set, file events for other names are dropped. */
  entryExtension?: string;
};

export interface FileWatcher {
  start(options: FileWatcherOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: (event: FileChangeEvent) => void): void;
}
