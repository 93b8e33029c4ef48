// Public API of the core-application package: ports, value objects,
// services and the node adapters. Test doubles live under ./testing.

// Ports (interfaces)
export type { LogLevel, LogMeta, Logger } from "./ports/logger";
export type { StoreAdapter } from "./ports/store-adapter";
export type { Prompter } from "./ports/prompter";
export type { Session } from "./ports/session";
export { passthroughSession } from "./ports/session";
export type {
  FileChangeType,
  FileChangeTarget,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";

// Value objects
export type { InsertRequest, MoveRequest } from "./value-objects/requests";
export type { Notice, NoticeSeverity, OperationResult } from "./value-objects/operation-result";
export { notice } from "./value-objects/operation-result";

// Services
export type { ReconcileResult } from "./services/reconcile";
export { clampCursor, reconcileRows } from "./services/reconcile";
export { EntryTable } from "./services/entry-table";
export { OperationQueue } from "./services/operation-queue";
export type { TableCoordinatorDeps } from "./services/table-coordinator";
export { TableCoordinator } from "./services/table-coordinator";
export type { ResyncSchedulerOptions } from "./services/resync-scheduler";
export {
  DEFAULT_RESYNC_INTERVAL_MS,
  DEFAULT_WATCH_DEBOUNCE_MS,
  ResyncScheduler,
  createSchedulerSession,
} from "./services/resync-scheduler";
export { InteractiveActions } from "./services/interactive-actions";
export type { RankOptions, RankedEntry } from "./services/entry-ranking";
export { rankEntries } from "./services/entry-ranking";
export type { ValidationResult } from "./services/path-validation";
export {
  validateDirectoryPath,
  validateEntryName,
  validateFilePath,
  validateSecret,
} from "./services/path-validation";
export type { PasswordOptions } from "./services/password-generator";
export {
  DEFAULT_PASSWORD_LENGTH,
  generatePassword,
  passwordAlphabet,
} from "./services/password-generator";

// Application
export type { EnvSource, LoadConfigOptions, PassdeckConfig } from "./application/config";
export { loadConfig, storeExists } from "./application/config";
export { ConfigError, StoreCommandError, describeError } from "./application/errors";

// Node adapters
export { ConsoleLogger } from "./adapters/console-logger";
export { ChokidarFileWatcher } from "./adapters/chokidar-file-watcher";
export { createHiddenPathIgnore, isHiddenName } from "./adapters/hidden-ignore";
export type { PassInvocation, PassResult, PassRunner } from "./adapters/pass-cli";
export { createPassRunner, runPassChecked } from "./adapters/pass-cli";
export type { PassStoreAdapterOptions } from "./adapters/pass-store-adapter";
export { ENTRY_EXTENSION, PassStoreAdapter } from "./adapters/pass-store-adapter";
