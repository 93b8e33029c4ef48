import type { EntryId } from "@passdeck/core-domain";

/**
 * Boundary to the password store. Every mutation reports its own
 * success; a failed item never aborts the others in a batch.
 */
export interface StoreAdapter {
  /** Current entries, hidden paths excluded, sorted by compareEntryIds. */
  listEntries(): Promise<EntryId[]>;

  exists(id: EntryId): Promise<boolean>;

  /**
   * True if moving `ids` into `destination` would land on an occupied path.
   * With `keepCategory` the target is destination/category/name, otherwise
   * destination/name.
   */
  hasConflict(ids: readonly EntryId[], destination: string, keepCategory: boolean): Promise<boolean>;

  /** Moves the entry into the directory `destinationDir` (relative to the store root). */
  move(id: EntryId, destinationDir: string): Promise<boolean>;
  remove(id: EntryId): Promise<boolean>;
  rename(id: EntryId, newName: string): Promise<boolean>;
  insert(id: EntryId, secret: string, secondary: string): Promise<boolean>;

  /** Best effort; failures are ignored. */
  pruneEmptyDirectories(): Promise<void>;

  /** Hands the terminal to the external editor until it exits. */
  edit(id: EntryId): Promise<void>;

  /** Copies line `line` of the entry to the clipboard; resolves to the exit code. */
  copyField(id: EntryId, line: number): Promise<number>;
}
