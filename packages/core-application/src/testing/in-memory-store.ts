import {
  formatEntryId,
  joinPath,
  parseEntryPath,
  renamedEntryId,
  sortEntryIds,
  type EntryId,
} from "@passdeck/core-domain";

import type { StoreAdapter } from "../ports/store-adapter";

/**
 * StoreAdapter over a set of entry paths, for tests. Entries listed in
 * `failing` refuse every mutation; `beforeMutation` lets a test hold a
 * mutation half-way.
 */
export class InMemoryStore implements StoreAdapter {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();
  copyExitCode = 0;
  beforeMutation: (() => Promise<void>) | null = null;
  onEdit: ((id: EntryId) => void) | null = null;

  private readonly entries = new Set<string>();

  constructor(paths: string[] = []) {
    for (const p of paths) this.entries.add(p);
  }

  add(path: string): void {
    this.entries.add(path);
  }

  delete(path: string): void {
    this.entries.delete(path);
  }

  paths(): string[] {
    return sortEntryIds([...this.entries].map(parseEntryPath)).map(formatEntryId);
  }

  async listEntries(): Promise<EntryId[]> {
    return sortEntryIds([...this.entries].map(parseEntryPath));
  }

  async exists(id: EntryId): Promise<boolean> {
    return this.entries.has(formatEntryId(id));
  }

  async hasConflict(ids: readonly EntryId[], destination: string, keepCategory: boolean): Promise<boolean> {
    const targets = new Set<string>();
    for (const id of ids) {
      const target = keepCategory
        ? joinPath(destination, id.category, id.name)
        : joinPath(destination, id.name);
      if (targets.has(target) || this.entries.has(target)) return true;
      targets.add(target);
    }
    return false;
  }

  async move(id: EntryId, destinationDir: string): Promise<boolean> {
    const source = formatEntryId(id);
    this.calls.push(`move ${source} -> ${destinationDir}`);
    return this.relocate(source, joinPath(destinationDir, id.name));
  }

  async rename(id: EntryId, newName: string): Promise<boolean> {
    const source = formatEntryId(id);
    this.calls.push(`rename ${source} -> ${newName}`);
    return this.relocate(source, formatEntryId(renamedEntryId(id, newName)));
  }

  async remove(id: EntryId): Promise<boolean> {
    const source = formatEntryId(id);
    this.calls.push(`remove ${source}`);
    await this.beforeMutation?.();

    if (this.failing.has(source) || !this.entries.has(source)) return false;
    this.entries.delete(source);
    return true;
  }

  async insert(id: EntryId, _secret: string, secondary: string): Promise<boolean> {
    const target = formatEntryId(id);
    this.calls.push(secondary ? `insert ${target} (${secondary})` : `insert ${target}`);

    if (this.failing.has(target) || this.entries.has(target)) return false;
    this.entries.add(target);
    return true;
  }

  async pruneEmptyDirectories(): Promise<void> {
    this.calls.push("prune");
  }

  async edit(id: EntryId): Promise<void> {
    this.calls.push(`edit ${formatEntryId(id)}`);
    this.onEdit?.(id);
  }

  async copyField(id: EntryId, line: number): Promise<number> {
    this.calls.push(`copy ${line} ${formatEntryId(id)}`);
    return this.copyExitCode;
  }

  private async relocate(source: string, target: string): Promise<boolean> {
    await this.beforeMutation?.();

    if (this.failing.has(source) || !this.entries.has(source) || this.entries.has(target)) {
      return false;
    }
    this.entries.delete(source);
    this.entries.add(target);
    return true;
  }
}
