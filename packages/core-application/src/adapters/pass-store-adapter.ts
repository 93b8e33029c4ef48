import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

import {
  formatEntryId,
  joinPath,
  parseEntryPath,
  renamedEntryId,
  sortEntryIds,
  type EntryId,
} from "@passdeck/core-domain";

import type { Logger } from "../ports/logger";
import type { StoreAdapter } from "../ports/store-adapter";
import { describeError } from "../application/errors";
import { isHiddenName } from "./hidden-ignore";
import { runPassChecked, type PassRunner } from "./pass-cli";

export const ENTRY_EXTENSION = ".gpg";

export type PassStoreAdapterOptions = {
  storeDir: string;
  runner: PassRunner;
  logger: Logger;
};

/**
 * Store adapter for a `pass` directory tree. Listing, moving, renaming,
 * removing and pruning work on the files directly; anything that needs
 * the plaintext (insert, edit, copy) goes through the `pass` command.
 */
export class PassStoreAdapter implements StoreAdapter {
  private readonly root: string;
  private readonly runner: PassRunner;
  private readonly logger: Logger;

  constructor(options: PassStoreAdapterOptions) {
    this.root = path.resolve(options.storeDir);
    this.runner = options.runner;
    this.logger = options.logger;
  }

  private entryFile(id: EntryId): string {
    return path.join(this.root, ...formatEntryId(id).split("/")) + ENTRY_EXTENSION;
  }

  private storePath(relative: string): string {
    const rel = joinPath(relative);
    return rel.length > 0 ? path.join(this.root, ...rel.split("/")) : this.root;
  }

  private async pathExists(abs: string): Promise<boolean> {
    try {
      await fs.stat(abs);
      return true;
    } catch {
      return false;
    }
  }

  private async collectEntries(current: string): Promise<string[]> {
    const dir = this.storePath(current);

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.logger.debug("Skipping unreadable directory", { dir, error: describeError(err) });
      return [];
    }

    const found: string[] = [];

    for (const entry of entries) {
      if (isHiddenName(entry.name)) continue;

      const rel = current ? `${current}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        found.push(...(await this.collectEntries(rel)));
      } else if (entry.isFile() && entry.name.endsWith(ENTRY_EXTENSION)) {
        found.push(rel.slice(0, -ENTRY_EXTENSION.length));
      }
    }

    return found;
  }

  async listEntries(): Promise<EntryId[]> {
    // an unreadable root is an error, not an empty store
    await fs.access(this.root);

    const paths = await this.collectEntries("");
    return sortEntryIds(paths.map(parseEntryPath));
  }

  async exists(id: EntryId): Promise<boolean> {
    return this.pathExists(this.entryFile(id));
  }

  async hasConflict(ids: readonly EntryId[], destination: string, keepCategory: boolean): Promise<boolean> {
    const targets = new Set<string>();

    for (const id of ids) {
      const target = keepCategory
        ? joinPath(destination, id.category, id.name)
        : joinPath(destination, id.name);

      // two entries of the same batch landing on one path
      if (targets.has(target)) return true;
      targets.add(target);

      if (await this.pathExists(this.storePath(target) + ENTRY_EXTENSION)) return true;
    }

    return false;
  }

  async move(id: EntryId, destinationDir: string): Promise<boolean> {
    const source = this.entryFile(id);
    const targetDir = this.storePath(destinationDir);
    const target = path.join(targetDir, id.name + ENTRY_EXTENSION);

    return this.relocate(source, target, { entry: formatEntryId(id), destination: destinationDir });
  }

  async rename(id: EntryId, newName: string): Promise<boolean> {
    const source = this.entryFile(id);
    const target = this.entryFile(renamedEntryId(id, newName));

    return this.relocate(source, target, { entry: formatEntryId(id), newName });
  }

  async remove(id: EntryId): Promise<boolean> {
    try {
      await fs.rm(this.entryFile(id));
      return true;
    } catch (err) {
      this.logger.debug("Remove failed", { entry: formatEntryId(id), error: describeError(err) });
      return false;
    }
  }

  async insert(id: EntryId, secret: string, secondary: string): Promise<boolean> {
    if (await this.exists(id)) return false;

    const input = secondary ? `${secret}\n${secondary}\n` : `${secret}\n`;
    try {
      await runPassChecked(this.runner, {
        args: ["insert", "--multiline", formatEntryId(id)],
        input,
      });
      return true;
    } catch (err) {
      this.logger.debug("Insert failed", { entry: formatEntryId(id), error: describeError(err) });
      return false;
    }
  }

  async pruneEmptyDirectories(): Promise<void> {
    await this.pruneBelow(this.root);
  }

  async edit(id: EntryId): Promise<void> {
    const result = await this.runner({ args: ["edit", formatEntryId(id)], interactive: true });
    if (result.exitCode !== 0) {
      this.logger.warn("Editor exited with an error", {
        entry: formatEntryId(id),
        exitCode: result.exitCode,
      });
    }
  }

  async copyField(id: EntryId, line: number): Promise<number> {
    const result = await this.runner({ args: ["show", `-c${line}`, formatEntryId(id)] });
    if (result.exitCode !== 0) {
      this.logger.debug("Copy failed", {
        entry: formatEntryId(id),
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
    }
    return result.exitCode ?? 1;
  }

  private async relocate(source: string, target: string, meta: Record<string, string>): Promise<boolean> {
    // never overwrite: the conflict check may be stale by now
    if (await this.pathExists(target)) {
      this.logger.debug("Target already exists", { ...meta, target });
      return false;
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.rename(source, target);
      return true;
    } catch (err) {
      this.logger.debug("Relocation failed", { ...meta, error: describeError(err) });
      return false;
    }
  }

  private async pruneBelow(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.logger.debug("Prune skipped directory", { dir, error: describeError(err) });
      return;
    }

    for (const entry of entries) {
      if (!entry.isDirectory() || isHiddenName(entry.name)) continue;

      const child = path.join(dir, entry.name);
      await this.pruneBelow(child);

      try {
        const remaining = await fs.readdir(child);
        if (remaining.length === 0) await fs.rmdir(child);
      } catch (err) {
        this.logger.debug("Prune failed", { dir: child, error: describeError(err) });
      }
    }
  }
}
