import {
  entryIdsEqual,
  formatEntryId,
  joinPath,
  parseEntryPath,
  renamedEntryId,
  toDisplayString,
  type EntryId,
} from "@passdeck/core-domain";

import type { Logger } from "../ports/logger";
import type { StoreAdapter } from "../ports/store-adapter";
import { passthroughSession, type Session } from "../ports/session";
import type { InsertRequest, MoveRequest } from "../value-objects/requests";
import { notice, type OperationResult } from "../value-objects/operation-result";
import { describeError } from "../application/errors";
import { EntryTable } from "./entry-table";
import { OperationQueue } from "./operation-queue";
import type { ReconcileResult } from "./reconcile";
import {
  validateDirectoryPath,
  validateEntryName,
  validateFilePath,
  validateSecret,
} from "./path-validation";

export type TableCoordinatorDeps = {
  store: StoreAdapter;
  logger: Logger;
  table?: EntryTable;
  queue?: OperationQueue;
  session?: Session;
  clipTimeSeconds?: number;
};

const PASSWORD_LINE = 1;
const USERNAME_LINE = 2;

/**
 * Drives every operation that changes the store and brings the table back
 * in line afterwards. Store failures are counted and reported, never
 * thrown; the only exceptions that escape come from listing the store.
 */
export class TableCoordinator {
  readonly table: EntryTable;
  readonly queue: OperationQueue;

  private readonly store: StoreAdapter;
  private readonly logger: Logger;
  private readonly session: Session;
  private readonly clipTimeSeconds: number;

  constructor(deps: TableCoordinatorDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.table = deps.table ?? new EntryTable();
    this.queue = deps.queue ?? new OperationQueue();
    this.session = deps.session ?? passthroughSession;
    this.clipTimeSeconds = deps.clipTimeSeconds ?? 45;
  }

  refresh(): Promise<ReconcileResult> {
    return this.queue.run(() => this.resync());
  }

  deleteSelected(): Promise<OperationResult> {
    return this.queue.run(async (): Promise<OperationResult> => {
      const targets = this.table.selectedRows().map((row) => row.id);
      if (targets.length === 0) return { kind: "cancelled" };

      let failures = 0;
      for (const id of targets) {
        if (!(await this.store.remove(id))) {
          failures += 1;
          this.logger.warn("Failed to remove entry", { entry: formatEntryId(id) });
        }
      }

      await this.store.pruneEmptyDirectories();
      await this.resync();

      if (failures > 0) {
        return {
          kind: "partial_failure",
          failures,
          notice: notice("Removal failure", `Failed to remove ${failures} password(s).`, "warning"),
        };
      }

      this.logger.info("Removed entries", { count: targets.length });
      return { kind: "succeeded", notice: notice("Success!", "Removal succeeded.") };
    });
  }

  async moveSelected(request: MoveRequest): Promise<OperationResult> {
    const destination = validateDirectoryPath(request.destination);
    if (!destination.ok) {
      return { kind: "invalid", notice: notice("Move failed!", destination.message, "error") };
    }

    return this.queue.run(async (): Promise<OperationResult> => {
      const targets = this.table.selectedRows();
      if (targets.length === 0) return { kind: "cancelled" };

      const ids = targets.map((row) => row.id);
      if (await this.store.hasConflict(ids, request.destination, request.keepCategory)) {
        return {
          kind: "conflict",
          notice: notice(
            "Failed to move passwords",
            "Conflicts detected, resolve them before moving.",
            "error"
          ),
        };
      }

      let failures = 0;
      for (const row of targets) {
        const id = row.id;
        const destinationDir = request.keepCategory
          ? joinPath(request.destination, id.category)
          : joinPath(request.destination);

        if (await this.store.move(id, destinationDir)) {
          // present the merge with the location the store now has
          this.table.relocate(row, parseEntryPath(joinPath(destinationDir, id.name)));
        } else {
          failures += 1;
          this.logger.warn("Failed to move entry", {
            entry: formatEntryId(id),
            destination: destinationDir,
          });
        }
      }

      this.table.sortRows();
      await this.store.pruneEmptyDirectories();
      await this.resync();

      if (failures > 0) {
        return {
          kind: "partial_failure",
          failures,
          notice: notice("Partial Failure", `Failed to move ${failures} password(s).`, "warning"),
        };
      }

      this.logger.info("Moved entries", { count: targets.length, destination: request.destination });
      return { kind: "succeeded", notice: notice("Success!", "Move succeeded.") };
    });
  }

  async renameCurrent(newName: string): Promise<OperationResult> {
    const row = this.table.currentRow;
    if (!row) return { kind: "cancelled" };
    return this.rename(row.id, newName);
  }

  async rename(source: EntryId, newName: string): Promise<OperationResult> {
    const name = validateFilePath(newName);
    if (!name.ok) {
      return { kind: "invalid", notice: notice("Rename failed!", name.message, "error") };
    }

    const target = renamedEntryId(source, newName);
    if (entryIdsEqual(source, target)) return { kind: "cancelled" };

    return this.queue.run(async (): Promise<OperationResult> => {
      if (await this.store.exists(target)) {
        return {
          kind: "conflict",
          notice: notice("Rename failed!", `${toDisplayString(target)} already exists.`, "error"),
        };
      }

      if (!(await this.store.rename(source, newName))) {
        this.logger.warn("Failed to rename entry", { entry: formatEntryId(source), newName });
        return { kind: "failed", notice: notice("Rename failed!", "Rename failed.", "error") };
      }

      await this.store.pruneEmptyDirectories();
      await this.resync();
      // the merge sees a rename as a removal plus an insertion
      this.table.focus(target);

      return { kind: "succeeded", notice: notice("Success!", "Rename succeeded.") };
    });
  }

  async insert(request: InsertRequest): Promise<OperationResult> {
    const invalid = this.validateInsert(request);
    if (invalid) {
      return { kind: "invalid", notice: notice("Insertion failed", invalid, "error") };
    }

    const id = parseEntryPath(joinPath(request.profile, request.category, request.name));

    return this.queue.run(async (): Promise<OperationResult> => {
      if (await this.store.exists(id)) {
        return {
          kind: "conflict",
          notice: notice("Insertion failure", `${toDisplayString(id)} already exists.`, "error"),
        };
      }

      if (!(await this.store.insert(id, request.secret, request.secondary ?? ""))) {
        this.logger.warn("Failed to insert entry", { entry: formatEntryId(id) });
        return {
          kind: "failed",
          notice: notice("Insertion failure", "Password insertion failed.", "error"),
        };
      }

      await this.resync();
      this.table.focus(id);

      return { kind: "succeeded", notice: notice("Success!", "Password insertion succeeded.") };
    });
  }

  findAndSelect(path: string): boolean {
    return this.table.findAndSelect(path);
  }

  /** Opens the cursor entry in the external editor, then resyncs. */
  async edit(): Promise<boolean> {
    const row = this.table.currentRow;
    if (!row) return false;

    const id = row.id;
    try {
      await this.session.suspend(() => this.store.edit(id));
    } catch (err) {
      this.logger.error("Could not start the editor", { entry: formatEntryId(id), error: describeError(err) });
      return false;
    }

    await this.refresh();
    return true;
  }

  copyPassword(): Promise<OperationResult> {
    return this.copyField(PASSWORD_LINE, "Password", "Ensure the password field exists.");
  }

  copyUsername(): Promise<OperationResult> {
    return this.copyField(USERNAME_LINE, "Username", "Ensure the user field exists.");
  }

  private async copyField(line: number, label: string, hint: string): Promise<OperationResult> {
    const row = this.table.currentRow;
    if (!row) return { kind: "cancelled" };

    let exitCode: number;
    try {
      exitCode = await this.store.copyField(row.id, line);
    } catch (err) {
      this.logger.error("Copy failed", { entry: formatEntryId(row.id), error: describeError(err) });
      exitCode = 1;
    }

    if (exitCode !== 0) {
      return { kind: "failed", notice: notice("Copy failed!", hint, "error") };
    }

    return {
      kind: "succeeded",
      notice: notice(
        `${label} copied!`,
        `${label} will be cleared in ${this.clipTimeSeconds} seconds.`
      ),
    };
  }

  private validateInsert(request: InsertRequest): string | null {
    for (const part of [request.profile, request.category]) {
      const check = validateDirectoryPath(part);
      if (!check.ok) return check.message;
    }

    const name = validateEntryName(request.name);
    if (!name.ok) return name.message;

    const secret = validateSecret(request.secret);
    if (!secret.ok) return secret.message;

    return null;
  }

  private async resync(): Promise<ReconcileResult> {
    const ids: EntryId[] = await this.store.listEntries();
    const result = this.table.applyEntries(ids);

    if (result.added.length > 0 || result.removed.length > 0) {
      this.logger.debug("Table resynced", {
        added: result.added.length,
        removed: result.removed.length,
        rows: result.rows.length,
      });
    }
    return result;
  }
}
