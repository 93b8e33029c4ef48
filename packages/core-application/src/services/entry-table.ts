import {
  compareEntryIds,
  entryIdsEqual,
  enumerateRows,
  parseEntryPath,
  toDisplayString,
  type EntryId,
  type Row,
} from "@passdeck/core-domain";

import { clampCursor, reconcileRows, type ReconcileResult } from "./reconcile";

type Direction = -1 | 1;

/**
 * The ordered row list, the cursor and the selection flags.
 *
 * Rows are plain objects owned by the table. Selection helpers mutate the
 * `selected` flag in place; anything that changes order or membership
 * replaces the list and renumbers it.
 */
export class EntryTable {
  private rowList: Row[] = [];
  private cursorIndex = 0;

  /** Read-only view; selection and location change through the table's methods. */
  get rows(): readonly Readonly<Row>[] {
    return this.rowList;
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  get size(): number {
    return this.rowList.length;
  }

  get currentRow(): Readonly<Row> | undefined {
    return this.rowList[this.cursorIndex];
  }

  /** Reconciles against a sorted store listing. */
  applyEntries(ids: readonly EntryId[]): ReconcileResult {
    const result = reconcileRows(this.rowList, ids, this.cursorIndex);
    this.rowList = result.rows;
    this.cursorIndex = result.cursor;
    return result;
  }

  moveCursor(index: number): void {
    this.cursorIndex = clampCursor(index, this.rowList.length);
  }

  cursorUp(): void {
    this.moveCursor(this.cursorIndex - 1);
  }

  cursorDown(): void {
    this.moveCursor(this.cursorIndex + 1);
  }

  indexOf(id: EntryId): number {
    return this.rowList.findIndex((row) => entryIdsEqual(row.id, id));
  }

  /** Moves the cursor onto `id`; false (and no change) if no row has it. */
  focus(id: EntryId): boolean {
    const index = this.indexOf(id);
    if (index < 0) return false;
    this.cursorIndex = index;
    return true;
  }

  findAndSelect(path: string): boolean {
    return this.focus(parseEntryPath(path));
  }

  toggle(row: Readonly<Row> | undefined = this.currentRow): void {
    const owned = this.owned(row);
    if (owned) owned.selected = !owned.selected;
  }

  select(row: Readonly<Row> | undefined = this.currentRow): void {
    const owned = this.owned(row);
    if (owned) owned.selected = true;
  }

  deselect(row: Readonly<Row> | undefined = this.currentRow): void {
    const owned = this.owned(row);
    if (owned) owned.selected = false;
  }

  selectAll(): void {
    for (const row of this.rowList) row.selected = true;
  }

  deselectAll(): void {
    for (const row of this.rowList) row.selected = false;
  }

  reverseSelection(): void {
    for (const row of this.rowList) row.selected = !row.selected;
  }

  selectRangeUp(): void {
    this.markAndStep(-1, true);
  }

  selectRangeDown(): void {
    this.markAndStep(1, true);
  }

  deselectRangeUp(): void {
    this.markAndStep(-1, false);
  }

  deselectRangeDown(): void {
    this.markAndStep(1, false);
  }

  /**
   * Rows flagged as selected, or the cursor row alone when none is.
   * Empty only when the table itself is empty.
   */
  selectedRows(): Readonly<Row>[] {
    const selected = this.rowList.filter((row) => row.selected);
    if (selected.length > 0) return selected;

    const current = this.currentRow;
    return current ? [current] : [];
  }

  displayPaths(): string[] {
    return this.rowList.map((row) => toDisplayString(row.id));
  }

  /** Points a row at a new location; call `sortRows` before the next reconcile. */
  relocate(row: Readonly<Row>, id: EntryId): void {
    const owned = this.owned(row);
    if (owned) owned.id = id;
  }

  /** Restores canonical order, keeping the cursor on the same row. */
  sortRows(): void {
    const current = this.currentRow;
    const sorted = [...this.rowList].sort((a, b) => compareEntryIds(a.id, b.id));
    const cursorIndex = current ? sorted.indexOf(current) : 0;

    this.rowList = enumerateRows(sorted);
    this.moveCursor(cursorIndex);
  }

  private markAndStep(direction: Direction, selected: boolean): void {
    if (this.rowList.length === 0) return;

    this.setSelected(this.cursorIndex, selected);
    this.moveCursor(this.cursorIndex + direction);
    this.setSelected(this.cursorIndex, selected);
  }

  /** The table's own row object; rows from before the last reconcile are not. */
  private owned(row: Readonly<Row> | undefined): Row | undefined {
    if (!row) return undefined;
    const index = this.rowList.indexOf(row);
    return index < 0 ? undefined : this.rowList[index];
  }

  private setSelected(index: number, selected: boolean): void {
    const row = this.rowList[index];
    if (row) row.selected = selected;
  }
}
