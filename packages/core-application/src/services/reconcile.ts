import {
  compareEntryIds,
  createRow,
  enumerateRows,
  type EntryId,
  type Row,
} from "@passdeck/core-domain";

export type ReconcileResult = {
  rows: Row[];
  cursor: number;

  // for reporting only
  added: EntryId[];
  removed: EntryId[];
};

export function clampCursor(cursor: number, length: number): number {
  if (length === 0) return 0;
  return Math.min(Math.max(cursor, 0), length - 1);
}

/**
 * Merges the table rows with a fresh store listing.
 *
 * Both inputs must be sorted by compareEntryIds. Rows whose entry still
 * exists keep their selection, new entries come in unselected and rows
 * whose entry vanished are dropped. The cursor follows the entry it
 * pointed at: every insertion or removal at or before its old position
 * shifts it by one.
 */
export function reconcileRows(
  oldRows: readonly Row[],
  newIds: readonly EntryId[],
  cursor: number
): ReconcileResult {
  const merged: Row[] = [];
  const added: EntryId[] = [];
  const removed: EntryId[] = [];

  let i = 0;
  let j = 0;
  let cursorDelta = 0;

  while (i < newIds.length && j < oldRows.length) {
    const id = newIds[i];
    const row = oldRows[j];
    const order = compareEntryIds(id, row.id);

    if (order < 0) {
      merged.push(createRow(id));
      added.push(id);
      i += 1;
      if (j <= cursor) cursorDelta += 1;
    } else if (order > 0) {
      removed.push(row.id);
      if (j <= cursor) cursorDelta -= 1;
      j += 1;
    } else {
      merged.push(createRow(id, row.selected));
      i += 1;
      j += 1;
    }
  }

  for (; i < newIds.length; i += 1) {
    const id = newIds[i];
    merged.push(createRow(id));
    added.push(id);
  }

  for (; j < oldRows.length; j += 1) {
    removed.push(oldRows[j].id);
  }

  return {
    rows: enumerateRows(merged),
    cursor: clampCursor(cursor + cursorDelta, merged.length),
    added,
    removed,
  };
}
