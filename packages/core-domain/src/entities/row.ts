import type { EntryId } from "./entry-id";

/**
 * One line of the entry table. `ordinal` is the 1-based position in the
 * row list and is only ever written by `enumerateRows`.
 */
export interface Row {
  id: EntryId;
  selected: boolean;
  ordinal: number;
}

export function createRow(id: EntryId, selected = false): Row {
  return { id, selected, ordinal: 0 };
}

export function enumerateRows(rows: readonly Row[]): Row[] {
  return rows.map((row, index) => ({ ...row, ordinal: index + 1 }));
}
