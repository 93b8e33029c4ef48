import { describe, it, expect } from "vitest";
import {
  createRow,
  enumerateRows,
  formatEntryId,
  parseEntryPath,
  sortEntryIds,
  type Row,
} from "@passdeck/core-domain";

import { clampCursor, reconcileRows } from "./reconcile";

function ids(...paths: string[]) {
  return sortEntryIds(paths.map(parseEntryPath));
}

function rows(paths: string[], selected: string[] = []): Row[] {
  return enumerateRows(
    ids(...paths).map((id) => createRow(id, selected.includes(formatEntryId(id))))
  );
}

function shape(list: readonly Row[]) {
  return list.map((r) => `${r.ordinal}:${formatEntryId(r.id)}${r.selected ? "*" : ""}`);
}

describe("reconcile", () => {
  const base = ["personal/bank", "personal/mail", "work/mail", "work/vpn"];

  it("leaves an unchanged table and cursor as they were", () => {
    const old = rows(base, ["personal/mail", "work/vpn"]);
    const result = reconcileRows(old, ids(...base), 2);

    expect(shape(result.rows)).toEqual(shape(old));
    expect(result.cursor).toBe(2);
    expect(result.added).toEqual([]);
    expect(result.removed).toEqual([]);
  });

  it("is idempotent", () => {
    const old = rows(base, ["work/mail"]);
    const first = reconcileRows(old, ids(...base, "a"), 3);
    const second = reconcileRows(first.rows, ids(...base, "a"), first.cursor);

    expect(shape(second.rows)).toEqual(shape(first.rows));
    expect(second.cursor).toBe(first.cursor);
  });

  it("keeps a selection when an unrelated entry disappears", () => {
    const old = rows(base, ["work/mail"]);
    const result = reconcileRows(old, ids("personal/bank", "work/mail", "work/vpn"), 0);

    expect(shape(result.rows)).toEqual(["1:personal/bank", "2:work/mail*", "3:work/vpn"]);
    expect(result.removed.map(formatEntryId)).toEqual(["personal/mail"]);
  });

  it("moves the cursor down one when an entry appears before it", () => {
    const old = rows(base);
    const result = reconcileRows(old, ids(...base, "personal/alpha"), 2);

    expect(result.cursor).toBe(3);
    expect(formatEntryId(result.rows[result.cursor].id)).toBe("work/mail");
    expect(result.added.map(formatEntryId)).toEqual(["personal/alpha"]);
  });

  it("keeps the cursor when an entry appears after it", () => {
    const result = reconcileRows(rows(base), ids(...base, "zzz/last"), 1);
    expect(result.cursor).toBe(1);
  });

  it("moves the cursor up one when an entry before it disappears", () => {
    const result = reconcileRows(rows(base), ids("personal/mail", "work/mail", "work/vpn"), 2);

    expect(result.cursor).toBe(1);
    expect(formatEntryId(result.rows[1].id)).toBe("work/mail");
  });

  it("falls back to the previous row when the cursor row disappears", () => {
    const result = reconcileRows(rows(base), ids("personal/bank", "personal/mail", "work/vpn"), 2);
    expect(formatEntryId(result.rows[result.cursor].id)).toBe("personal/mail");
  });

  it("clamps the cursor to the first row", () => {
    const result = reconcileRows(rows(base), ids("personal/mail", "work/mail", "work/vpn"), 0);
    expect(result.cursor).toBe(0);
  });

  it("clamps the cursor when the tail vanishes", () => {
    const result = reconcileRows(rows(base), ids("personal/bank"), 3);

    expect(shape(result.rows)).toEqual(["1:personal/bank"]);
    expect(result.cursor).toBe(0);
    expect(result.removed.map(formatEntryId)).toEqual(["personal/mail", "work/mail", "work/vpn"]);
  });

  it("fills an empty table", () => {
    const result = reconcileRows([], ids("b", "a"), 0);

    expect(shape(result.rows)).toEqual(["1:a", "2:b"]);
    expect(result.cursor).toBe(0);
  });

  it("empties the table", () => {
    const result = reconcileRows(rows(base), [], 3);

    expect(result.rows).toEqual([]);
    expect(result.cursor).toBe(0);
  });

  it("does not mutate its inputs", () => {
    const old = rows(base, ["work/vpn"]);
    const before = shape(old);

    reconcileRows(old, ids("new/entry"), 1);

    expect(shape(old)).toEqual(before);
  });

  it("tracks the cursor entry and selections across random edits", () => {
    let seed = 7;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };

    const universe = Array.from({ length: 30 }, (_, i) => `p${i % 3}/c${i % 5}/e${i}`);

    for (let round = 0; round < 200; round += 1) {
      const before = universe.filter(() => next() < 0.5);
      const after = universe.filter((p) => (before.includes(p) ? next() < 0.8 : next() < 0.3));
      const selected = before.filter(() => next() < 0.4);

      const old = rows(before, selected);
      const cursor = old.length > 0 ? Math.floor(next() * old.length) : 0;
      const result = reconcileRows(old, ids(...after), cursor);

      expect(result.rows.map((r) => formatEntryId(r.id))).toEqual(ids(...after).map(formatEntryId));
      for (const row of result.rows) {
        expect(row.selected).toBe(selected.includes(formatEntryId(row.id)));
      }

      const cursorRow = old[cursor];
      if (cursorRow && after.includes(formatEntryId(cursorRow.id))) {
        expect(formatEntryId(result.rows[result.cursor].id)).toBe(formatEntryId(cursorRow.id));
      }
      expect(result.cursor).toBe(clampCursor(result.cursor, result.rows.length));
    }
  });
});

describe("clampCursor", () => {
  it("keeps the cursor inside the list", () => {
    expect(clampCursor(-3, 4)).toBe(0);
    expect(clampCursor(9, 4)).toBe(3);
    expect(clampCursor(2, 0)).toBe(0);
  });
});
