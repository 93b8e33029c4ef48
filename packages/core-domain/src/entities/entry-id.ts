export const PATH_SEPARATOR = "/";

/**
 * Location of one entry in the store.
 *
 * A relative path `profile/cat1/cat2/name` maps to
 * `{ profile: "profile", category: "cat1/cat2", name: "name" }`.
 * The name is always the last segment and the profile always the first;
 * everything in between is the category. Either of profile and category
 * may be empty.
 */
export type EntryId = {
  readonly profile: string;
  readonly category: string;
  readonly name: string;
};

export function createEntryId(profile: string, category: string, name: string): EntryId {
  return { profile, category, name };
}

/**
 * Splits every argument on the separator and joins the non-empty
 * segments, so `joinPath("work/", "", "mail")` is `"work/mail"`.
 */
export function joinPath(...parts: string[]): string {
  return parts
    .flatMap((part) => part.split(PATH_SEPARATOR))
    .filter((segment) => segment.length > 0)
    .join(PATH_SEPARATOR);
}

export function parseEntryPath(path: string): EntryId {
  const segments = path.split(PATH_SEPARATOR);
  const name = segments[segments.length - 1] ?? "";

  if (segments.length === 1) return createEntryId("", "", name);
  if (segments.length === 2) return createEntryId(segments[0] ?? "", "", name);

  return createEntryId(
    segments[0] ?? "",
    segments.slice(1, -1).join(PATH_SEPARATOR),
    name
  );
}

/** Store address of an entry; empty fields are skipped. */
export function formatEntryId(id: EntryId): string {
  return [id.profile, id.category, id.name]
    .filter((field) => field.length > 0)
    .join(PATH_SEPARATOR);
}

/** Like formatEntryId, but also drops empty segments inside a field. */
export function toDisplayString(id: EntryId): string {
  return joinPath(id.profile, id.category, id.name);
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// plain code-unit order: it has to agree between the store listing and the table
export function compareEntryIds(a: EntryId, b: EntryId): number {
  return (
    compareStrings(a.profile, b.profile) ||
    compareStrings(a.category, b.category) ||
    compareStrings(a.name, b.name)
  );
}

export function entryIdsEqual(a: EntryId, b: EntryId): boolean {
  return a.profile === b.profile && a.category === b.category && a.name === b.name;
}

export function sortEntryIds(ids: readonly EntryId[]): EntryId[] {
  return [...ids].sort(compareEntryIds);
}

/**
 * Target of renaming `id` to `newName` inside its own profile and category.
 * `newName` may carry further segments (`"old/site"`), in which case the
 * result is re-parsed the same way the store listing would parse it.
 */
export function renamedEntryId(id: EntryId, newName: string): EntryId {
  return parseEntryPath(joinPath(id.profile, id.category, newName));
}
