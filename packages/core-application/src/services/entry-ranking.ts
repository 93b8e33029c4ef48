import Fuse from "fuse.js";

export type RankedEntry = {
  path: string;
  /** 0 is a perfect match, 1 no match at all. */
  score: number;
};

export type RankOptions = {
  limit?: number;
  threshold?: number;
};

/**
 * Orders display paths by how well they match a loosely typed query.
 * An exact path always ranks first; a blank query matches nothing.
 */
export function rankEntries(
  candidates: readonly string[],
  query: string,
  options: RankOptions = {}
): RankedEntry[] {
  const trimmed = query.trim();
  if (!trimmed) return [];

  const fuse = new Fuse([...candidates], {
    includeScore: true,
    ignoreLocation: true,
    threshold: options.threshold ?? 0.4,
  });

  const ranked = fuse
    .search(trimmed)
    .map((result) => ({ path: result.item, score: result.score ?? 0 }))
    .filter((entry) => entry.path !== trimmed);

  if (candidates.includes(trimmed)) ranked.unshift({ path: trimmed, score: 0 });

  return options.limit === undefined ? ranked : ranked.slice(0, options.limit);
}
