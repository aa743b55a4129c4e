import { RankedList } from "./types";

/** Counts per key; Map iteration order is first-seen order. */
export function termFrequency(keys: Iterable<string>) {
  const freq = new Map<string, number>();
  for (const k of keys) {
    freq.set(k, (freq.get(k) ?? 0) + 1);
  }
  return freq;
}

export function assertLimit(limit: number) {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }
}

/**
 * Rank keys by count, most common first. Equal counts keep the order in which
 * the keys were first seen (Array#sort is stable). Without a limit every
 * distinct key is returned.
 */
export function rankKeys(keys: Iterable<string>, limit?: number): RankedList {
  if (limit !== undefined) assertLimit(limit);

  const ranked = Array.from(termFrequency(keys), ([key, count]) => ({ key, count })).sort(
    (a, b) => b.count - a.count
  );
  return limit === undefined ? ranked : ranked.slice(0, limit);
}
