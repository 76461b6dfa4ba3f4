import type { Entry, Histogram } from "./types.js";

export function bump<K extends string | number>(histogram: Histogram<K>, key: K, by = 1): void {
  histogram.set(key, (histogram.get(key) ?? 0) + by);
}

/** Add every count of `source` into `target`. */
export function mergeInto<K extends string | number>(
  target: Histogram<K>,
  source: Histogram<K>,
): Histogram<K> {
  for (const [key, count] of source) {
    bump(target, key, count);
  }
  return target;
}

export function total<K extends string | number>(histogram: Histogram<K>): number {
  let sum = 0;
  for (const count of histogram.values()) {
    sum += count;
  }
  return sum;
}

/** Sum of the counts whose numeric key lies in [min, max]. */
export function sumRange(histogram: Histogram<number>, min: number, max: number): number {
  let sum = 0;
  for (const [key, count] of histogram) {
    if (key >= min && key <= max) {
      sum += count;
    }
  }
  return sum;
}

function compareEntries(a: Entry, b: Entry): number {
  if (a.count !== b.count) {
    return b.count - a.count;
  }
  if (a.key === b.key) {
    return 0;
  }
  return a.key < b.key ? -1 : 1;
}

/**
 * Entries ordered by descending count. Equal counts are ordered by key
 * (code unit order) so ranking and consolidation are reproducible.
 */
export function rankEntries(histogram: Histogram): Entry[] {
  const entries: Entry[] = [];
  for (const [key, count] of histogram) {
    entries.push({ key, count });
  }
  return entries.sort(compareEntries);
}

export function topEntries(histogram: Histogram, n: number): Entry[] {
  return rankEntries(histogram).slice(0, Math.max(0, n));
}

export function toHistogram(entries: readonly Entry[]): Histogram {
  const histogram: Histogram = new Map();
  for (const entry of entries) {
    bump(histogram, entry.key, entry.count);
  }
  return histogram;
}
