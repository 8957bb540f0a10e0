import type { CountEntry } from "../types.js";

export const NO_DATA_TITLE = "No data available";

export function countBy<T, K extends string | number>(items: readonly T[], keyOf: (item: T) => K): Map<K, number> {
  const counts = new Map<K, number>();
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

// Map iteration follows first insertion and Array#sort is stable, so equal counts keep first-seen order.
export function mapCountsDescending<K extends string | number>(counts: Map<K, number>): Array<CountEntry<K>> {
  return Array.from(counts.entries())
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count);
}

export function sanitizeTopN(rawTopN: number): number {
  if (!Number.isFinite(rawTopN)) {
    return 0;
  }
  return Math.max(0, Math.floor(rawTopN));
}
