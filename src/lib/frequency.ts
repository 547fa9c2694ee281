export type FrequencyEntry = {
  key: string;
  count: number;
};

export type FrequencyTable = readonly FrequencyEntry[];

export const DEFAULT_TABLE_LIMIT = 10;

/**
 * Counts keys and orders them by count, highest first. Ties keep the order in
 * which the key was first seen. Empty keys are not counted.
 */
export function buildFrequencyTable(keys: Iterable<string>, limit = DEFAULT_TABLE_LIMIT): FrequencyTable {
  const counts = new Map<string, number>();
  for (const key of keys) {
    if (!key) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts, ([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, limit));
}

export function countBy<T>(items: Iterable<T>, pick: (item: T) => string | null, limit = DEFAULT_TABLE_LIMIT): FrequencyTable {
  const keys: string[] = [];
  for (const item of items) {
    const key = pick(item);
    if (key) keys.push(key);
  }
  return buildFrequencyTable(keys, limit);
}
