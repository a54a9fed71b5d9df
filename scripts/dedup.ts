/**
 * Deduplication helpers shared by the search pipeline
 */

/**
 * Keep the first occurrence of each key, preserving order
 */
export function dedupeBy<T>(items: T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const item of items) {
    const id = key(item);
    if (!seen.has(id)) {
      seen.add(id);
      unique.push(item);
    }
  }

  return unique;
}

/**
 * Deduplicate by repository name and flag every survivor as new
 */
export function dedupeFresh<T extends { repoName: string }>(items: T[]): Array<T & { isNew: true }> {
  return dedupeBy(items, item => item.repoName).map(item => ({ ...item, isNew: true as const }));
}
