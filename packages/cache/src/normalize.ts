/**
 * Cache key for a free-text query: lowercase, anything that is not a letter,
 * digit or whitespace dropped, whitespace runs collapsed.
 */
export function normalizeSearchKey(query: string): string {
  return query
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function searchCacheKey(query: string, limit: number): string {
  return `${normalizeSearchKey(query)}|${limit}`;
}
