import type { Item } from '../types.js';
import { normalizeQuery } from './query-normalizer.js';

const TYPICAL_MIN_MINUTES = 1;
const TYPICAL_MAX_MINUTES = 10;

/**
 * Smooth preference for the 1-10 minute band: a steep logistic rise around
 * one minute times a gentler fall around ten. Unknown duration scores 0.5.
 */
export function durationScore(seconds: number | undefined): number {
  if (seconds === undefined || !Number.isFinite(seconds)) return 0.5;
  const minutes = seconds / 60;
  const rise = 1 / (1 + Math.exp(-3 * (minutes - TYPICAL_MIN_MINUTES)));
  const fall = 1 / (1 + Math.exp(0.5 * (minutes - TYPICAL_MAX_MINUTES)));
  return rise * fall;
}

export function titleMatches(item: Item, query: string): boolean {
  const needle = normalizeQuery(query);
  return needle.length > 0 && normalizeQuery(item.title).includes(needle);
}

/** Stable: equal items keep the order the backend returned them in. */
export function rankResults(items: readonly Item[], query: string): Item[] {
  return items
    .map((item, index) => ({ item, index, match: titleMatches(item, query), score: durationScore(item.duration) }))
    .sort((a, b) => Number(b.match) - Number(a.match) || b.score - a.score || a.index - b.index)
    .map(({ item }) => item);
}
