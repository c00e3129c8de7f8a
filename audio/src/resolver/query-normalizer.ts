import { normalizeSearchKey } from '@strata/cache';

/** Cache key form of a query. */
export const normalizeQuery = normalizeSearchKey;

const MAX_KEYWORDS = 4;

export function stripDiacritics(input: string): string {
  return input.normalize('NFD').replace(/\p{M}+/gu, '').normalize('NFC');
}

/**
 * Diacritics and punctuation gone, featuring credits unified, trailing
 * "official video" style suffixes dropped. Case is kept.
 */
export function simplifyQuery(query: string): string {
  const plain = stripDiacritics(query)
    .replace(/\s+(feat\.?|featuring|ft\.?)\s+/gi, ' ft ')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return plain.replace(/\s+(official\s+)?(music\s+)?(video|audio|lyric|lyrics|visualizer)$/i, '').trim();
}

/**
 * The part of a query before the first separator or featuring credit, cut to
 * its first few words: "Artist - Song (Live)" becomes "Artist".
 */
export function leadingKeywordGroup(query: string): string {
  const [head = query] = query.split(/\s[-–—|:]\s|[([{]|\s(?:feat\.?|ft\.?|featuring)\s/i);
  return head.trim().split(/\s+/).filter(Boolean).slice(0, MAX_KEYWORDS).join(' ');
}

/**
 * Second-chance query after every backend came back empty handed: the
 * simplified form when it differs, else the leading keyword group. `null`
 * when neither changes anything.
 */
export function correctQuery(query: string): string | null {
  const trimmed = query.trim();
  const simplified = simplifyQuery(trimmed);
  if (simplified && simplified !== trimmed) return simplified;

  const group = leadingKeywordGroup(trimmed);
  return group && group !== trimmed ? group : null;
}
