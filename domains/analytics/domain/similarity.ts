/**
 * String similarity for property name matching
 *
 * Scores are in [0, 1]. Both inputs are normalized first, so scoring ignores
 * case, punctuation and whitespace. The score is symmetric in its arguments.
 */

/** Containment only counts when the shorter string covers this share of the longer */
export const MIN_CONTAINMENT_RATIO = 0.3;

const CONTAINMENT_BASE = 0.7;
const CONTAINMENT_SPAN = 0.3;

/**
 * Lowercase, fold diacritics, and replace punctuation with single spaces.
 * Letters and digits of any script are kept.
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalized form with only letters and digits left
 */
export function compact(text: string): string {
  return normalize(text).replace(/[^\p{L}\p{N}]/gu, '');
}

/**
 * Levenshtein edit distance, two-row variant
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current: number[] = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,        // deletion
        (current[j - 1] ?? 0) + 1,     // insertion
        (previous[j - 1] ?? 0) + cost  // substitution
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
}

/**
 * 1 - distance / longer length, on compact forms
 */
export function editRatio(a: string, b: string): number {
  const ca = compact(a);
  const cb = compact(b);
  const longest = Math.max(ca.length, cb.length);
  if (longest === 0) return 0;
  return 1 - levenshteinDistance(ca, cb) / longest;
}

/**
 * Score for one compact string occurring inside the other.
 * "blog" in "myblog" covers 4/6 of it and scores 0.7 + 0.3 * 4/6 = 0.9.
 */
export function containmentScore(a: string, b: string): number {
  const ca = compact(a);
  const cb = compact(b);
  if (ca.length === 0 || cb.length === 0) return 0;

  const [shorter, longer] = ca.length <= cb.length ? [ca, cb] : [cb, ca];
  if (!longer.includes(shorter)) return 0;

  const ratio = shorter.length / longer.length;
  if (ratio < MIN_CONTAINMENT_RATIO) return 0;
  return CONTAINMENT_BASE + CONTAINMENT_SPAN * ratio;
}

/**
 * Similarity between two names: the larger of edit ratio and containment
 */
export function similarity(a: string, b: string): number {
  const ca = compact(a);
  const cb = compact(b);
  if (ca.length === 0 || cb.length === 0) return 0;
  if (ca === cb) return 1;
  return Math.max(editRatio(ca, cb), containmentScore(ca, cb));
}
