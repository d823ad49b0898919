import type { SubtitleCandidate } from './types.js';

/**
 * Picks the candidate for `language` with the highest rating, breaking ties
 * on download count. Equal candidates keep their catalog order.
 */
export function selectBest(candidates: readonly SubtitleCandidate[], language: string): SubtitleCandidate | null {
  const matching = candidates.filter((candidate) => candidate.language === language);
  if (matching.length === 0) {
    return null;
  }

  // Array.prototype.sort is stable since ES2019
  const ranked = [...matching].sort(
    (a, b) => b.rating - a.rating || b.downloadCount - a.downloadCount,
  );
  return ranked[0];
}
