/**
 * Reciprocal Rank Fusion (Cormack, Clarke & Butt 2009).
 *
 * For every list and every id at 1-indexed rank r: score(id) += 1 / (k + r).
 * Ranks are the only input; raw scores from each method are never compared.
 */

import type { FusedHit, PointId } from '../../types/hybrid-search.types';

export const DEFAULT_RRF_K = 60;

export const reciprocalRankFusion = (
  rankedLists: PointId[][],
  topK: number,
  k: number = DEFAULT_RRF_K,
): FusedHit[] => {
  // Map keeps first-seen order, which the stable sort uses to break ties
  const scores = new Map<PointId, number>();

  for (const list of rankedLists) {
    list.forEach((id, index) => {
      const rank = index + 1;
      scores.set(id, (scores.get(id) ?? 0) + 1 / (k + rank));
    });
  }

  return Array.from(scores, ([id, score]) => ({ id, score }))
    .filter((hit) => hit.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, topK));
};
