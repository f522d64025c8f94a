import type { FusedHit, Ranking, RankingSource } from "./types.js";

export const DEFAULT_RRF_K = 60;

/**
 * Reciprocal Rank Fusion: each ranking a document appears in contributes
 * 1 / (k + rank). Only rank positions matter, so bm25 and cosine scores never
 * have to be normalized against each other.
 */
export function rrfFusion(
  rankings: Ranking[],
  k: number = DEFAULT_RRF_K
): FusedHit[] {
  if (!Number.isFinite(k) || k < 0) {
    throw new RangeError(`RRF k must be a non-negative number, got ${k}`);
  }

  const fused = new Map<
    number,
    { score: number; ranks: Partial<Record<RankingSource, number>> }
  >();

  for (const ranking of rankings) {
    for (const hit of ranking.hits) {
      const contribution = 1 / (k + hit.rank);
      const existing = fused.get(hit.id);
      if (existing) {
        existing.score += contribution;
        existing.ranks[ranking.source] = hit.rank;
      } else {
        const ranks: Partial<Record<RankingSource, number>> = {};
        ranks[ranking.source] = hit.rank;
        fused.set(hit.id, { score: contribution, ranks });
      }
    }
  }

  return Array.from(fused.entries())
    .map(([id, entry]): FusedHit => {
      const sources = Object.keys(entry.ranks);
      const source =
        sources.length > 1 ? "hybrid" : entry.ranks.lex !== undefined ? "lex" : "vec";
      return { id, score: entry.score, source, ranks: entry.ranks };
    })
    .sort((a, b) => b.score - a.score || a.id - b.id);
}
