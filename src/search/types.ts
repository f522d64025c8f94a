export type RankingSource = "lex" | "vec";

export interface RankedHit {
  id: number;
  /** 1-based position within its ranking */
  rank: number;
  score: number;
}

export interface Ranking {
  source: RankingSource;
  hits: RankedHit[];
}

export interface FusedHit {
  id: number;
  score: number;
  source: RankingSource | "hybrid";
  ranks: Partial<Record<RankingSource, number>>;
}

/**
 * Assign 1-based ranks after sorting by score descending, id ascending.
 */
export function toRanking(
  source: RankingSource,
  scored: Array<{ id: number; score: number }>,
  limit: number
): Ranking {
  const hits = [...scored]
    .sort((a, b) => b.score - a.score || a.id - b.id)
    .slice(0, limit)
    .map((hit, index) => ({ id: hit.id, rank: index + 1, score: hit.score }));
  return { source, hits };
}
