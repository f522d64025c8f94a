import type { DbHandle } from "../db/index.js";
import type { EmbeddingProvider } from "../embed/types.js";
import type { SearchConfig } from "../config/schema.js";
import type { Viewer } from "../types/paper.js";
import { EmbeddingError } from "../embed/types.js";
import { embedChecked } from "../embed/guard.js";
import { CoreError } from "../core/errors.js";
import { debug, warn, timing, timingAsync } from "../utils/logger.js";
import { searchLexical } from "./lexical.js";
import { searchVector } from "./vector.js";
import { rrfFusion } from "./fusion.js";
import { visibilityFor } from "./visibility.js";
import type { FusedHit, Ranking } from "./types.js";

export type { FusedHit, Ranking, RankedHit, RankingSource } from "./types.js";
export { rrfFusion, DEFAULT_RRF_K } from "./fusion.js";
export { searchLexical, LEXICAL_WEIGHTS } from "./lexical.js";
export { searchVector, cosineSimilarity } from "./vector.js";
export { visibilityFor, type VisibilityFilter } from "./visibility.js";

export type SearchMode = "hybrid" | "lexical" | "vector";

export interface HybridSearchDeps {
  db: DbHandle;
  embedProvider: EmbeddingProvider;
  config: SearchConfig;
}

export interface HybridSearchInput {
  query: string;
  viewer: Viewer;
  limit?: number;
  offset?: number;
  mode?: SearchMode;
}

export interface HybridSearchResult {
  hits: FusedHit[];
  /** true when the vector side failed and lexical-only results were returned */
  degraded: boolean;
}

export function clampLimit(limit: number | undefined, config: SearchConfig): number {
  const requested = limit === undefined || !Number.isFinite(limit)
    ? config.defaultLimit
    : Math.floor(limit);
  return Math.min(Math.max(requested, 1), config.maxLimit);
}

/**
 * How many candidates each retrieval method contributes to fusion. Scales
 * with the requested window so deep pages still fuse over enough overlap.
 */
export function candidatePoolSize(window: number, config: SearchConfig): number {
  return Math.max(window, Math.min(window * config.overfetchFactor, config.maxCandidates));
}

const emptyRanking = (source: Ranking["source"]): Ranking => ({ source, hits: [] });

export async function hybridSearch(
  deps: HybridSearchDeps,
  input: HybridSearchInput
): Promise<HybridSearchResult> {
  const { db, embedProvider, config } = deps;
  const query = input.query.trim();
  const mode = input.mode ?? "hybrid";

  if (!query) {
    return { hits: [], degraded: false };
  }

  const limit = clampLimit(input.limit, config);
  const offset = Math.max(0, Math.floor(input.offset ?? 0));
  const poolSize = candidatePoolSize(offset + limit, config);
  const filter = visibilityFor(input.viewer);

  const lexicalTask: Promise<Ranking> =
    mode === "vector"
      ? Promise.resolve(emptyRanking("lex"))
      : Promise.resolve().then(() =>
          timing("hybridSearch.lexical", () => searchLexical(db, { query, filter, limit: poolSize }))
        );

  const vectorTask: Promise<Ranking> =
    mode === "lexical"
      ? Promise.resolve(emptyRanking("vec"))
      : embedChecked(embedProvider, query, "query", config.embedTimeoutMs).then((vector) =>
          searchVector(db, { vector, filter, limit: poolSize })
        );

  // Both sides must settle before fusion; never fuse a partial pair.
  const [lexical, vector] = await timingAsync("hybridSearch.retrieve", () =>
    Promise.allSettled([lexicalTask, vectorTask])
  );

  if (lexical.status === "rejected") {
    throw lexical.reason;
  }

  let rankings: Ranking[];
  let degraded = false;

  if (vector.status === "fulfilled") {
    rankings = [lexical.value, vector.value];
  } else if (vector.reason instanceof EmbeddingError) {
    if (config.fallback !== "lexical") {
      throw new CoreError(
        `Embedding unavailable: ${vector.reason.message}`,
        "EMBEDDING_UNAVAILABLE",
        vector.reason
      );
    }
    warn(`[HybridSearch] Embedding unavailable, returning lexical-only results: ${vector.reason.message}`);
    rankings = [lexical.value];
    degraded = true;
  } else {
    throw vector.reason;
  }

  debug(
    () =>
      `[HybridSearch] mode=${mode} pool=${poolSize} lex=${rankings[0].hits.length} vec=${rankings[1]?.hits.length ?? 0}`
  );

  const fused = rrfFusion(rankings, config.rrfK);
  return {
    hits: fused.slice(offset, offset + limit),
    degraded,
  };
}
