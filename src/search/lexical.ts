import type { DbHandle } from "../db/index.js";
import type { VisibilityFilter } from "./visibility.js";
import { toRanking, type Ranking } from "./types.js";
import { CoreError } from "../core/errors.js";
import { error, debug } from "../utils/logger.js";

/**
 * bm25 column weights in papers_fts column order. Must stay non-increasing:
 * title ≥ authors ≥ abstract ≥ summary.
 */
export const LEXICAL_WEIGHTS = {
  title: 10.0,
  authors: 5.0,
  abstract: 2.0,
  summary: 1.0,
} as const;

const MAX_QUERY_TOKENS = 12;

export interface LexicalSearchOptions {
  query: string;
  filter: VisibilityFilter;
  limit: number;
}

export function tokenizeForFts(input: string): string[] {
  return input
    .toLowerCase()
    .replace(/["'`]/g, " ")
    .split(/[^\p{L}\p{N}_]+/u)
    .map((token) => token.trim())
    .filter((token) => token.length > 0)
    .slice(0, MAX_QUERY_TOKENS);
}

export function buildMatchQuery(tokens: string[], mode: "and" | "or"): string {
  const connector = mode === "and" ? " AND " : " OR ";
  return tokens.map((token) => `"${token}"`).join(connector);
}

export function searchLexical(
  db: DbHandle,
  options: LexicalSearchOptions
): Ranking {
  const { query, filter, limit } = options;

  if (!query.trim() || limit <= 0) {
    return { source: "lex", hits: [] };
  }

  const tokens = tokenizeForFts(query);
  if (tokens.length === 0) {
    debug(() => `[LexicalSearch] Query produced no searchable tokens (len=${query.length})`);
    return { source: "lex", hits: [] };
  }

  const visibility = filter.clause("p");
  const { title, authors, abstract, summary } = LEXICAL_WEIGHTS;
  const sql = `
    SELECT
      p.id AS id,
      bm25(papers_fts, ${title}, ${authors}, ${abstract}, ${summary}) AS bm25_score
    FROM papers_fts
    JOIN papers p ON p.id = papers_fts.rowid
    WHERE papers_fts MATCH ?
      AND ${visibility.sql}
    ORDER BY bm25_score ASC, p.id ASC
    LIMIT ?
  `;

  const executeSearch = (matchQuery: string): Array<{ id: number; score: number }> => {
    const rows = db.db
      .prepare(sql)
      .all(matchQuery, ...visibility.params, limit) as Array<{ id: number; bm25_score: number }>;
    // bm25() is lower-is-better; flip it so higher means more relevant
    return rows.map((row) => ({ id: row.id, score: -row.bm25_score }));
  };

  try {
    let scored = executeSearch(buildMatchQuery(tokens, "and"));
    if (scored.length === 0 && tokens.length > 1) {
      debug(() => `[LexicalSearch] Strict match empty, relaxing to OR (${tokens.length} tokens)`);
      scored = executeSearch(buildMatchQuery(tokens, "or"));
    }
    return toRanking("lex", scored, limit);
  } catch (err) {
    error(() => `[LexicalSearch] FTS query error (queryLen=${query.length}): ${err}`);
    throw new CoreError(
      `Lexical search failed: ${err instanceof Error ? err.message : String(err)}`,
      "RETRIEVAL",
      err instanceof Error ? err : undefined
    );
  }
}
