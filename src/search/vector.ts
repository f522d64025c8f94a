import type { DbHandle } from "../db/index.js";
import type { VisibilityFilter } from "./visibility.js";
import { toRanking, type Ranking } from "./types.js";
import { decodeEmbedding, embeddingDimensions } from "../embed/codec.js";
import { CoreError } from "../core/errors.js";
import { error, warn } from "../utils/logger.js";

export interface VectorSearchOptions {
  vector: ArrayLike<number>;
  filter: VisibilityFilter;
  limit: number;
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Exact nearest-neighbour scan over every visible stored embedding. Papers
 * without an embedding have no row and are never candidates.
 */
export function searchVector(
  db: DbHandle,
  options: VectorSearchOptions
): Ranking {
  const { vector, filter, limit } = options;

  if (vector.length === 0 || limit <= 0) {
    return { source: "vec", hits: [] };
  }

  const visibility = filter.clause("p");
  let rows: Array<{ paper_id: number; vector: Buffer }>;
  try {
    rows = db.db
      .prepare(`
        SELECT e.paper_id, e.vector
        FROM embeddings e
        JOIN papers p ON p.id = e.paper_id
        WHERE ${visibility.sql}
        ORDER BY e.paper_id
      `)
      .all(...visibility.params) as Array<{ paper_id: number; vector: Buffer }>;
  } catch (err) {
    error(() => `[VectorSearch] Failed loading embeddings: ${err}`);
    throw new CoreError(
      `Vector search failed: ${err instanceof Error ? err.message : String(err)}`,
      "RETRIEVAL",
      err instanceof Error ? err : undefined
    );
  }

  const scored: Array<{ id: number; score: number }> = [];
  const mismatched: number[] = [];

  for (const row of rows) {
    if (row.vector.byteLength % 4 !== 0 || embeddingDimensions(row.vector) !== vector.length) {
      mismatched.push(row.paper_id);
      continue;
    }
    const stored = decodeEmbedding(row.vector);
    scored.push({ id: row.paper_id, score: cosineSimilarity(vector, stored) });
  }

  if (mismatched.length > 0) {
    warn(
      `[VectorSearch] Skipped ${mismatched.length} embedding(s) with wrong dimensions (expected ${vector.length}): papers ${mismatched.slice(0, 10).join(", ")}${mismatched.length > 10 ? ", ..." : ""}`
    );
  }

  return toRanking("vec", scored, limit);
}
