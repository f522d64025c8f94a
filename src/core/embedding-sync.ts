import type { CoreContext } from "./context.js";
import { CoreError } from "./errors.js";
import { embedChecked } from "../embed/guard.js";
import { encodeEmbedding } from "../embed/codec.js";
import { warn } from "../utils/logger.js";

export const EMBEDDING_SOURCE = "abstract_summary";

/**
 * Embed a paper's text ahead of its write transaction. A failure leaves the
 * paper without an embedding until the next reindex.
 */
export async function embedDocument(
  ctx: CoreContext,
  paperLabel: string,
  text: string
): Promise<number[] | null> {
  try {
    return await embedChecked(ctx.embedProvider, text, "document", ctx.config.search.embedTimeoutMs);
  } catch (error) {
    warn(
      `Failed to generate embedding for ${paperLabel}: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }
}

export function writeEmbedding(
  ctx: CoreContext,
  paperId: number,
  vector: readonly number[],
  embeddedAt: string
): void {
  if (vector.length !== ctx.embedProvider.dimensions) {
    throw new CoreError(
      `Embedding for paper ${paperId} has ${vector.length} dimensions, expected ${ctx.embedProvider.dimensions}`,
      "DIMENSION_MISMATCH"
    );
  }

  ctx.db.db
    .prepare(`
      INSERT OR REPLACE INTO embeddings (paper_id, vector, dimensions, model, source, embedded_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `)
    .run(
      paperId,
      encodeEmbedding(vector),
      vector.length,
      ctx.embedProvider.model,
      EMBEDDING_SOURCE,
      embeddedAt
    );
}

export function deleteEmbedding(ctx: CoreContext, paperId: number): void {
  ctx.db.db.prepare(`DELETE FROM embeddings WHERE paper_id = ?`).run(paperId);
}
