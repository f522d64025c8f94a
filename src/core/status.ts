import type { CoreContext } from "./context.js";
import type { IndexStatus } from "./types.js";
import { CoreError, describeError } from "./errors.js";

/**
 * Corpus and embedding coverage counts.
 */
export async function status(ctx: CoreContext): Promise<IndexStatus> {
  try {
    const row = ctx.db.db
      .prepare(`
        SELECT
          COUNT(*) AS total,
          COUNT(e.paper_id) AS embedded,
          SUM(CASE WHEN e.paper_id IS NOT NULL AND e.dimensions != ? THEN 1 ELSE 0 END) AS stale,
          MAX(p.updated_at) AS last_updated
        FROM papers p
        LEFT JOIN embeddings e ON e.paper_id = p.id
      `)
      .get(ctx.embedProvider.dimensions) as {
        total: number;
        embedded: number;
        stale: number | null;
        last_updated: string | null;
      };

    return {
      totalPapers: row.total,
      embeddedPapers: row.embedded,
      pendingEmbeddings: row.total - row.embedded,
      staleEmbeddings: row.stale ?? 0,
      lastUpdatedAt: row.last_updated,
    };
  } catch (error) {
    throw new CoreError(
      `Failed to get status: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }
}
