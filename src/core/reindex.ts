import type { CoreContext } from "./context.js";
import type { ReindexResult } from "./types.js";
import { CoreError, describeError } from "./errors.js";
import { documentText } from "./utils.js";
import { writeEmbedding } from "./embedding-sync.js";
import { assertUsableEmbedding, withTimeout } from "../embed/guard.js";
import { error as logError, info } from "../utils/logger.js";

interface ReindexOptions {
  /** Re-embed every paper, not just missing or wrong-dimension ones */
  force?: boolean;
}

interface ReindexRow {
  id: number;
  abstract: string | null;
  summary: string;
}

/**
 * Embed papers that have no usable embedding: never embedded, embedding
 * failed at write time, or stored with a different dimension than the
 * current model produces.
 */
export async function reindex(
  ctx: CoreContext,
  options: ReindexOptions = {}
): Promise<ReindexResult> {
  const startTime = Date.now();
  const result: ReindexResult = {
    processed: 0,
    errors: 0,
    duration: 0,
  };

  let papers: ReindexRow[];
  try {
    papers = ctx.db.db
      .prepare(
        options.force
          ? `SELECT p.id, p.abstract, p.summary FROM papers p ORDER BY p.id`
          : `
            SELECT p.id, p.abstract, p.summary
            FROM papers p
            LEFT JOIN embeddings e ON e.paper_id = p.id
            WHERE e.paper_id IS NULL OR e.dimensions != ?
            ORDER BY p.id
          `
      )
      .all(...(options.force ? [] : [ctx.embedProvider.dimensions])) as ReindexRow[];
  } catch (error) {
    throw new CoreError(
      `Reindex failed: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }

  const batchSize = ctx.config.ai.embedding.batchSize || 8;
  info(() => `[Reindex] ${papers.length} paper(s) to embed in batches of ${batchSize}`);

  for (let i = 0; i < papers.length; i += batchSize) {
    const batch = papers.slice(i, i + batchSize);

    try {
      await reindexBatch(ctx, batch);
      result.processed += batch.length;
    } catch (error) {
      result.errors += batch.length;
      logError(
        `[Reindex] Failed batch (papers ${batch.map((p) => p.id).join(", ")}): ${describeError(error)}`
      );
    }
  }

  result.duration = Date.now() - startTime;
  return result;
}

async function reindexBatch(ctx: CoreContext, papers: ReindexRow[]): Promise<void> {
  const embeddings = await withTimeout(
    ctx.embedProvider.embedBatch(
      papers.map((paper) => ({
        id: String(paper.id),
        text: documentText(paper.abstract, paper.summary),
      })),
      "document"
    ),
    ctx.config.search.embedTimeoutMs * papers.length,
    "Batch embedding"
  );
  const embeddingMap = new Map(embeddings.map((e) => [e.id, e.embedding]));

  const prepared = papers.map((paper) => {
    const embedding = embeddingMap.get(String(paper.id));
    if (!embedding) {
      throw new CoreError(`Missing embedding for paper ${paper.id}`, "EMBEDDING_UNAVAILABLE");
    }
    assertUsableEmbedding(embedding, ctx.embedProvider.dimensions);
    return { id: paper.id, embedding };
  });

  const now = new Date().toISOString();
  ctx.db.db.transaction(() => {
    for (const paper of prepared) {
      writeEmbedding(ctx, paper.id, paper.embedding, now);
    }
  })();
}
