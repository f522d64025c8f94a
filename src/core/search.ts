import type { CoreContext } from "./context.js";
import type { Viewer } from "../types/paper.js";
import type { SearchInput, SearchResponse, SearchResultItem } from "./types.js";
import { SearchInputSchema } from "./types.js";
import { CoreError, describeError } from "./errors.js";
import { formatZodError, loadTagsForPapers } from "./utils.js";
import { hybridSearch } from "../search/index.js";

interface EnrichmentRow {
  id: number;
  title: string;
  authors: string;
  summary: string;
  is_private: number;
  username: string;
  display_name: string | null;
  bio: string | null;
}

/**
 * Search papers visible to the viewer with lexical + semantic retrieval fused
 * by RRF, then attach tags and owner display data in fused order.
 *
 * @throws CoreError EMBEDDING_UNAVAILABLE when the query cannot be embedded
 *   and no lexical fallback is configured
 */
export async function search(
  ctx: CoreContext,
  viewer: Viewer,
  input: SearchInput
): Promise<SearchResponse> {
  const validation = SearchInputSchema.safeParse(input);
  if (!validation.success) {
    throw new CoreError(`Validation failed: ${formatZodError(validation.error)}`, "VALIDATION");
  }
  const { query, limit, offset, mode } = validation.data;

  const { hits, degraded } = await hybridSearch(
    { db: ctx.db, embedProvider: ctx.embedProvider, config: ctx.config.search },
    { query, viewer, limit, offset, mode }
  );

  if (hits.length === 0) {
    return { query, results: [], total: 0, degraded };
  }

  try {
    const ids = hits.map((hit) => hit.id);
    const placeholders = ids.map(() => "?").join(", ");
    const rows = ctx.db.db
      .prepare(`
        SELECT p.id, p.title, p.authors, p.summary, p.is_private,
               u.username, u.display_name, u.bio
        FROM papers p
        JOIN users u ON u.id = p.owner_id
        WHERE p.id IN (${placeholders})
      `)
      .all(...ids) as EnrichmentRow[];

    const byId = new Map(rows.map((row) => [row.id, row]));
    const tags = loadTagsForPapers(ctx.db, ids);

    const results: SearchResultItem[] = [];
    for (const hit of hits) {
      const row = byId.get(hit.id);
      // Deleted between retrieval and enrichment
      if (!row) continue;
      results.push({
        id: row.id,
        title: row.title,
        authors: row.authors,
        summary: row.summary,
        score: hit.score,
        source: hit.source,
        tags: tags.get(row.id) ?? [],
        isPrivate: row.is_private === 1,
        owner: {
          username: row.username,
          displayName: row.display_name,
          bio: row.bio,
        },
      });
    }

    return { query, results, total: results.length, degraded };
  } catch (error) {
    throw new CoreError(
      `Failed to load search results: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }
}
