import { ZodError } from "zod";
import type { CoreContext } from "./context.js";
import type { Viewer } from "../types/paper.js";
import type { ListPapersFilters, ListResult } from "./types.js";
import { ListPapersFiltersSchema } from "./types.js";
import { CoreError, describeError } from "./errors.js";
import { PAPER_COLUMNS, loadTagsForPapers, mapRowToPaper, type PaperRow } from "./utils.js";
import { visibilityFor } from "../search/visibility.js";

/**
 * List papers visible to the viewer, newest first.
 */
export async function listPapers(
  ctx: CoreContext,
  viewer: Viewer,
  filters: ListPapersFilters = {}
): Promise<ListResult> {
  try {
    const parsed = ListPapersFiltersSchema.parse(filters);
    const { limit, offset } = parsed;

    const visibility = visibilityFor(viewer).clause("p");
    const conditions: string[] = [visibility.sql];
    const params: Array<string | number> = [...visibility.params];

    if (parsed.ownerId !== undefined) {
      conditions.push("p.owner_id = ?");
      params.push(parsed.ownerId);
    }

    if (parsed.tag) {
      conditions.push(`
        EXISTS (
          SELECT 1 FROM paper_tags pt JOIN tags t ON t.id = pt.tag_id
          WHERE pt.paper_id = p.id AND t.name = ?
        )
      `);
      params.push(parsed.tag.toLowerCase());
    }

    const whereClause = `WHERE ${conditions.join(" AND ")}`;

    const countRow = ctx.db.db
      .prepare(`SELECT COUNT(*) as total FROM papers p ${whereClause}`)
      .get(...params) as { total: number };

    const rows = ctx.db.db
      .prepare(`
        SELECT ${PAPER_COLUMNS}
        FROM papers p
        ${whereClause}
        ORDER BY p.created_at DESC, p.id DESC
        LIMIT ? OFFSET ?
      `)
      .all(...params, limit, offset) as PaperRow[];

    const tags = loadTagsForPapers(ctx.db, rows.map((row) => row.id));

    return {
      items: rows.map((row) => mapRowToPaper(row, tags.get(row.id) ?? [])),
      total: countRow.total,
      limit,
      offset,
    };
  } catch (error) {
    if (error instanceof CoreError) {
      throw error;
    }

    if (error instanceof ZodError) {
      throw new CoreError("Invalid list filters", "VALIDATION", error);
    }

    throw new CoreError(
      `Failed to list papers: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }
}
