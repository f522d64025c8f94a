import type { z } from "zod";
import type { CoreContext } from "./context.js";
import type { PaperResult, UpdatePaperInput } from "./types.js";
import { UpdatePaperInputSchema } from "./types.js";
import { CoreError, describeError } from "./errors.js";
import {
  documentText,
  fetchPaper,
  fetchPaperRow,
  formatZodError,
  isValidId,
  normalizeTags,
  replacePaperTags,
  type PaperRow,
} from "./utils.js";
import { deleteEmbedding, embedDocument, writeEmbedding } from "./embedding-sync.js";

type UpdatePatch = z.output<typeof UpdatePaperInputSchema>;

function nextText(row: PaperRow, data: UpdatePatch): { abstract: string | null; summary: string } {
  const abstract =
    data.abstract === undefined
      ? row.abstract
      : data.abstract && data.abstract.trim()
        ? data.abstract
        : null;
  return { abstract, summary: data.summary ?? row.summary };
}

function requireEditable(row: PaperRow | undefined, actorId: number, id: number): PaperRow {
  if (!row) {
    throw new CoreError(`Paper ${id} not found`, "NOT_FOUND");
  }
  if (row.owner_id !== actorId) {
    throw new CoreError("You don't have permission to edit this paper", "FORBIDDEN");
  }
  return row;
}

/**
 * Update a paper. Only its owner may edit it.
 *
 * The embedding is computed before the transaction. The patch is then merged
 * against the row as it stands inside the transaction, so overlapping updates
 * keep each other's fields. The new vector is only stored if the merged text
 * is the text that was embedded; a vector left describing other text is dropped.
 */
export async function updatePaper(
  ctx: CoreContext,
  actorId: number,
  id: number,
  input: UpdatePaperInput
): Promise<PaperResult> {
  if (!isValidId(id)) {
    throw new CoreError("Invalid paper ID", "VALIDATION");
  }

  const validation = UpdatePaperInputSchema.safeParse(input);
  if (!validation.success) {
    throw new CoreError(`Validation failed: ${formatZodError(validation.error)}`, "VALIDATION");
  }
  const data = validation.data;

  const snapshot = requireEditable(fetchPaperRow(ctx.db, id), actorId, id);
  const planned = nextText(snapshot, data);
  const textChanged = planned.abstract !== snapshot.abstract || planned.summary !== snapshot.summary;

  const hasEmbedding =
    ctx.db.db.prepare(`SELECT 1 FROM embeddings WHERE paper_id = ?`).get(id) !== undefined;
  const embeddedText = documentText(planned.abstract, planned.summary);
  const embedding =
    textChanged || !hasEmbedding ? await embedDocument(ctx, `paper ${id}`, embeddedText) : null;

  try {
    const now = new Date().toISOString();
    const updateTx = ctx.db.db.transaction(() => {
      const current = requireEditable(fetchPaperRow(ctx.db, id), actorId, id);
      const merged = nextText(current, data);

      ctx.db.db
        .prepare(`
          UPDATE papers SET
            title = ?, authors = ?, abstract = ?, summary = ?, arxiv_id = ?,
            doi = ?, paper_url = ?, date_read = ?, is_private = ?, updated_at = ?
          WHERE id = ?
        `)
        .run(
          data.title ?? current.title,
          data.authors ?? current.authors,
          merged.abstract,
          merged.summary,
          data.arxivId === undefined ? current.arxiv_id : data.arxivId,
          data.doi === undefined ? current.doi : data.doi,
          data.paperUrl === undefined ? current.paper_url : data.paperUrl,
          data.dateRead === undefined ? current.date_read : data.dateRead,
          data.isPrivate === undefined ? current.is_private : data.isPrivate ? 1 : 0,
          now,
          id
        );

      if (data.tags !== undefined) {
        replacePaperTags(ctx.db, id, normalizeTags(data.tags));
      }

      const mergedText = documentText(merged.abstract, merged.summary);
      if (embedding && mergedText === embeddedText) {
        writeEmbedding(ctx, id, embedding, now);
      } else if (mergedText !== documentText(current.abstract, current.summary)) {
        deleteEmbedding(ctx, id);
      }
    });

    updateTx();

    const paper = fetchPaper(ctx.db, id);
    if (!paper) {
      throw new CoreError(`Paper ${id} vanished during update`, "DATABASE");
    }

    const embedded =
      ctx.db.db.prepare(`SELECT 1 FROM embeddings WHERE paper_id = ?`).get(id) !== undefined;
    return { paper, embedded };
  } catch (error) {
    if (error instanceof CoreError) {
      throw error;
    }

    throw new CoreError(
      `Failed to update paper: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }
}
