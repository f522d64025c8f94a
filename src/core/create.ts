import type { CoreContext } from "./context.js";
import type { CreatePaperInput, PaperResult } from "./types.js";
import { CreatePaperInputSchema } from "./types.js";
import { CoreError, describeError } from "./errors.js";
import { getUser } from "./users.js";
import {
  documentText,
  fetchPaper,
  formatZodError,
  normalizeTags,
  replacePaperTags,
} from "./utils.js";
import { embedDocument, writeEmbedding } from "./embedding-sync.js";

/**
 * Create a paper owned by `ownerId`.
 *
 * The document embedding is computed first; the paper row, its tag links, its
 * full-text entry (via trigger) and its embedding are then written in a single
 * transaction. If embedding fails the paper is still stored and stays
 * searchable lexically until reindexed.
 */
export async function createPaper(
  ctx: CoreContext,
  ownerId: number,
  input: CreatePaperInput
): Promise<PaperResult> {
  const validation = CreatePaperInputSchema.safeParse(input);
  if (!validation.success) {
    throw new CoreError(`Validation failed: ${formatZodError(validation.error)}`, "VALIDATION");
  }
  const data = validation.data;

  const owner = await getUser(ctx, ownerId);
  if (!owner) {
    throw new CoreError(`User ${ownerId} not found`, "NOT_FOUND");
  }

  const abstract = data.abstract && data.abstract.trim() ? data.abstract : null;
  const tags = normalizeTags(data.tags);
  const embedding = await embedDocument(
    ctx,
    `new paper "${data.title}"`,
    documentText(abstract, data.summary)
  );

  try {
    const now = new Date().toISOString();
    const insertPaper = ctx.db.db.prepare(`
      INSERT INTO papers (
        owner_id, title, authors, abstract, summary, arxiv_id, doi, paper_url,
        date_read, is_private, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const createTx = ctx.db.db.transaction((): number => {
      const info = insertPaper.run(
        ownerId,
        data.title,
        data.authors,
        abstract,
        data.summary,
        data.arxivId ?? null,
        data.doi ?? null,
        data.paperUrl ?? null,
        data.dateRead ?? null,
        data.isPrivate ? 1 : 0,
        now,
        now
      );
      const paperId = Number(info.lastInsertRowid);

      replacePaperTags(ctx.db, paperId, tags);
      if (embedding) {
        writeEmbedding(ctx, paperId, embedding, now);
      }
      return paperId;
    });

    const paperId = createTx();
    const paper = fetchPaper(ctx.db, paperId);
    if (!paper) {
      throw new CoreError(`Paper ${paperId} vanished after insert`, "DATABASE");
    }

    return { paper, embedded: embedding !== null };
  } catch (error) {
    if (error instanceof CoreError) {
      throw error;
    }

    throw new CoreError(
      `Failed to create paper: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }
}
