import type { CoreContext } from "./context.js";
import { isValidId, fetchPaperRow } from "./utils.js";
import { CoreError, describeError } from "./errors.js";

/**
 * Delete a paper. Its full-text entry goes with it through the delete
 * trigger; embedding and tag links cascade.
 *
 * @returns false if the paper did not exist
 * @throws CoreError FORBIDDEN when the actor does not own the paper
 */
export async function deletePaper(
  ctx: CoreContext,
  actorId: number,
  id: number
): Promise<boolean> {
  if (!isValidId(id)) {
    throw new CoreError("Invalid paper ID", "VALIDATION");
  }

  const row = fetchPaperRow(ctx.db, id);
  if (!row) {
    return false;
  }

  if (row.owner_id !== actorId) {
    throw new CoreError("You don't have permission to delete this paper", "FORBIDDEN");
  }

  try {
    ctx.db.db.transaction(() => {
      ctx.db.db.prepare(`DELETE FROM papers WHERE id = ?`).run(id);
    })();
    return true;
  } catch (error) {
    throw new CoreError(
      `Failed to delete paper: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }
}
