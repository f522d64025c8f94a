import type { CoreContext } from "./context.js";
import type { Paper, Viewer } from "../types/paper.js";
import { fetchPaper, isValidId } from "./utils.js";
import { CoreError, describeError } from "./errors.js";
import { visibilityFor } from "../search/visibility.js";

/**
 * Fetch a single paper by ID.
 *
 * A private paper the viewer does not own is reported as absent, not as
 * forbidden, so its existence is not revealed.
 */
export async function getPaper(
  ctx: CoreContext,
  viewer: Viewer,
  id: number
): Promise<Paper | null> {
  if (!isValidId(id)) {
    throw new CoreError("Invalid paper ID", "VALIDATION");
  }

  let paper: Paper | null;
  try {
    paper = fetchPaper(ctx.db, id);
  } catch (error) {
    throw new CoreError(
      `Failed to fetch paper: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }

  if (!paper || !visibilityFor(viewer).allows(paper)) {
    return null;
  }
  return paper;
}
