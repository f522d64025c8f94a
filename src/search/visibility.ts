import type { Viewer } from "../types/paper.js";

/**
 * The privacy rule for every read path: public papers, plus the viewer's own
 * private ones. Built once per request and handed to each retrieval call so
 * the SQL and in-memory forms cannot drift apart.
 */
export interface VisibilityFilter {
  readonly viewerId: number | null;
  /** SQL condition over a `papers` table aliased as `alias`. */
  clause(alias?: string): { sql: string; params: number[] };
  allows(paper: { isPrivate: boolean; ownerId: number }): boolean;
}

export function visibilityFor(viewer: Viewer): VisibilityFilter {
  const viewerId = viewer ? viewer.id : null;

  return {
    viewerId,
    clause(alias = "p") {
      if (viewerId === null) {
        return { sql: `${alias}.is_private = 0`, params: [] };
      }
      return {
        sql: `(${alias}.is_private = 0 OR ${alias}.owner_id = ?)`,
        params: [viewerId],
      };
    },
    allows(paper) {
      return !paper.isPrivate || (viewerId !== null && paper.ownerId === viewerId);
    },
  };
}
