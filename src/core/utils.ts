import type { ZodError } from "zod";
import type { DbHandle } from "../db/index.js";
import type { Paper, User } from "../types/paper.js";

/**
 * Database row shape for papers queries
 */
export interface PaperRow {
  id: number;
  owner_id: number;
  title: string;
  authors: string;
  abstract: string | null;
  summary: string;
  arxiv_id: string | null;
  doi: string | null;
  paper_url: string | null;
  date_read: string | null;
  is_private: number;
  created_at: string;
  updated_at: string;
}

export const PAPER_COLUMNS = `
  p.id, p.owner_id, p.title, p.authors, p.abstract, p.summary,
  p.arxiv_id, p.doi, p.paper_url, p.date_read, p.is_private,
  p.created_at, p.updated_at
`;

export interface UserRow {
  id: number;
  username: string;
  display_name: string | null;
  bio: string | null;
  created_at: string;
}

export function mapRowToPaper(row: PaperRow, tags: string[]): Paper {
  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    authors: row.authors,
    abstract: row.abstract,
    summary: row.summary,
    arxivId: row.arxiv_id,
    doi: row.doi,
    paperUrl: row.paper_url,
    dateRead: row.date_read,
    isPrivate: row.is_private === 1,
    tags,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    displayName: row.display_name,
    bio: row.bio,
    createdAt: row.created_at,
  };
}

/**
 * Trim, lower-case, drop blanks and duplicates, keeping first-seen order.
 */
export function normalizeTags(names: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const name of names) {
    const normalized = name.trim().toLowerCase();
    if (normalized) {
      seen.add(normalized);
    }
  }
  return [...seen];
}

/**
 * Replace a paper's tag links. Call inside the paper's write transaction.
 */
export function replacePaperTags(handle: DbHandle, paperId: number, tags: string[]): void {
  const { db } = handle;
  const insertTag = db.prepare(`INSERT OR IGNORE INTO tags (name) VALUES (?)`);
  const selectTag = db.prepare(`SELECT id FROM tags WHERE name = ?`);
  const link = db.prepare(`INSERT OR IGNORE INTO paper_tags (paper_id, tag_id) VALUES (?, ?)`);

  db.prepare(`DELETE FROM paper_tags WHERE paper_id = ?`).run(paperId);

  for (const name of tags) {
    insertTag.run(name);
    const tag = selectTag.get(name) as { id: number };
    link.run(paperId, tag.id);
  }
}

export function loadTagsForPapers(handle: DbHandle, paperIds: number[]): Map<number, string[]> {
  const result = new Map<number, string[]>();
  if (paperIds.length === 0) return result;

  const unique = [...new Set(paperIds)];
  const placeholders = unique.map(() => "?").join(", ");
  const rows = handle.db
    .prepare(`
      SELECT pt.paper_id, t.name
      FROM paper_tags pt
      JOIN tags t ON t.id = pt.tag_id
      WHERE pt.paper_id IN (${placeholders})
      ORDER BY t.name
    `)
    .all(...unique) as Array<{ paper_id: number; name: string }>;

  for (const row of rows) {
    const tags = result.get(row.paper_id);
    if (tags) {
      tags.push(row.name);
    } else {
      result.set(row.paper_id, [row.name]);
    }
  }

  return result;
}

export function fetchPaperRow(handle: DbHandle, id: number): PaperRow | undefined {
  return handle.db
    .prepare(`SELECT ${PAPER_COLUMNS} FROM papers p WHERE p.id = ?`)
    .get(id) as PaperRow | undefined;
}

export function fetchPaper(handle: DbHandle, id: number): Paper | null {
  const row = fetchPaperRow(handle, id);
  if (!row) return null;
  return mapRowToPaper(row, loadTagsForPapers(handle, [id]).get(id) ?? []);
}

/**
 * The text a paper is embedded from: abstract and summary, or the summary
 * alone when there is no abstract.
 */
export function documentText(abstract: string | null | undefined, summary: string): string {
  const parts: string[] = [];
  if (abstract && abstract.trim()) {
    parts.push(abstract.trim());
  }
  parts.push(summary.trim());
  return parts.join("\n\n");
}

export function formatZodError(error: ZodError): string {
  return error.errors
    .map((e) => `${e.path.join(".") || "input"}: ${e.message}`)
    .join(", ");
}

export function isValidId(id: number): boolean {
  return Number.isInteger(id) && id > 0;
}
