import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export interface DbHandle {
  db: Database.Database;
}

// The CLI and a running MCP server may hold the same file open.
const BUSY_TIMEOUT_MS = 5_000;

/**
 * Open (creating if needed) the SQLite store. `:memory:` skips the directory
 * and WAL setup.
 */
export function openDatabase(path: string): DbHandle {
  const inMemory = path === ":memory:";
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  return { db };
}

export function closeDatabase(handle: DbHandle): void {
  if (handle.db.open) {
    handle.db.close();
  }
}
