import assert from "node:assert/strict";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import test from "node:test";
import { openDatabase, closeDatabase } from "../src/db/index.js";
import { runMigrations } from "../src/db/migrate.js";

test("openDatabase creates missing parent directories", () => {
  const dir = mkdtempSync(join(tmpdir(), "paperlog-db-"));
  try {
    const dbPath = join(dir, "nested", "deeper", "papers.db");
    const handle = openDatabase(dbPath);
    runMigrations(handle);
    closeDatabase(handle);
    closeDatabase(handle);

    assert.equal(existsSync(dbPath), true);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("migrations are idempotent and create the search tables", () => {
  const handle = openDatabase(":memory:");
  try {
    runMigrations(handle);
    runMigrations(handle);

    const names = (
      handle.db
        .prepare(`SELECT name FROM sqlite_master WHERE type IN ('table', 'trigger') ORDER BY name`)
        .all() as Array<{ name: string }>
    ).map((row) => row.name);

    for (const expected of ["embeddings", "paper_tags", "papers", "papers_fts", "papers_ai", "papers_ad", "papers_au", "tags", "users"]) {
      assert.ok(names.includes(expected), `missing ${expected}`);
    }

    const versions = handle.db.prepare(`SELECT COUNT(*) AS n FROM schema_migrations`).get() as { n: number };
    assert.equal(versions.n, 1);
  } finally {
    closeDatabase(handle);
  }
});

test("foreign keys are enforced", () => {
  const handle = openDatabase(":memory:");
  try {
    runMigrations(handle);
    assert.throws(() =>
      handle.db
        .prepare(`INSERT INTO papers (owner_id, title, authors, summary, created_at, updated_at) VALUES (42, 't', 'a', 's', 'x', 'x')`)
        .run()
    );
  } finally {
    closeDatabase(handle);
  }
});
