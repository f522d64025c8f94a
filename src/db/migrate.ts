import type { DbHandle } from "./index.js";

function isApplied(handle: DbHandle, version: number): boolean {
  const row = handle.db
    .prepare(`SELECT 1 FROM schema_migrations WHERE version = ?`)
    .get(version);
  return row !== undefined;
}

function markApplied(handle: DbHandle, version: number): void {
  handle.db
    .prepare(`
      INSERT INTO schema_migrations (version, applied_at)
      VALUES (?, datetime('now'))
    `)
    .run(version);
}

export function runMigrations(handle: DbHandle): void {
  const { db } = handle;

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    );
  `);

  if (isApplied(handle, 1)) {
    return;
  }

  const migrate = db.transaction(() => {
    db.exec(`
      CREATE TABLE users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE,
        display_name TEXT,
        bio TEXT,
        created_at TEXT NOT NULL
      );
    `);

    db.exec(`
      CREATE TABLE papers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        owner_id INTEGER NOT NULL,
        title TEXT NOT NULL,
        authors TEXT NOT NULL,
        abstract TEXT,
        summary TEXT NOT NULL,
        arxiv_id TEXT,
        doi TEXT,
        paper_url TEXT,
        date_read TEXT,
        is_private INTEGER NOT NULL DEFAULT 0 CHECK(is_private IN (0, 1)),
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        FOREIGN KEY (owner_id) REFERENCES users(id) ON DELETE CASCADE
      );
    `);

    db.exec(`CREATE INDEX idx_papers_owner ON papers(owner_id);`);
    db.exec(`CREATE INDEX idx_papers_is_private ON papers(is_private);`);
    db.exec(`CREATE INDEX idx_papers_created_at ON papers(created_at);`);

    db.exec(`
      CREATE TABLE tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE
      );
    `);

    db.exec(`
      CREATE TABLE paper_tags (
        paper_id INTEGER NOT NULL,
        tag_id INTEGER NOT NULL,
        PRIMARY KEY (paper_id, tag_id),
        FOREIGN KEY (paper_id) REFERENCES papers(id) ON DELETE CASCADE,
        FOREIGN KEY (tag_id) REFERENCES tags(id) ON DELETE CASCADE
      );
    `);

    // One vector per paper, float32 little-endian
    db.exec(`
      CREATE TABLE embeddings (
        paper_id INTEGER PRIMARY KEY,
        vector BLOB NOT NULL,
        dimensions INTEGER NOT NULL,
        model TEXT NOT NULL,
        source TEXT NOT NULL DEFAULT 'abstract_summary',
        embedded_at TEXT NOT NULL,
        FOREIGN KEY (paper_id) REFERENCES papers(id) ON DELETE CASCADE
      );
    `);

    db.exec(`
      CREATE VIRTUAL TABLE papers_fts USING fts5(
        title,
        authors,
        abstract,
        summary,
        tokenize='porter unicode61'
      );
    `);

    // rowid of papers_fts is the paper id
    db.exec(`
      CREATE TRIGGER papers_ai AFTER INSERT ON papers
      BEGIN
        INSERT INTO papers_fts(rowid, title, authors, abstract, summary)
        VALUES (new.id, new.title, new.authors, COALESCE(new.abstract, ''), new.summary);
      END;
    `);

    db.exec(`
      CREATE TRIGGER papers_ad AFTER DELETE ON papers
      BEGIN
        DELETE FROM papers_fts WHERE rowid = old.id;
      END;
    `);

    db.exec(`
      CREATE TRIGGER papers_au AFTER UPDATE OF title, authors, abstract, summary ON papers
      BEGIN
        DELETE FROM papers_fts WHERE rowid = old.id;
        INSERT INTO papers_fts(rowid, title, authors, abstract, summary)
        VALUES (new.id, new.title, new.authors, COALESCE(new.abstract, ''), new.summary);
      END;
    `);

    markApplied(handle, 1);
  });

  migrate();
}
