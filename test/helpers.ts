import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { openDatabase, closeDatabase, type DbHandle } from "../src/db/index.js";
import { runMigrations } from "../src/db/migrate.js";
import { createDefaultConfig } from "../src/config/loadConfig.js";
import type { AppConfig } from "../src/config/schema.js";
import { encodeEmbedding } from "../src/embed/codec.js";
import type {
  EmbeddingProvider,
  EmbeddingRole,
  EmbedRequest,
  EmbedResult,
} from "../src/embed/types.js";
import { createCoreContext, type CoreContext } from "../src/core/index.js";

export function createTestDb(): { handle: DbHandle; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "paperlog-test-"));
  const dbPath = join(dir, "test.db");
  const handle = openDatabase(dbPath);
  runMigrations(handle);

  return {
    handle,
    cleanup: () => {
      closeDatabase(handle);
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

const KEYWORD_AXES = ["graph", "vision", "language", "audio"] as const;

/**
 * One axis per keyword the text mentions. Texts mentioning none share a
 * small constant direction.
 */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  const vector = KEYWORD_AXES.map((axis) => (lower.includes(axis) ? 1 : 0));
  return vector.some((value) => value !== 0) ? vector : [0.1, 0.1, 0.1, 0.1];
}

export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly model = "stub-embed";
  readonly calls: Array<{ text: string; role: EmbeddingRole }> = [];
  failWith: Error | null = null;
  hang = false;

  constructor(
    readonly dimensions: number = KEYWORD_AXES.length,
    private readonly vectorFor: (text: string) => number[] = keywordVector
  ) {}

  async initialize(): Promise<void> {}

  async embed(text: string, role: EmbeddingRole): Promise<number[]> {
    this.calls.push({ text, role });
    if (this.hang) {
      return new Promise<number[]>(() => {});
    }
    if (this.failWith) {
      throw this.failWith;
    }
    return this.vectorFor(text);
  }

  async embedBatch(requests: EmbedRequest[], role: EmbeddingRole): Promise<EmbedResult[]> {
    const results: EmbedResult[] = [];
    for (const request of requests) {
      const embedding = await this.embed(request.text, role);
      results.push({ id: request.id, embedding, dimensions: embedding.length });
    }
    return results;
  }

  async healthCheck(): Promise<boolean> {
    return this.failWith === null;
  }

  async dispose(): Promise<void> {}
}

export interface TestContext {
  ctx: CoreContext;
  handle: DbHandle;
  embedder: StubEmbeddingProvider;
  config: AppConfig;
  cleanup: () => void;
}

export function createTestContext(
  configure: (config: AppConfig) => void = () => {}
): TestContext {
  const { handle, cleanup } = createTestDb();
  const embedder = new StubEmbeddingProvider();
  const config = createDefaultConfig();
  config.ai.embedding.dimensions = embedder.dimensions;
  configure(config);

  const ctx = createCoreContext({ db: handle, embedProvider: embedder, config });
  return { ctx, handle, embedder, config, cleanup };
}

export function insertUser(handle: DbHandle, username: string): number {
  const info = handle.db
    .prepare(`INSERT INTO users (username, display_name, created_at) VALUES (?, ?, ?)`)
    .run(username, null, new Date().toISOString());
  return Number(info.lastInsertRowid);
}

export interface SeedPaper {
  ownerId: number;
  title: string;
  authors?: string;
  abstract?: string | null;
  summary: string;
  isPrivate?: boolean;
  vector?: number[];
}

/**
 * Insert papers straight into the tables, bypassing the core write path.
 * Returns the new ids in input order.
 */
export function seedPapers(handle: DbHandle, papers: SeedPaper[]): number[] {
  const now = new Date().toISOString();
  const insertPaper = handle.db.prepare(`
    INSERT INTO papers (owner_id, title, authors, abstract, summary, is_private, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const insertEmbedding = handle.db.prepare(`
    INSERT INTO embeddings (paper_id, vector, dimensions, model, embedded_at)
    VALUES (?, ?, ?, 'stub-embed', ?)
  `);

  return handle.db.transaction(() =>
    papers.map((paper) => {
      const info = insertPaper.run(
        paper.ownerId,
        paper.title,
        paper.authors ?? "A. Author",
        paper.abstract ?? null,
        paper.summary,
        paper.isPrivate ? 1 : 0,
        now,
        now
      );
      const id = Number(info.lastInsertRowid);
      if (paper.vector) {
        insertEmbedding.run(id, encodeEmbedding(paper.vector), paper.vector.length, now);
      }
      return id;
    })
  )();
}
