import assert from "node:assert/strict";
import test from "node:test";
import { buildMatchQuery, searchLexical, tokenizeForFts } from "../src/search/lexical.js";
import { visibilityFor } from "../src/search/visibility.js";
import { createTestDb, insertUser, seedPapers } from "./helpers.js";

const anonymous = visibilityFor(null);

function seedFiller(handle: Parameters<typeof seedPapers>[0], ownerId: number): void {
  seedPapers(handle, [
    { ownerId, title: "Protein folding benchmarks", summary: "Structure prediction results" },
    { ownerId, title: "Reinforcement learning review", summary: "Policy gradients and value methods" },
    { ownerId, title: "Compiler optimisation passes", summary: "Loop unrolling and inlining" },
  ]);
}

test("title matches outrank summary matches", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    const [inSummary, inTitle] = seedPapers(handle, [
      { ownerId: owner, title: "Sequence models survey", summary: "We review the transformer architecture" },
      { ownerId: owner, title: "The transformer explained", summary: "We review sequence architectures broadly" },
    ]);
    seedFiller(handle, owner);

    const ranking = searchLexical(handle, { query: "transformer", filter: anonymous, limit: 10 });

    assert.equal(ranking.source, "lex");
    assert.deepEqual(ranking.hits.map((h) => h.id), [inTitle, inSummary]);
    assert.deepEqual(ranking.hits.map((h) => h.rank), [1, 2]);
    assert.ok(ranking.hits[0].score > ranking.hits[1].score);
  } finally {
    cleanup();
  }
});

test("author matches outrank abstract matches", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    const [inAbstract, inAuthors] = seedPapers(handle, [
      { ownerId: owner, title: "Kernel methods", authors: "J. Smith", abstract: "Following Lovelace we extend kernels", summary: "Notes" },
      { ownerId: owner, title: "Kernel tricks", authors: "A. Lovelace", abstract: "We extend kernels to graphs", summary: "Notes" },
    ]);
    seedFiller(handle, owner);

    const ranking = searchLexical(handle, { query: "lovelace", filter: anonymous, limit: 10 });
    assert.deepEqual(ranking.hits.map((h) => h.id), [inAuthors, inAbstract]);
  } finally {
    cleanup();
  }
});

test("lexical handles punctuation-heavy query safely", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    const [id] = seedPapers(handle, [
      { ownerId: owner, title: "OAuth token flow", summary: "Use oauth2 token exchange in the gateway" },
    ]);

    const ranking = searchLexical(handle, {
      query: `oauth2/token (exchange) "gateway" AND NOT*`,
      filter: anonymous,
      limit: 10,
    });

    assert.deepEqual(ranking.hits.map((h) => h.id), [id]);
  } finally {
    cleanup();
  }
});

test("lexical returns empty for empty or non-tokenizable queries", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    seedPapers(handle, [{ ownerId: owner, title: "A", summary: "B" }]);

    assert.deepEqual(searchLexical(handle, { query: "/// --- !!!", filter: anonymous, limit: 10 }).hits, []);
    assert.deepEqual(searchLexical(handle, { query: "   ", filter: anonymous, limit: 10 }).hits, []);
  } finally {
    cleanup();
  }
});

test("single-character terms are searchable", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    const [rPaper] = seedPapers(handle, [
      { ownerId: owner, title: "Tidy data in R", summary: "Data frames and pipes" },
      { ownerId: owner, title: "Graph kernels", summary: "Walk based similarity" },
    ]);

    assert.deepEqual(
      searchLexical(handle, { query: "R", filter: anonymous, limit: 10 }).hits.map((h) => h.id),
      [rPaper]
    );
  } finally {
    cleanup();
  }
});

test("lexical falls back from strict AND to OR when needed", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    const [id] = seedPapers(handle, [
      { ownerId: owner, title: "Postgres internals", summary: "We chose postgres as the storage backend" },
    ]);

    const ranking = searchLexical(handle, {
      query: "postgres nonexistenttoken",
      filter: anonymous,
      limit: 10,
    });

    assert.deepEqual(ranking.hits.map((h) => h.id), [id]);
  } finally {
    cleanup();
  }
});

test("stemming matches inflected forms", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    const [id] = seedPapers(handle, [
      { ownerId: owner, title: "Learning embeddings", summary: "Training runs" },
    ]);

    const ranking = searchLexical(handle, { query: "learned embedding", filter: anonymous, limit: 10 });
    assert.deepEqual(ranking.hits.map((h) => h.id), [id]);
  } finally {
    cleanup();
  }
});

test("private papers are only matched for their owner", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const alice = insertUser(handle, "alice");
    const bob = insertUser(handle, "bob");
    const [publicId, privateId] = seedPapers(handle, [
      { ownerId: alice, title: "Diffusion models", summary: "Public notes" },
      { ownerId: bob, title: "Diffusion sampling", summary: "Private notes", isPrivate: true },
    ]);

    const ids = (viewer: { id: number } | null) =>
      searchLexical(handle, { query: "diffusion", filter: visibilityFor(viewer), limit: 10 })
        .hits.map((h) => h.id)
        .sort((a, b) => a - b);

    assert.deepEqual(ids(null), [publicId]);
    assert.deepEqual(ids({ id: alice }), [publicId]);
    assert.deepEqual(ids({ id: bob }), [publicId, privateId]);
  } finally {
    cleanup();
  }
});

test("lexical respects the limit", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    seedPapers(handle, [
      { ownerId: owner, title: "Attention one", summary: "x" },
      { ownerId: owner, title: "Attention two", summary: "y" },
      { ownerId: owner, title: "Attention three", summary: "z" },
    ]);

    const ranking = searchLexical(handle, { query: "attention", filter: anonymous, limit: 2 });
    assert.equal(ranking.hits.length, 2);
    assert.deepEqual(searchLexical(handle, { query: "attention", filter: anonymous, limit: 0 }).hits, []);
  } finally {
    cleanup();
  }
});

test("full-text entries follow paper updates and deletes", () => {
  const { handle, cleanup } = createTestDb();
  try {
    const owner = insertUser(handle, "ada");
    const [id] = seedPapers(handle, [{ ownerId: owner, title: "Capsule networks", summary: "Routing" }]);

    handle.db.prepare(`UPDATE papers SET title = ? WHERE id = ?`).run("Hypernetworks", id);
    assert.deepEqual(searchLexical(handle, { query: "capsule", filter: anonymous, limit: 10 }).hits, []);
    assert.deepEqual(
      searchLexical(handle, { query: "hypernetworks", filter: anonymous, limit: 10 }).hits.map((h) => h.id),
      [id]
    );

    handle.db.prepare(`DELETE FROM papers WHERE id = ?`).run(id);
    assert.deepEqual(searchLexical(handle, { query: "hypernetworks", filter: anonymous, limit: 10 }).hits, []);
    const row = handle.db.prepare(`SELECT COUNT(*) AS n FROM papers_fts`).get() as { n: number };
    assert.equal(row.n, 0);
  } finally {
    cleanup();
  }
});

test("query tokens are quoted and capped", () => {
  assert.deepEqual(tokenizeForFts(`Graph "NEURAL" nets: a-b c's`), ["graph", "neural", "nets", "a", "b", "c", "s"]);

  const tokens = tokenizeForFts(`Graph "NEURAL" nets`);
  assert.equal(buildMatchQuery(tokens, "and"), `"graph" AND "neural" AND "nets"`);
  assert.equal(buildMatchQuery(tokens, "or"), `"graph" OR "neural" OR "nets"`);

  const many = Array.from({ length: 20 }, (_, i) => `tok${i}`).join(" ");
  assert.equal(tokenizeForFts(many).length, 12);
});
