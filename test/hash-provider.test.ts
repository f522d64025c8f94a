import assert from "node:assert/strict";
import test from "node:test";
import { HashEmbeddingProvider, tokenizeForHashing } from "../src/embed/hash-provider.js";
import { EmbeddingError } from "../src/embed/types.js";
import { cosineSimilarity } from "../src/search/vector.js";

function createProvider(dimensions = 384): HashEmbeddingProvider {
  return new HashEmbeddingProvider({
    provider: "hash",
    model: "feature-hash-v1",
    dimensions,
    batchSize: 2,
  });
}

test("hash provider refuses to embed before initialize", async () => {
  const provider = createProvider();
  await assert.rejects(provider.embed("graph", "query"), EmbeddingError);
});

test("hash embeddings are deterministic unit vectors of the configured size", async () => {
  const provider = createProvider(64);
  await provider.initialize();

  const first = await provider.embed("Graph neural networks", "document");
  const second = await provider.embed("Graph neural networks", "document");

  assert.equal(first.length, 64);
  assert.deepEqual(first, second);
  const norm = Math.sqrt(first.reduce((sum, value) => sum + value * value, 0));
  assert.ok(Math.abs(norm - 1) < 1e-9);
});

test("hash embeddings ignore the role", async () => {
  const provider = createProvider();
  await provider.initialize();

  assert.deepEqual(
    await provider.embed("sparse attention", "query"),
    await provider.embed("sparse attention", "document")
  );
});

test("texts sharing vocabulary are closer than unrelated ones", async () => {
  const provider = createProvider();
  await provider.initialize();

  const base = await provider.embed("graph neural networks for molecules", "document");
  const related = await provider.embed("graph neural networks", "query");
  const unrelated = await provider.embed("audio codec compression", "query");

  assert.ok(cosineSimilarity(base, related) > cosineSimilarity(base, unrelated));
  assert.ok(cosineSimilarity(base, related) > 0.5);
});

test("hash provider rejects empty text", async () => {
  const provider = createProvider();
  await provider.initialize();
  await assert.rejects(provider.embed("   ", "query"), /empty text/);
});

test("hash provider needs at least two dimensions", () => {
  assert.throws(() => createProvider(1), EmbeddingError);
});

test("embedBatch keeps request ids and order", async () => {
  const provider = createProvider(32);
  await provider.initialize();

  const results = await provider.embedBatch(
    [
      { id: "3", text: "first" },
      { id: "1", text: "second" },
      { id: "2", text: "third" },
    ],
    "document"
  );

  assert.deepEqual(results.map((r) => r.id), ["3", "1", "2"]);
  assert.deepEqual(results[1].embedding, await provider.embed("second", "document"));
  assert.equal(results[2].dimensions, 32);
});

test("a disposed provider is unhealthy and refuses work", async () => {
  const provider = createProvider();
  await provider.initialize();
  assert.equal(await provider.healthCheck(), true);

  await provider.dispose();
  assert.equal(await provider.healthCheck(), false);
  await assert.rejects(provider.embed("graph", "query"), /disposed/);
});

test("hashing tokenizer splits on non-alphanumerics", () => {
  assert.deepEqual(tokenizeForHashing("BERT-style pre_training, 2019!"), [
    "bert",
    "style",
    "pre",
    "training",
    "2019",
  ]);
});
