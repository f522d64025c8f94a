import assert from "node:assert/strict";
import test from "node:test";
import { OllamaEmbeddingProvider } from "../src/embed/ollama-provider.js";
import { createEmbeddingProvider } from "../src/embed/factory.js";
import { HashEmbeddingProvider } from "../src/embed/hash-provider.js";
import { EmbeddingError } from "../src/embed/types.js";

interface RecordedRequest {
  url: string;
  body: { model: string; input: string[] };
}

function createProvider(batchSize = 8): OllamaEmbeddingProvider {
  return new OllamaEmbeddingProvider({
    provider: "ollama",
    model: "test-embed",
    dimensions: 3,
    batchSize,
    baseUrl: "http://ollama.test:11434/",
    queryPrefix: "query: ",
    documentPrefix: "passage: ",
  });
}

function fakeFetch(
  requests: RecordedRequest[],
  respond: (inputs: string[]) => Response = (inputs) =>
    Response.json({ embeddings: inputs.map((_, i) => [i + 1, 0, 0]) })
) {
  return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const body: RecordedRequest["body"] = JSON.parse(typeof init?.body === "string" ? init.body : "{}");
    requests.push({ url: String(input), body });
    return respond(body.input);
  };
}

test("embed posts the prefixed query to /api/embed", async (t) => {
  const requests: RecordedRequest[] = [];
  t.mock.method(globalThis, "fetch", fakeFetch(requests));
  const provider = createProvider();
  await provider.initialize();

  assert.deepEqual(await provider.embed("graph networks", "query"), [1, 0, 0]);
  assert.deepEqual(requests, [
    {
      url: "http://ollama.test:11434/api/embed",
      body: { model: "test-embed", input: ["query: graph networks"] },
    },
  ]);
});

test("embedBatch splits requests by batch size and keeps ids", async (t) => {
  const requests: RecordedRequest[] = [];
  t.mock.method(globalThis, "fetch", fakeFetch(requests));
  const provider = createProvider(2);
  await provider.initialize();

  const results = await provider.embedBatch(
    [
      { id: "a", text: "one" },
      { id: "b", text: "two" },
      { id: "c", text: "three" },
    ],
    "document"
  );

  assert.deepEqual(requests.map((r) => r.body.input), [
    ["passage: one", "passage: two"],
    ["passage: three"],
  ]);
  assert.deepEqual(results, [
    { id: "a", embedding: [1, 0, 0], dimensions: 3 },
    { id: "b", embedding: [2, 0, 0], dimensions: 3 },
    { id: "c", embedding: [1, 0, 0], dimensions: 3 },
  ]);
});

test("HTTP errors, bad payloads and short responses become EmbeddingError", async (t) => {
  const provider = createProvider();
  await provider.initialize();

  const failing = t.mock.method(globalThis, "fetch", fakeFetch([], () => new Response("nope", { status: 500 })));
  await assert.rejects(provider.embed("x", "query"), /HTTP 500/);

  failing.mock.mockImplementation(fakeFetch([], () => Response.json({ embedding: [1, 2, 3] })));
  await assert.rejects(provider.embed("x", "query"), /unexpected embed payload/);

  failing.mock.mockImplementation(fakeFetch([], () => Response.json({ embeddings: [] })));
  await assert.rejects(
    provider.embed("x", "query"),
    (err: unknown) => err instanceof EmbeddingError && err.message === "Ollama returned 0 embeddings for 1 inputs"
  );
});

test("network failures become EmbeddingError", async (t) => {
  t.mock.method(globalThis, "fetch", async (): Promise<Response> => {
    throw new Error("connect ECONNREFUSED");
  });
  const provider = createProvider();
  await provider.initialize();

  await assert.rejects(provider.embed("x", "query"), /Ollama request failed: connect ECONNREFUSED/);
  assert.equal(await provider.healthCheck(), false);
});

test("ollama provider must be initialized before use", async () => {
  const provider = createProvider();
  await assert.rejects(provider.embed("x", "query"), /not initialized/);
});

test("the factory builds the configured provider", () => {
  const base = { model: "m", dimensions: 8, batchSize: 4 };
  assert.ok(createEmbeddingProvider({ ...base, provider: "hash" }) instanceof HashEmbeddingProvider);
  assert.ok(createEmbeddingProvider({ ...base, provider: "ollama" }) instanceof OllamaEmbeddingProvider);
  assert.throws(() => createEmbeddingProvider({ ...base, provider: "openai" }), /Unsupported embedding provider: openai/);
});
