import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import test from "node:test";
import { CoreError, listPapers, loadFixtures, getUserByUsername } from "../src/core/index.js";
import { createTestContext } from "./helpers.js";

const sampleFixtures: unknown = JSON.parse(
  readFileSync(new URL("../fixtures/sample.json", import.meta.url), "utf-8")
);

test("loadFixtures creates users and papers from the sample file", async () => {
  const t = createTestContext();
  try {
    const result = await loadFixtures(t.ctx, sampleFixtures);
    assert.deepEqual(result, {
      usersCreated: 2,
      usersSkipped: 0,
      papersCreated: 3,
      papersEmbedded: 3,
    });

    const ada = await getUserByUsername(t.ctx, "ada");
    assert.equal(ada?.displayName, "Ada");

    const visible = await listPapers(t.ctx, null);
    assert.equal(visible.total, 2);
    const attention = visible.items.find((p) => p.title === "Graph attention networks");
    assert.deepEqual(attention?.tags, ["attention", "gnn"]);
    assert.equal(attention?.dateRead, "2024-02-10");
  } finally {
    t.cleanup();
  }
});

test("loading fixtures again reuses existing users", async () => {
  const t = createTestContext();
  try {
    await loadFixtures(t.ctx, sampleFixtures);
    const again = await loadFixtures(t.ctx, sampleFixtures);

    assert.equal(again.usersCreated, 0);
    assert.equal(again.usersSkipped, 2);
    assert.equal(again.papersCreated, 3);
  } finally {
    t.cleanup();
  }
});

test("fixture papers must reference a known user", async () => {
  const t = createTestContext();
  try {
    await assert.rejects(
      loadFixtures(t.ctx, {
        papers: [{ owner: "nobody", title: "T", authors: "A", summary: "S" }],
      }),
      (err: unknown) => err instanceof CoreError && err.code === "NOT_FOUND"
    );
  } finally {
    t.cleanup();
  }
});

test("malformed fixtures are rejected", async () => {
  const t = createTestContext();
  try {
    await assert.rejects(
      loadFixtures(t.ctx, { papers: "not a list" }),
      (err: unknown) => err instanceof CoreError && err.code === "VALIDATION"
    );
    await assert.rejects(
      loadFixtures(t.ctx, { papers: [{ owner: "ada", title: "T", authors: "A", summary: "S", rating: 5 }] }),
      (err: unknown) => err instanceof CoreError && err.code === "VALIDATION"
    );
  } finally {
    t.cleanup();
  }
});
