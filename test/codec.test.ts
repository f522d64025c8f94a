import assert from "node:assert/strict";
import test from "node:test";
import { decodeEmbedding, embeddingDimensions, encodeEmbedding } from "../src/embed/codec.js";

test("embeddings encode as little-endian float32", () => {
  const blob = encodeEmbedding([0.5, -1.25, 3]);

  assert.equal(blob.byteLength, 12);
  // 0.5f == 0x3f000000
  assert.deepEqual([...blob.subarray(0, 4)], [0x00, 0x00, 0x00, 0x3f]);
  assert.equal(embeddingDimensions(blob), 3);
});

test("decoding restores the stored vector", () => {
  const decoded = decodeEmbedding(encodeEmbedding([0.5, -1.25, 3, 0]));
  assert.deepEqual([...decoded], [0.5, -1.25, 3, 0]);
});

test("decoding respects the view offset of a sliced buffer", () => {
  const padded = Buffer.concat([Buffer.from([0xff]), encodeEmbedding([1, 2])]);
  const decoded = decodeEmbedding(padded.subarray(1));
  assert.deepEqual([...decoded], [1, 2]);
});

test("decoding a blob whose length is not a multiple of four throws", () => {
  assert.throws(() => decodeEmbedding(Buffer.alloc(7)), /not a multiple of 4/);
});

test("an empty vector encodes to an empty blob", () => {
  assert.equal(encodeEmbedding([]).byteLength, 0);
  assert.equal(decodeEmbedding(Buffer.alloc(0)).length, 0);
});
