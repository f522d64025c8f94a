const BYTES_PER_FLOAT = 4;

/**
 * Serialize a vector as contiguous little-endian float32 values.
 */
export function encodeEmbedding(vector: ArrayLike<number>): Buffer {
  const buffer = Buffer.alloc(vector.length * BYTES_PER_FLOAT);
  for (let i = 0; i < vector.length; i++) {
    buffer.writeFloatLE(vector[i], i * BYTES_PER_FLOAT);
  }
  return buffer;
}

export function decodeEmbedding(blob: Uint8Array): Float32Array {
  if (blob.byteLength % BYTES_PER_FLOAT !== 0) {
    throw new Error(
      `Embedding blob length ${blob.byteLength} is not a multiple of ${BYTES_PER_FLOAT}`
    );
  }

  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
  const vector = new Float32Array(blob.byteLength / BYTES_PER_FLOAT);
  for (let i = 0; i < vector.length; i++) {
    vector[i] = view.getFloat32(i * BYTES_PER_FLOAT, true);
  }
  return vector;
}

export function embeddingDimensions(blob: Uint8Array): number {
  return Math.floor(blob.byteLength / BYTES_PER_FLOAT);
}
