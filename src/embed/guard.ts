import type { EmbeddingProvider, EmbeddingRole } from "./types.js";
import { EmbeddingError } from "./types.js";

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new EmbeddingError(`${label} timed out after ${ms}ms`));
    }, ms);
  });

  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}

/**
 * Reject vectors a broken model would produce instead of failing: wrong
 * length, non-finite components, or all zeros.
 */
export function assertUsableEmbedding(vector: readonly number[], dimensions: number): void {
  if (vector.length !== dimensions) {
    throw new EmbeddingError(
      `Embedding has ${vector.length} dimensions, expected ${dimensions}`
    );
  }

  let nonZero = false;
  for (const value of vector) {
    if (!Number.isFinite(value)) {
      throw new EmbeddingError("Embedding contains non-finite values");
    }
    if (value !== 0) {
      nonZero = true;
    }
  }

  if (!nonZero) {
    throw new EmbeddingError("Embedding is all zeros");
  }
}

export async function embedChecked(
  provider: EmbeddingProvider,
  text: string,
  role: EmbeddingRole,
  timeoutMs: number
): Promise<number[]> {
  let vector: number[];
  try {
    vector = await withTimeout(provider.embed(text, role), timeoutMs, `Embedding (${role})`);
  } catch (err) {
    if (err instanceof EmbeddingError) {
      throw err;
    }
    throw new EmbeddingError(
      `Embedding provider '${provider.model}' failed: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined
    );
  }

  assertUsableEmbedding(vector, provider.dimensions);
  return vector;
}
