import type {
  EmbeddingProvider,
  EmbeddingProviderConfig,
  EmbeddingRole,
  EmbedRequest,
  EmbedResult,
} from "./types.js";
import { EmbeddingError } from "./types.js";
import { debug, info } from "../utils/logger.js";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(input: string, seed = FNV_OFFSET): number {
  let hash = seed;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function tokenizeForHashing(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Local embedding provider based on signed feature hashing of word unigrams
 * and bigrams. It needs no model download, is fully deterministic, and texts
 * sharing vocabulary land close together, which is enough for development and
 * offline use. The role does not change the vector.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  public readonly dimensions: number;
  public readonly model: string;
  private batchSize: number;
  private disposed = false;
  private initialized = false;

  constructor(config: EmbeddingProviderConfig) {
    if (config.dimensions < 2) {
      throw new EmbeddingError(`Hash embeddings need at least 2 dimensions, got ${config.dimensions}`);
    }
    this.dimensions = config.dimensions;
    this.model = config.model;
    this.batchSize = config.batchSize;
  }

  async initialize(): Promise<void> {
    if (this.disposed) {
      throw new EmbeddingError("Provider has been disposed");
    }

    if (this.initialized) {
      return;
    }

    info(() => `[HashProvider] Ready: ${this.model} (${this.dimensions} dimensions)`);
    this.initialized = true;
  }

  private ensureReady(): void {
    if (this.disposed) {
      throw new EmbeddingError("Provider has been disposed");
    }
    if (!this.initialized) {
      throw new EmbeddingError("Provider not initialized. Call initialize() first.");
    }
  }

  private addFeature(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const index = hash % this.dimensions;
    const sign = fnv1a(feature, hash) & 1 ? 1 : -1;
    vector[index] += sign * weight;
  }

  async embed(text: string, role: EmbeddingRole): Promise<number[]> {
    this.ensureReady();

    const trimmed = text.trim();
    if (!trimmed) {
      throw new EmbeddingError("Cannot embed empty text");
    }

    debug(() => `[HashProvider] Embedding ${role} text (${trimmed.length} chars)`);

    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenizeForHashing(trimmed);

    if (tokens.length === 0) {
      this.addFeature(vector, trimmed, 1);
    }

    for (let i = 0; i < tokens.length; i++) {
      this.addFeature(vector, tokens[i], 1);
      if (i > 0) {
        this.addFeature(vector, `${tokens[i - 1]} ${tokens[i]}`, 0.5);
      }
    }

    const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
    if (magnitude === 0) {
      // Every feature cancelled out; keep a stable direction instead of zeros.
      vector[fnv1a(trimmed) % this.dimensions] = 1;
      return vector;
    }

    return vector.map((val) => val / magnitude);
  }

  async embedBatch(requests: EmbedRequest[], role: EmbeddingRole): Promise<EmbedResult[]> {
    this.ensureReady();

    const results: EmbedResult[] = [];

    for (let i = 0; i < requests.length; i += this.batchSize) {
      const batch = requests.slice(i, i + this.batchSize);

      debug(() => `[HashProvider] Processing batch ${Math.floor(i / this.batchSize) + 1}/${Math.ceil(requests.length / this.batchSize)}`);

      for (const req of batch) {
        const embedding = await this.embed(req.text, role);
        results.push({
          id: req.id,
          embedding,
          dimensions: this.dimensions,
        });
      }
    }

    return results;
  }

  async healthCheck(): Promise<boolean> {
    if (this.disposed) {
      return false;
    }

    try {
      await this.embed("health check", "query");
      return true;
    } catch {
      return false;
    }
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    this.initialized = false;

    debug(() => "[HashProvider] Disposed");
  }
}
