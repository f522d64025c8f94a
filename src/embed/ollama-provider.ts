import { z } from "zod";
import type {
  EmbeddingProvider,
  EmbeddingProviderConfig,
  EmbeddingRole,
  EmbedRequest,
  EmbedResult,
} from "./types.js";
import { EmbeddingError } from "./types.js";
import { debug, info } from "../utils/logger.js";

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const DEFAULT_BASE_URL = "http://127.0.0.1:11434";

/**
 * Embedding provider backed by an Ollama server's `/api/embed` endpoint.
 *
 * Asymmetric models expect an instruction in front of queries; configure it
 * with `queryPrefix` / `documentPrefix`.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  public readonly dimensions: number;
  public readonly model: string;
  private baseUrl: string;
  private batchSize: number;
  private queryPrefix: string;
  private documentPrefix: string;
  private disposed = false;
  private initialized = false;

  constructor(config: EmbeddingProviderConfig) {
    this.dimensions = config.dimensions;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.batchSize = config.batchSize;
    this.queryPrefix = config.queryPrefix ?? "";
    this.documentPrefix = config.documentPrefix ?? "";
  }

  async initialize(): Promise<void> {
    if (this.disposed) {
      throw new EmbeddingError("Provider has been disposed");
    }

    if (this.initialized) {
      return;
    }

    info(() => `[OllamaProvider] Using ${this.model} at ${this.baseUrl}`);
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

  private prefixFor(role: EmbeddingRole): string {
    return role === "query" ? this.queryPrefix : this.documentPrefix;
  }

  private async request(inputs: string[]): Promise<number[][]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ model: this.model, input: inputs }),
      });
    } catch (err) {
      throw new EmbeddingError(
        `Ollama request failed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined
      );
    }

    if (!response.ok) {
      throw new EmbeddingError(`Ollama responded with HTTP ${response.status}`);
    }

    const parsed = embedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingError("Ollama returned an unexpected embed payload", parsed.error);
    }

    if (parsed.data.embeddings.length !== inputs.length) {
      throw new EmbeddingError(
        `Ollama returned ${parsed.data.embeddings.length} embeddings for ${inputs.length} inputs`
      );
    }

    return parsed.data.embeddings;
  }

  async embed(text: string, role: EmbeddingRole): Promise<number[]> {
    this.ensureReady();
    debug(() => `[OllamaProvider] Embedding ${role} text (${text.length} chars)`);

    const [embedding] = await this.request([this.prefixFor(role) + text]);
    return embedding;
  }

  async embedBatch(requests: EmbedRequest[], role: EmbeddingRole): Promise<EmbedResult[]> {
    this.ensureReady();

    const results: EmbedResult[] = [];
    const prefix = this.prefixFor(role);

    for (let i = 0; i < requests.length; i += this.batchSize) {
      const batch = requests.slice(i, i + this.batchSize);
      debug(() => `[OllamaProvider] Processing batch ${Math.floor(i / this.batchSize) + 1}/${Math.ceil(requests.length / this.batchSize)}`);

      const embeddings = await this.request(batch.map((req) => prefix + req.text));
      batch.forEach((req, index) => {
        results.push({
          id: req.id,
          embedding: embeddings[index],
          dimensions: embeddings[index].length,
        });
      });
    }

    return results;
  }

  async healthCheck(): Promise<boolean> {
    if (this.disposed) {
      return false;
    }

    try {
      const embedding = await this.embed("health check", "query");
      return embedding.length === this.dimensions;
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

    debug(() => "[OllamaProvider] Disposed");
  }
}
