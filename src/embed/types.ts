/**
 * Texts are embedded either as stored documents or as search queries. Models
 * that are trained asymmetrically produce different vectors for each role.
 */
export type EmbeddingRole = "document" | "query";

export interface EmbedRequest {
  id: string;
  text: string;
}

export interface EmbedResult {
  id: string;
  embedding: number[];
  dimensions: number;
}

export interface EmbeddingProvider {
  readonly dimensions: number;
  readonly model: string;

  /**
   * Initialize the provider (load model, check the endpoint, etc.)
   */
  initialize(): Promise<void>;

  /**
   * Generate embedding for a single text
   */
  embed(text: string, role: EmbeddingRole): Promise<number[]>;

  /**
   * Generate embeddings for multiple texts in batch
   */
  embedBatch(requests: EmbedRequest[], role: EmbeddingRole): Promise<EmbedResult[]>;

  /**
   * Check if the provider is healthy and ready
   */
  healthCheck(): Promise<boolean>;

  /**
   * Clean up resources
   */
  dispose(): Promise<void>;
}

export interface EmbeddingProviderConfig {
  provider: string;
  model: string;
  dimensions: number;
  batchSize: number;
  baseUrl?: string;
  queryPrefix?: string;
  documentPrefix?: string;
}

export class EmbeddingError extends Error {
  constructor(message: string, public cause?: Error) {
    super(message);
    this.name = "EmbeddingError";
  }
}
