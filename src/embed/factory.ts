import type { EmbeddingProvider, EmbeddingProviderConfig } from "./types.js";
import { HashEmbeddingProvider } from "./hash-provider.js";
import { OllamaEmbeddingProvider } from "./ollama-provider.js";

export function createEmbeddingProvider(config: EmbeddingProviderConfig): EmbeddingProvider {
  switch (config.provider) {
    case "hash":
      return new HashEmbeddingProvider(config);
    case "ollama":
      return new OllamaEmbeddingProvider(config);
    default:
      throw new Error(`Unsupported embedding provider: ${config.provider}`);
  }
}
