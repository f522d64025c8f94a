import type { DbHandle } from "../db/index.js";
import type { EmbeddingProvider } from "../embed/types.js";
import type { AppConfig } from "../config/schema.js";

/**
 * CoreContext holds all dependencies needed by core operations.
 * The embedding provider is built once at startup and shared read-only.
 */
export interface CoreContext {
  /** Database handle for SQLite operations */
  db: DbHandle;

  /** Embedding provider for documents and queries */
  embedProvider: EmbeddingProvider;

  /** Application configuration */
  config: AppConfig;
}

export interface CreateCoreContextOptions {
  db: DbHandle;
  embedProvider: EmbeddingProvider;
  config: AppConfig;
}

export function createCoreContext(options: CreateCoreContextOptions): CoreContext {
  return {
    db: options.db,
    embedProvider: options.embedProvider,
    config: options.config,
  };
}
