import { z } from "zod";

const searchConfigSchema = z.object({
  rrfK: z.number().int().positive().default(60),
  defaultLimit: z.number().int().positive().max(100).default(50),
  maxLimit: z.number().int().positive().max(100).default(100),
  overfetchFactor: z.number().int().positive().default(4),
  maxCandidates: z.number().int().positive().default(400),
  embedTimeoutMs: z.number().int().positive().default(10_000),
  fallback: z.enum(["none", "lexical"]).default("none")
});

const embeddingConfigSchema = z.object({
  provider: z.enum(["hash", "ollama"]).default("hash"),
  model: z.string().default("feature-hash-v1"),
  dimensions: z.number().int().positive().default(384),
  batchSize: z.number().int().positive().default(8),
  baseUrl: z.string().optional(), // For the ollama provider
  queryPrefix: z.string().default(""),
  documentPrefix: z.string().default("")
});

export const appConfigSchema = z.object({
  search: searchConfigSchema.default({}),
  ai: z.object({
    embedding: embeddingConfigSchema
  }).default({
    embedding: {}
  }),
  storage: z.object({
    dbPath: z.string().default("./data/paperlog.db")
  }).default({})
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type EmbeddingConfig = z.infer<typeof embeddingConfigSchema>;
