import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { appConfigSchema, type AppConfig } from "./schema.js";
import { warn } from "../utils/logger.js";

export function createDefaultConfig(): AppConfig {
  return appConfigSchema.parse({});
}

interface LoadConfigOptions {
  silent?: boolean;
  env?: NodeJS.ProcessEnv;
}

function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const provider = env.PAPERLOG_EMBED_PROVIDER;
  if (provider === "hash" || provider === "ollama") {
    config.ai.embedding.provider = provider;
  }

  if (env.PAPERLOG_EMBED_MODEL) {
    config.ai.embedding.model = env.PAPERLOG_EMBED_MODEL;
  }

  if (env.PAPERLOG_DB_PATH) {
    config.storage.dbPath = env.PAPERLOG_DB_PATH;
  }

  if (env.PAPERLOG_RRF_K) {
    const k = Number.parseInt(env.PAPERLOG_RRF_K, 10);
    if (Number.isInteger(k) && k > 0) {
      config.search.rrfK = k;
    } else {
      warn(`Ignoring invalid PAPERLOG_RRF_K=${env.PAPERLOG_RRF_K}`);
    }
  }

  return config;
}

export function loadAppConfig(
  configPath: string = "./config.json",
  options: LoadConfigOptions = {}
): AppConfig {
  if (!options.env) {
    loadDotenv();
  }
  const env = options.env ?? process.env;

  const absolute = resolve(configPath);
  if (!existsSync(absolute)) {
    if (!options.silent) {
      console.log(`⚠️  No config file found at ${configPath}, using defaults`);
    }
    return applyEnvOverrides(createDefaultConfig(), env);
  }

  const raw = readFileSync(absolute, "utf-8");
  const parsed = JSON.parse(raw) as unknown;
  return applyEnvOverrides(appConfigSchema.parse(parsed), env);
}
