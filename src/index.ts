#!/usr/bin/env node

import { loadAppConfig } from "./config/loadConfig.js";
import type { AppConfig } from "./config/schema.js";
import { openDatabase, closeDatabase } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { createEmbeddingProvider } from "./embed/factory.js";
import {
  createCoreContext,
  getUserByUsername,
  loadFixtures,
  reindex,
  search,
  status,
  type CoreContext,
} from "./core/index.js";
import type { SearchMode } from "./search/index.js";
import type { Viewer } from "./types/paper.js";
import { initLogger } from "./utils/logger.js";
import { startMcpServer } from "./mcp/index.js";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

function parseLogsFlag(args: string[]): boolean | undefined {
  const flag = args.find((a) => a.startsWith("--logs="));
  if (!flag) return undefined;
  return flag.split("=")[1] === "true";
}

function readOption(args: string[], name: string): string | undefined {
  return args.find((a) => a.startsWith(`--${name}=`))?.split("=").slice(1).join("=");
}

function readIntOption(args: string[], name: string): number | undefined {
  const raw = readOption(args, name);
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value)) {
    console.error(`Invalid --${name}: "${raw}". Must be an integer.`);
    process.exit(1);
  }
  return value;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] || "help";

  if (command === "mcp") {
    await handleMcp(args.slice(1));
    return;
  }

  const logsFlag = parseLogsFlag(args);
  if (logsFlag !== undefined) {
    initLogger({ verbose: logsFlag });
  } else {
    initLogger();
  }

  try {
    switch (command) {
      case "search":
        await handleSearch(args.slice(1));
        break;
      case "status":
        await handleStatus();
        break;
      case "reindex":
        await handleReindex(args.slice(1));
        break;
      case "seed":
        await handleSeed(args.slice(1));
        break;
      case "help":
      default:
        showHelp();
        break;
    }
  } catch (error) {
    console.error("\n❌ Error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

async function withContext<T>(
  config: AppConfig,
  run: (ctx: CoreContext) => Promise<T>
): Promise<T> {
  const db = openDatabase(config.storage.dbPath);
  runMigrations(db);

  const embedProvider = createEmbeddingProvider(config.ai.embedding);

  try {
    await embedProvider.initialize();
    const ctx = createCoreContext({ db, embedProvider, config });
    return await run(ctx);
  } finally {
    closeDatabase(db);
    await embedProvider.dispose();
  }
}

async function resolveViewer(ctx: CoreContext, username: string | undefined): Promise<Viewer> {
  if (!username) return null;
  const user = await getUserByUsername(ctx, username);
  if (!user) {
    throw new Error(`Unknown user: ${username}`);
  }
  return { id: user.id };
}

async function handleSearch(args: string[]): Promise<void> {
  const queryArg = args[0];
  const rawMode = readOption(args, "mode");

  if (queryArg === undefined || queryArg.startsWith("--")) {
    console.error("Usage: paperlog search <query> [--user=<username>] [--limit=<n>] [--offset=<n>] [--mode=hybrid|lexical|vector]");
    process.exit(1);
  }

  const validModes = ["hybrid", "lexical", "vector"] as const;
  const mode = validModes.find((m) => m === rawMode);
  if (rawMode && !mode) {
    console.error(`Invalid mode: "${rawMode}". Must be one of: ${validModes.join(", ")}`);
    process.exit(1);
  }

  console.log("🔍 paperlog - Search\n");

  const config = loadAppConfig();

  if (!existsSync(config.storage.dbPath)) {
    console.log("No database found. Run 'paperlog seed <file>' first.");
    return;
  }

  const limit = readIntOption(args, "limit");
  const offset = readIntOption(args, "offset");

  await withContext(config, async (ctx) => {
    const viewer = await resolveViewer(ctx, readOption(args, "user"));
    const searchMode: SearchMode = mode ?? "hybrid";
    const response = await search(ctx, viewer, {
      query: queryArg,
      limit,
      offset,
      mode: searchMode,
    });

    if (response.degraded) {
      console.log("⚠️  Semantic search unavailable, showing lexical results only\n");
    }

    if (response.results.length === 0) {
      console.log("No results found.\n");
      return;
    }

    console.log(`Found ${response.total} result(s):\n`);
    response.results.forEach((r, i) => {
      const owner = r.owner.displayName ?? r.owner.username;
      const privacy = r.isPrivate ? " | private" : "";
      console.log(`${i + 1}. ${r.title}`);
      console.log(`   ${r.authors}`);
      console.log(`   Score: ${r.score.toFixed(4)} | Source: ${r.source} | Read by: ${owner}${privacy}`);
      if (r.tags.length > 0) {
        console.log(`   Tags: ${r.tags.join(", ")}`);
      }
      console.log(`   ${r.summary.slice(0, 100)}${r.summary.length > 100 ? "..." : ""}`);
      console.log("");
    });
  });
}

async function handleStatus(): Promise<void> {
  console.log("📊 paperlog - Status\n");

  const config = loadAppConfig();

  if (!existsSync(config.storage.dbPath)) {
    console.log("No database found. Run 'paperlog seed <file>' first.");
    return;
  }

  await withContext(config, async (ctx) => {
    const stats = await status(ctx);

    console.log(`Database: ${config.storage.dbPath}`);
    console.log(`Embedding model: ${ctx.embedProvider.model} (${ctx.embedProvider.dimensions}d)`);
    console.log("");
    console.log(`Total papers: ${stats.totalPapers}`);
    console.log(`  Embedded: ${stats.embeddedPapers}`);
    console.log(`  Pending: ${stats.pendingEmbeddings}`);
    console.log(`  Stale: ${stats.staleEmbeddings}`);
    console.log(`Last updated: ${stats.lastUpdatedAt ?? "never"}`);
  });
}

async function handleReindex(args: string[]): Promise<void> {
  const force = args.includes("--force");

  console.log(`🔁 paperlog - Reindex${force ? " (force)" : ""}\n`);

  const config = loadAppConfig();

  await withContext(config, async (ctx) => {
    const result = await reindex(ctx, { force });
    console.log(`Processed: ${result.processed}`);
    console.log(`Errors: ${result.errors}`);
    console.log(`Duration: ${result.duration}ms`);
    if (result.errors > 0) {
      process.exitCode = 1;
    }
  });
}

async function handleSeed(args: string[]): Promise<void> {
  const fileArg = args[0];

  if (!fileArg || fileArg.startsWith("--")) {
    console.error("Usage: paperlog seed <file.json>");
    process.exit(1);
  }

  const filePath = resolve(fileArg);
  if (!existsSync(filePath)) {
    console.error(`Error: File does not exist: ${filePath}`);
    process.exit(1);
  }

  console.log("🌱 paperlog - Seeding\n");

  const fixtures: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const config = loadAppConfig();

  await withContext(config, async (ctx) => {
    const result = await loadFixtures(ctx, fixtures);
    console.log(`Users created: ${result.usersCreated} (skipped ${result.usersSkipped})`);
    console.log(`Papers created: ${result.papersCreated} (embedded ${result.papersEmbedded})`);
  });
}

async function handleMcp(args: string[]): Promise<void> {
  const handle = await startMcpServer({
    configPath: readOption(args, "config"),
    username: readOption(args, "user"),
    verbose: parseLogsFlag(args),
  });

  const shutdown = (): void => {
    handle.close().then(
      () => process.exit(0),
      (error: unknown) => {
        process.stderr.write(`MCP shutdown failed: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function showHelp(): void {
  console.log(`
paperlog - Reading list tracker with hybrid paper search

Usage:
  paperlog <command> [options]

Commands:
  search <query> [--user=<username>] [--limit=<n>] [--offset=<n>]
         [--mode=hybrid|lexical|vector] [--logs=true|false]
                                       Search papers visible to the user
  status [--logs=true|false]           Show paper and embedding counts
  reindex [--force]                    Embed papers missing an embedding
  seed <file.json>                     Load users and papers from a fixture file
  mcp [--user=<username>] [--config=<path>] [--logs=true|false]
                                       Start the MCP server over stdio
  help                                 Show this help message

Examples:
  paperlog seed ./fixtures/sample.json
  paperlog search "attention transformers"
  paperlog search "graph networks" --user=ada --limit=10
  paperlog search "diffusion" --mode=lexical
  paperlog reindex --force
`);
}

main().catch((error: unknown) => {
  console.error("\n❌ Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
