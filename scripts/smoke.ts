import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { loadAppConfig } from "../src/config/loadConfig.js";
import { openDatabase, closeDatabase } from "../src/db/index.js";
import { runMigrations } from "../src/db/migrate.js";
import { createEmbeddingProvider } from "../src/embed/factory.js";
import {
  createCoreContext,
  createUser,
  createPaper,
  search,
  status,
  CoreError,
} from "../src/core/index.js";

function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(message);
  }
}

async function runCase(name: string, fn: () => Promise<void>): Promise<void> {
  const start = Date.now();
  try {
    await fn();
    console.log(`[smoke] PASS ${name} (${Date.now() - start}ms)`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[smoke] FAIL ${name}: ${message}`);
    throw error;
  }
}

type McpSession = {
  client: Client;
  transport: StdioClientTransport;
  getStderr: () => string;
};

async function startMcpSession(params: {
  dbPath: string;
  env?: Record<string, string>;
}): Promise<McpSession> {
  let stderr = "";
  const inheritedEnv = Object.fromEntries(
    Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );
  const transport = new StdioClientTransport({
    command: process.execPath,
    args: ["--import", "tsx", "src/index.ts", "mcp", "--logs=true"],
    cwd: process.cwd(),
    env: {
      ...inheritedEnv,
      PAPERLOG_DB_PATH: params.dbPath,
      ...params.env,
    },
    stderr: "pipe",
  });

  transport.stderr?.on("data", (chunk: Buffer) => {
    stderr += chunk.toString();
  });

  const client = new Client({ name: "paperlog-smoke", version: "0.1.0" });
  await client.connect(transport);

  return { client, transport, getStderr: () => stderr };
}

async function closeMcpSession(session: McpSession): Promise<void> {
  await session.client.close();
  await session.transport.close();
}

async function main(): Promise<void> {
  const dir = mkdtempSync(join(tmpdir(), "paperlog-smoke-"));
  const dbPath = join(dir, "smoke.db");

  const config = loadAppConfig("./config.json", { silent: true });
  config.storage.dbPath = dbPath;

  const db = openDatabase(dbPath);
  runMigrations(db);
  const embedProvider = createEmbeddingProvider(config.ai.embedding);
  await embedProvider.initialize();
  const ctx = createCoreContext({ db, embedProvider, config });

  try {
    await runCase("core write and hybrid search", async () => {
      const ada = await createUser(ctx, { username: "ada" });
      const grace = await createUser(ctx, { username: "grace" });

      await createPaper(ctx, ada.id, {
        title: "Graph attention networks",
        authors: "Example Author",
        summary: "Attention over graph neighbourhoods",
      });
      await createPaper(ctx, grace.id, {
        title: "Private graph notes",
        authors: "Example Author",
        summary: "Reading notes on graph colouring",
        isPrivate: true,
      });

      const anonymous = await search(ctx, null, { query: "graph" });
      assert(anonymous.results.length === 1, "Anonymous search should see only the public paper");

      const owner = await search(ctx, { id: grace.id }, { query: "graph" });
      assert(owner.results.length === 2, "Owner search should include their private paper");

      const counts = await status(ctx);
      assert(counts.pendingEmbeddings === 0, "All papers should be embedded");
    });

    await runCase("core rejects blank titles", async () => {
      let code: string | null = null;
      try {
        await createPaper(ctx, 1, { title: " ", authors: "A", summary: "S" });
      } catch (error) {
        code = error instanceof CoreError ? error.code : "unexpected";
      }
      assert(code === "VALIDATION", "Blank title should fail validation");
    });
  } finally {
    closeDatabase(db);
    await embedProvider.dispose();
  }

  try {
    await runCase("mcp tools over stdio", async () => {
      const secretQuery = "graph attention secret-query-text";
      const session = await startMcpSession({ dbPath, env: { PAPERLOG_USER: "ada" } });
      try {
        const tools = await session.client.listTools();
        const names = tools.tools.map((t) => t.name);
        assert(names.includes("paper_search"), "paper_search should be registered");
        assert(!names.includes("paper_reindex"), "paper_reindex should be off by default");

        const found = await session.client.callTool({ name: "paper_search", arguments: { query: secretQuery } });
        assert(!found.isError, "paper_search should succeed");

        const added = await session.client.callTool({
          name: "paper_add",
          arguments: { title: "Smoke paper", authors: "A", summary: "Added over MCP" },
        });
        assert(!added.isError, "paper_add should succeed for the acting user");

        const stderr = session.getStderr();
        assert(stderr.includes("queryLen="), "Verbose logs should include queryLen summary");
        assert(!stderr.includes(secretQuery), "Verbose logs should not contain raw query text");
      } finally {
        await closeMcpSession(session);
      }
    });

    await runCase("mcp reindex tool flag", async () => {
      const session = await startMcpSession({
        dbPath,
        env: { PAPERLOG_ENABLE_REINDEX_TOOL: "true" },
      });
      try {
        const tools = await session.client.listTools();
        const names = tools.tools.map((t) => t.name);
        assert(names.includes("paper_reindex"), "paper_reindex should be enabled via env flag");
      } finally {
        await closeMcpSession(session);
      }
    });
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }

  console.log("[smoke] all smoke scenarios passed");
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error("[smoke] failed:", message);
  process.exit(1);
});
