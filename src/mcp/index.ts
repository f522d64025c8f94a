import { z, ZodError } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadAppConfig } from "../config/loadConfig.js";
import { closeDatabase, openDatabase, type DbHandle } from "../db/index.js";
import { runMigrations } from "../db/migrate.js";
import { createEmbeddingProvider } from "../embed/factory.js";
import type { EmbeddingProvider } from "../embed/types.js";
import type { User, Viewer } from "../types/paper.js";
import {
  createCoreContext,
  createPaper,
  deletePaper,
  getPaper,
  getUserByUsername,
  listPapers,
  reindex,
  search,
  status,
  updatePaper,
  CoreError,
  CreatePaperInputSchema,
  UpdatePaperInputSchema,
  type CoreContext,
} from "../core/index.js";
import { initLogger } from "../utils/logger.js";

const ToolLimitSchema = z.number().int().positive().max(100);
const PaperIdSchema = z.number().int().positive();

const PaperSchema = z.object({
  id: z.number().int(),
  ownerId: z.number().int(),
  title: z.string(),
  authors: z.string(),
  abstract: z.string().nullable(),
  summary: z.string(),
  arxivId: z.string().nullable(),
  doi: z.string().nullable(),
  paperUrl: z.string().nullable(),
  dateRead: z.string().nullable(),
  isPrivate: z.boolean(),
  tags: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const SearchResultSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  authors: z.string(),
  summary: z.string(),
  score: z.number(),
  source: z.enum(["lex", "vec", "hybrid"]),
  tags: z.array(z.string()),
  isPrivate: z.boolean(),
  owner: z.object({
    username: z.string(),
    displayName: z.string().nullable(),
    bio: z.string().nullable(),
  }),
});

const PaperSearchInputSchema = z.object({
  query: z.string(),
  limit: ToolLimitSchema.optional(),
  offset: z.number().int().nonnegative().optional(),
  mode: z.enum(["hybrid", "lexical", "vector"]).optional(),
}).strict();

const PaperSearchOutputSchema = z.object({
  query: z.string(),
  results: z.array(SearchResultSchema),
  total: z.number().int().nonnegative(),
  degraded: z.boolean(),
});

const PaperIdInputSchema = z.object({
  id: PaperIdSchema,
}).strict();

const PaperGetOutputSchema = z.object({
  paper: PaperSchema.nullable(),
});

const PaperListInputSchema = z.object({
  ownerId: PaperIdSchema.optional(),
  tag: z.string().min(1).optional(),
  limit: ToolLimitSchema.optional(),
  offset: z.number().int().nonnegative().optional(),
}).strict();

const PaperListOutputSchema = z.object({
  items: z.array(PaperSchema),
  total: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
  offset: z.number().int().nonnegative(),
});

const PaperWriteOutputSchema = z.object({
  paper: PaperSchema,
  embedded: z.boolean(),
});

const PaperUpdateInputSchema = UpdatePaperInputSchema.extend({
  id: PaperIdSchema,
});

const PaperDeleteOutputSchema = z.object({
  deleted: z.boolean(),
});

const PaperStatusOutputSchema = z.object({
  totalPapers: z.number().int().nonnegative(),
  embeddedPapers: z.number().int().nonnegative(),
  pendingEmbeddings: z.number().int().nonnegative(),
  staleEmbeddings: z.number().int().nonnegative(),
  lastUpdatedAt: z.string().nullable(),
});

const PaperReindexInputSchema = z.object({
  force: z.boolean().optional(),
}).strict();

const PaperReindexOutputSchema = z.object({
  processed: z.number().int().nonnegative(),
  errors: z.number().int().nonnegative(),
  duration: z.number().nonnegative(),
});

export interface McpServerHandle {
  close: () => Promise<void>;
}

interface StartMcpServerOptions {
  configPath?: string;
  username?: string;
  verbose?: boolean;
}

export interface ToolErrorPayload {
  code: string;
  message: string;
}

export function formatToolError(error: unknown): ToolErrorPayload {
  if (error instanceof CoreError) {
    return { code: error.code, message: error.message };
  }

  if (error instanceof ZodError) {
    return {
      code: "VALIDATION",
      message: error.errors
        .map((e) => `${e.path.join(".") || "input"}: ${e.message}`)
        .join(", "),
    };
  }

  if (error instanceof Error) {
    return { code: "INTERNAL", message: error.message };
  }

  return { code: "INTERNAL", message: String(error) };
}

function createMcpLogger(verbose: boolean) {
  const log = (message: string): void => {
    if (!verbose) {
      return;
    }
    const timestamp = new Date().toISOString();
    process.stderr.write(`[paperlog:mcp ${timestamp}] ${message}\n`);
  };

  return {
    info: log,
  };
}

function summarizeForLog(label: string, value: string): string {
  return `${label}Len=${value.length}`;
}

function createToolResult<T>(schema: z.ZodType<T>, payload: T) {
  const parsed = schema.parse(payload);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("Tool output must be an object");
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(parsed) }],
    structuredContent: parsed as Record<string, unknown>,
  };
}

export async function executeTool<T>(
  schema: z.ZodType<T>,
  operation: () => Promise<T>
): Promise<
  | {
      content: Array<{ type: "text"; text: string }>;
      structuredContent: Record<string, unknown>;
    }
  | {
      isError: true;
      content: Array<{ type: "text"; text: string }>;
    }
> {
  try {
    const payload = await operation();
    return createToolResult(schema, payload);
  } catch (error) {
    const toolError = formatToolError(error);
    return {
      isError: true,
      content: [{ type: "text", text: JSON.stringify(toolError) }],
    };
  }
}

function requireUser(user: User | null): User {
  if (!user) {
    throw new CoreError(
      "This tool needs an acting user; set PAPERLOG_USER to a username",
      "FORBIDDEN"
    );
  }
  return user;
}

async function resolveActingUser(ctx: CoreContext, explicit?: string): Promise<User | null> {
  const username = explicit ?? process.env.PAPERLOG_USER;
  if (!username || username.trim().length === 0) {
    return null;
  }

  const user = await getUserByUsername(ctx, username);
  if (!user) {
    throw new Error(`Acting user '${username}' does not exist`);
  }
  return user;
}

async function safeDispose(resources: {
  server: McpServer | null;
  embedProvider: EmbeddingProvider | null;
  db: DbHandle | null;
  transport: StdioServerTransport | null;
}): Promise<void> {
  try {
    await resources.server?.close();
  } catch {
    // Best-effort server close.
  }

  try {
    await resources.transport?.close();
  } catch {
    // Best-effort transport close.
  }

  try {
    if (resources.db) {
      closeDatabase(resources.db);
    }
  } catch {
    // Best-effort DB close.
  }

  try {
    await resources.embedProvider?.dispose();
  } catch {
    // Best-effort embed provider disposal.
  }
}

export interface CreateMcpServerOptions {
  ctx: CoreContext;
  actingUser: User | null;
  enableReindex?: boolean;
  verbose?: boolean;
}

/**
 * Build the MCP server and register the paper tools. Reads run as the acting
 * user (anonymous when null); writes require one.
 */
export function createMcpServer(options: CreateMcpServerOptions): McpServer {
  const { ctx, actingUser } = options;
  const logger = createMcpLogger(options.verbose ?? false);
  const viewer: Viewer = actingUser ? { id: actingUser.id } : null;

  const server = new McpServer({
    name: "paperlog",
    version: "0.1.0",
  });

  server.registerTool(
    "paper_search",
    {
      title: "Paper Search",
      description: "Hybrid search over papers (full-text + semantic, fused with RRF).",
      inputSchema: PaperSearchInputSchema.shape,
      outputSchema: PaperSearchOutputSchema.shape,
    },
    async (input) =>
      executeTool(PaperSearchOutputSchema, async () => {
        logger.info(`paper_search called (${summarizeForLog("query", input.query)})`);
        return search(ctx, viewer, {
          query: input.query,
          limit: input.limit,
          offset: input.offset,
          mode: input.mode,
        });
      })
  );

  server.registerTool(
    "paper_get",
    {
      title: "Paper Get",
      description: "Get a paper by id.",
      inputSchema: PaperIdInputSchema.shape,
      outputSchema: PaperGetOutputSchema.shape,
    },
    async ({ id }) =>
      executeTool(PaperGetOutputSchema, async () => {
        logger.info(`paper_get called (id=${id})`);
        const paper = await getPaper(ctx, viewer, id);
        return { paper };
      })
  );

  server.registerTool(
    "paper_list",
    {
      title: "Paper List",
      description: "List visible papers, newest first, with owner and tag filters.",
      inputSchema: PaperListInputSchema.shape,
      outputSchema: PaperListOutputSchema.shape,
    },
    async (input) =>
      executeTool(PaperListOutputSchema, async () => {
        logger.info("paper_list called");
        return listPapers(ctx, viewer, {
          ownerId: input.ownerId,
          tag: input.tag,
          limit: input.limit,
          offset: input.offset,
        });
      })
  );

  server.registerTool(
    "paper_add",
    {
      title: "Paper Add",
      description: "Add a paper to the acting user's reading list.",
      inputSchema: CreatePaperInputSchema.shape,
      outputSchema: PaperWriteOutputSchema.shape,
    },
    async (input) =>
      executeTool(PaperWriteOutputSchema, async () => {
        logger.info(`paper_add called (${summarizeForLog("title", input.title)})`);
        const user = requireUser(actingUser);
        return createPaper(ctx, user.id, input);
      })
  );

  server.registerTool(
    "paper_update",
    {
      title: "Paper Update",
      description: "Update one of the acting user's papers.",
      inputSchema: PaperUpdateInputSchema.shape,
      outputSchema: PaperWriteOutputSchema.shape,
    },
    async ({ id, ...changes }) =>
      executeTool(PaperWriteOutputSchema, async () => {
        logger.info(`paper_update called (id=${id})`);
        const user = requireUser(actingUser);
        return updatePaper(ctx, user.id, id, changes);
      })
  );

  server.registerTool(
    "paper_delete",
    {
      title: "Paper Delete",
      description: "Delete one of the acting user's papers.",
      inputSchema: PaperIdInputSchema.shape,
      outputSchema: PaperDeleteOutputSchema.shape,
    },
    async ({ id }) =>
      executeTool(PaperDeleteOutputSchema, async () => {
        logger.info(`paper_delete called (id=${id})`);
        const user = requireUser(actingUser);
        const deleted = await deletePaper(ctx, user.id, id);
        return { deleted };
      })
  );

  server.registerTool(
    "paper_status",
    {
      title: "Paper Index Status",
      description: "Paper counts and embedding coverage.",
      inputSchema: {},
      outputSchema: PaperStatusOutputSchema.shape,
    },
    async () =>
      executeTool(PaperStatusOutputSchema, async () => {
        logger.info("paper_status called");
        return status(ctx);
      })
  );

  if (options.enableReindex) {
    server.registerTool(
      "paper_reindex",
      {
        title: "Paper Reindex",
        description: "Embed papers with missing or outdated embeddings (admin).",
        inputSchema: PaperReindexInputSchema.shape,
        outputSchema: PaperReindexOutputSchema.shape,
      },
      async ({ force }) =>
        executeTool(PaperReindexOutputSchema, async () => {
          logger.info("paper_reindex called");
          return reindex(ctx, { force });
        })
    );
    logger.info("Registered optional tool: paper_reindex");
  }

  return server;
}

export async function startMcpServer(options: StartMcpServerOptions = {}): Promise<McpServerHandle> {
  const verbose = options.verbose ?? process.env.PAPERLOG_MCP_VERBOSE === "true";
  const logger = createMcpLogger(verbose);
  // stdout carries the protocol
  initLogger({ verbose, stream: "stderr" });

  const resources: {
    server: McpServer | null;
    embedProvider: EmbeddingProvider | null;
    db: DbHandle | null;
    transport: StdioServerTransport | null;
  } = {
    server: null,
    embedProvider: null,
    db: null,
    transport: null,
  };

  try {
    logger.info("Loading configuration");
    const config = loadAppConfig(options.configPath, { silent: true });

    resources.db = openDatabase(config.storage.dbPath);
    runMigrations(resources.db);
    logger.info("Database opened and migrations applied");

    resources.embedProvider = createEmbeddingProvider(config.ai.embedding);

    try {
      await resources.embedProvider.initialize();
      logger.info("Embedding provider initialized");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Embedding provider failed to initialize: ${message}`);
    }

    const ctx = createCoreContext({
      db: resources.db,
      embedProvider: resources.embedProvider,
      config,
    });

    const actingUser = await resolveActingUser(ctx, options.username);
    logger.info(actingUser ? `Acting as user: ${actingUser.username}` : "Acting anonymously");

    resources.server = createMcpServer({
      ctx,
      actingUser,
      enableReindex: process.env.PAPERLOG_ENABLE_REINDEX_TOOL === "true",
      verbose,
    });

    resources.transport = new StdioServerTransport();
    await resources.server.connect(resources.transport);
    logger.info("MCP server connected over stdio");

    let closed = false;
    return {
      close: async () => {
        if (closed) {
          return;
        }
        closed = true;
        logger.info("Shutting down MCP server");
        await safeDispose(resources);
      },
    };
  } catch (error) {
    await safeDispose(resources);
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to start MCP server: ${message}`);
  }
}
