// ============================================================================
// Core API - Service layer for MCP and CLI
// ============================================================================

// Export context
export { createCoreContext, type CoreContext, type CreateCoreContextOptions } from "./context.js";

// Export operations
export { search } from "./search.js";
export { createPaper } from "./create.js";
export { updatePaper } from "./update.js";
export { deletePaper } from "./delete.js";
export { getPaper } from "./get.js";
export { listPapers } from "./list.js";
export { createUser, getUser, getUserByUsername } from "./users.js";
export { reindex } from "./reindex.js";
export { status } from "./status.js";
export { loadFixtures, FixtureFileSchema, type FixtureFile, type SeedResult } from "./seed.js";

// Export types and schemas
export {
  // Schemas
  CreatePaperInputSchema,
  UpdatePaperInputSchema,
  ListPapersFiltersSchema,
  SearchInputSchema,
  CreateUserInputSchema,

  // Types
  type CreatePaperInput,
  type UpdatePaperInput,
  type ListPapersFilters,
  type SearchInput,
  type CreateUserInput,
  type PaperResult,
  type ListResult,
  type SearchResultItem,
  type SearchResponse,
  type IndexStatus,
  type ReindexResult,
} from "./types.js";

export { CoreError, type CoreErrorCode } from "./errors.js";

// Export utilities
export { normalizeTags, documentText, isValidId } from "./utils.js";
