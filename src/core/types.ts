import { z } from "zod";
import type { Paper, PaperOwner } from "../types/paper.js";

// ============================================================================
// Input Schemas
// ============================================================================

const optionalText = (max: number) => z.string().max(max).nullable().optional();

export const TagNameSchema = z.string().trim().max(50, "Tag names are at most 50 characters");

export const CreatePaperInputSchema = z.object({
  title: z.string().trim().min(1, "Title is required").max(500),
  authors: z.string().trim().min(1, "Authors are required").max(500),
  abstract: z.string().nullable().optional(),
  summary: z.string().trim().min(1, "Summary is required"),
  arxivId: optionalText(50),
  doi: optionalText(100),
  paperUrl: optionalText(500),
  dateRead: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "dateRead must be YYYY-MM-DD").nullable().optional(),
  isPrivate: z.boolean().default(false),
  tags: z.array(TagNameSchema).default([]),
}).strict();

export const UpdatePaperInputSchema = z.object({
  title: z.string().trim().min(1).max(500).optional(),
  authors: z.string().trim().min(1).max(500).optional(),
  abstract: z.string().nullable().optional(),
  summary: z.string().trim().min(1).optional(),
  arxivId: optionalText(50),
  doi: optionalText(100),
  paperUrl: optionalText(500),
  dateRead: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "dateRead must be YYYY-MM-DD").nullable().optional(),
  isPrivate: z.boolean().optional(),
  tags: z.array(TagNameSchema).optional(),
}).strict();

export const ListPapersFiltersSchema = z.object({
  ownerId: z.number().int().positive().optional(),
  tag: z.string().trim().min(1).optional(),
  limit: z.number().int().min(1).max(100).default(50),
  offset: z.number().int().nonnegative().default(0),
}).strict();

export const SearchInputSchema = z.object({
  query: z.string(),
  limit: z.number().int().optional(),
  offset: z.number().int().nonnegative().default(0),
  mode: z.enum(["hybrid", "lexical", "vector"]).default("hybrid"),
}).strict();

export const CreateUserInputSchema = z.object({
  username: z.string().trim().min(3).max(50),
  displayName: z.string().max(100).nullable().optional(),
  bio: z.string().nullable().optional(),
}).strict();

// ============================================================================
// Output Types
// ============================================================================

export interface PaperResult {
  paper: Paper;
  embedded: boolean;
}

export interface ListResult {
  items: Paper[];
  total: number;
  limit: number;
  offset: number;
}

export interface SearchResultItem {
  id: number;
  title: string;
  authors: string;
  summary: string;
  score: number;
  source: "lex" | "vec" | "hybrid";
  tags: string[];
  isPrivate: boolean;
  owner: Omit<PaperOwner, "id">;
}

export interface SearchResponse {
  query: string;
  results: SearchResultItem[];
  total: number;
  degraded: boolean;
}

export interface IndexStatus {
  totalPapers: number;
  embeddedPapers: number;
  pendingEmbeddings: number;
  staleEmbeddings: number;
  lastUpdatedAt: string | null;
}

export interface ReindexResult {
  processed: number;
  errors: number;
  duration: number;
}

// ============================================================================
// Type Exports
// ============================================================================

export type CreatePaperInput = z.input<typeof CreatePaperInputSchema>;

export type UpdatePaperInput = z.input<typeof UpdatePaperInputSchema>;

export type ListPapersFilters = z.input<typeof ListPapersFiltersSchema>;

export type SearchInput = z.input<typeof SearchInputSchema>;

export type CreateUserInput = z.input<typeof CreateUserInputSchema>;
