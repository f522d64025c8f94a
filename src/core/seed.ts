import { z } from "zod";
import type { CoreContext } from "./context.js";
import { CreatePaperInputSchema, CreateUserInputSchema } from "./types.js";
import { CoreError } from "./errors.js";
import { createUser, getUserByUsername } from "./users.js";
import { createPaper } from "./create.js";
import { formatZodError } from "./utils.js";
import { info } from "../utils/logger.js";

export const FixtureFileSchema = z.object({
  users: z.array(CreateUserInputSchema).default([]),
  papers: z.array(
    CreatePaperInputSchema.extend({
      owner: z.string().min(1),
    })
  ).default([]),
});

export type FixtureFile = z.input<typeof FixtureFileSchema>;

export interface SeedResult {
  usersCreated: number;
  usersSkipped: number;
  papersCreated: number;
  papersEmbedded: number;
}

/**
 * Load users and papers from fixture data. Users that already exist are
 * reused; papers are always inserted.
 */
export async function loadFixtures(ctx: CoreContext, fixtures: unknown): Promise<SeedResult> {
  const parsed = FixtureFileSchema.safeParse(fixtures);
  if (!parsed.success) {
    throw new CoreError(`Invalid fixtures: ${formatZodError(parsed.error)}`, "VALIDATION");
  }

  const result: SeedResult = {
    usersCreated: 0,
    usersSkipped: 0,
    papersCreated: 0,
    papersEmbedded: 0,
  };
  const userIds = new Map<string, number>();

  for (const user of parsed.data.users) {
    const existing = await getUserByUsername(ctx, user.username);
    if (existing) {
      info(() => `[Seed] User '${user.username}' already exists, skipping`);
      userIds.set(existing.username, existing.id);
      result.usersSkipped += 1;
      continue;
    }

    const created = await createUser(ctx, user);
    userIds.set(created.username, created.id);
    result.usersCreated += 1;
  }

  for (const { owner, ...paper } of parsed.data.papers) {
    let ownerId = userIds.get(owner);
    if (ownerId === undefined) {
      const existing = await getUserByUsername(ctx, owner);
      if (!existing) {
        throw new CoreError(`Fixture paper "${paper.title}" references unknown user '${owner}'`, "NOT_FOUND");
      }
      ownerId = existing.id;
      userIds.set(owner, ownerId);
    }

    const { embedded } = await createPaper(ctx, ownerId, paper);
    result.papersCreated += 1;
    if (embedded) {
      result.papersEmbedded += 1;
    }
  }

  return result;
}
