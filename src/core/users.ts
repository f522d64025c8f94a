import type { CoreContext } from "./context.js";
import type { User } from "../types/paper.js";
import { CreateUserInputSchema, type CreateUserInput } from "./types.js";
import { CoreError, describeError } from "./errors.js";
import { formatZodError, mapRowToUser, type UserRow } from "./utils.js";

export async function createUser(ctx: CoreContext, input: CreateUserInput): Promise<User> {
  const validation = CreateUserInputSchema.safeParse(input);
  if (!validation.success) {
    throw new CoreError(`Validation failed: ${formatZodError(validation.error)}`, "VALIDATION");
  }
  const data = validation.data;

  if (await getUserByUsername(ctx, data.username)) {
    throw new CoreError(`Username '${data.username}' is already taken`, "CONFLICT");
  }

  try {
    const now = new Date().toISOString();
    const info = ctx.db.db
      .prepare(`
        INSERT INTO users (username, display_name, bio, created_at)
        VALUES (?, ?, ?, ?)
      `)
      .run(data.username, data.displayName ?? null, data.bio ?? null, now);

    return {
      id: Number(info.lastInsertRowid),
      username: data.username,
      displayName: data.displayName ?? null,
      bio: data.bio ?? null,
      createdAt: now,
    };
  } catch (error) {
    throw new CoreError(
      `Failed to create user: ${describeError(error)}`,
      "DATABASE",
      error instanceof Error ? error : undefined
    );
  }
}

export async function getUserByUsername(ctx: CoreContext, username: string): Promise<User | null> {
  const row = ctx.db.db
    .prepare(`SELECT id, username, display_name, bio, created_at FROM users WHERE username = ?`)
    .get(username.trim()) as UserRow | undefined;
  return row ? mapRowToUser(row) : null;
}

export async function getUser(ctx: CoreContext, id: number): Promise<User | null> {
  const row = ctx.db.db
    .prepare(`SELECT id, username, display_name, bio, created_at FROM users WHERE id = ?`)
    .get(id) as UserRow | undefined;
  return row ? mapRowToUser(row) : null;
}
