import { eq } from "drizzle-orm";
import { users } from "../db/schema.js";
import { NotFoundError } from "../errors.js";
import type { Context } from "../types.js";

export type UserRow = typeof users.$inferSelect;

export async function getUserById(context: Context, id: string): Promise<UserRow | null> {
  const rows = await context.db.select().from(users).where(eq(users.id, id)).limit(1);
  return rows[0] ?? null;
}

export async function getUserByGoogleSub(
  context: Context,
  googleSub: string
): Promise<UserRow | null> {
  const rows = await context.db
    .select()
    .from(users)
    .where(eq(users.googleSub, googleSub))
    .limit(1);
  return rows[0] ?? null;
}

/**
 * Signs a Google account in, registering it on first sight. Profile fields
 * are refreshed from the token on every call; the active flag is left alone.
 */
export async function upsertGoogleUser(
  context: Context,
  data: { googleSub: string; email?: string; name?: string }
): Promise<UserRow> {
  const now = new Date();
  const [row] = await context.db
    .insert(users)
    .values({
      googleSub: data.googleSub,
      email: data.email ?? null,
      name: data.name ?? null,
      lastLoginAt: now,
    })
    .onConflictDoUpdate({
      target: users.googleSub,
      set: {
        email: data.email ?? null,
        name: data.name ?? null,
        lastLoginAt: now,
      },
    })
    .returning();
  if (!row) throw new Error(`Failed to upsert user ${data.googleSub}`);
  return row;
}

export async function setUserActive(
  context: Context,
  id: string,
  isActive: boolean
): Promise<UserRow> {
  const [row] = await context.db
    .update(users)
    .set({ isActive })
    .where(eq(users.id, id))
    .returning();
  if (!row) throw new NotFoundError("User not found");
  return row;
}
