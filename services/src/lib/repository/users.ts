import { eq } from "drizzle-orm";

import type { Db } from "@/lib/db/client";
import { users } from "@/lib/db/schema";
import type { UserEntity, UserRole } from "@/types/domain";

export async function getUserByTelegramId(db: Db, telegramId: number): Promise<UserEntity | null> {
  return db.select().from(users).where(eq(users.telegramId, telegramId)).get() ?? null;
}

export async function getUserById(db: Db, userId: number): Promise<UserEntity | null> {
  return db.select().from(users).where(eq(users.id, userId)).get() ?? null;
}

export async function createUser(
  db: Db,
  input: { telegramId: number; name: string; role?: UserRole }
): Promise<UserEntity> {
  return db
    .insert(users)
    .values({
      telegramId: input.telegramId,
      name: input.name,
      role: input.role ?? "client",
      createdAt: new Date().toISOString(),
    })
    .returning()
    .get();
}

export async function getOrCreateUser(
  db: Db,
  telegramId: number,
  name: string
): Promise<{ user: UserEntity; created: boolean }> {
  const existing = await getUserByTelegramId(db, telegramId);
  if (existing) {
    return { user: existing, created: false };
  }
  const user = await createUser(db, { telegramId, name });
  return { user, created: true };
}

export async function updateUserRole(db: Db, userId: number, role: UserRole): Promise<UserEntity | null> {
  return db.update(users).set({ role }).where(eq(users.id, userId)).returning().get() ?? null;
}
