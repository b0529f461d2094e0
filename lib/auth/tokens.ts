/**
 * Opaque API tokens, one per user. A token lives until logout.
 */

import { randomBytes } from "crypto";
import type { DbAdapter } from "@/lib/db/adapter";

export function generateTokenKey(): string {
  return randomBytes(20).toString("hex");
}

/** Reuses the user's existing token when there is one. */
export async function getOrCreateToken(db: DbAdapter, userId: number): Promise<string> {
  const existing = await db.getTokenByUser(userId);
  if (existing) return existing;
  const key = generateTokenKey();
  await db.insertToken(userId, key);
  return key;
}
