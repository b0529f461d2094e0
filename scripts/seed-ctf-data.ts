/**
 * Seed two players and a private conversation between them, so the chat
 * IDOR challenge has a thread to find.
 * Usage: npx tsx scripts/seed-ctf-data.ts
 */
import { getDb } from "../lib/db";
import type { DbAdapter } from "../lib/db/adapter";
import type { UserRow } from "../lib/db/types";
import { hashPassword } from "../lib/auth/password";
import { seedBugCatalogue } from "../lib/config/first-run";

const PASSWORD = "password123";

async function ensureUser(db: DbAdapter, username: string): Promise<UserRow> {
  const existing = await db.getUserByUsername(username);
  if (existing) {
    console.log(`User ${username} already exists (id ${existing.id})`);
    return existing;
  }
  const user = await db.insertUser({
    username,
    email: `${username}@example.com`,
    password_hash: await hashPassword(PASSWORD),
  });
  console.log(`Created user ${username} (id ${user.id})`);
  return user;
}

async function main() {
  const db = getDb();
  await seedBugCatalogue(db);

  const alice = await ensureUser(db, "alice");
  const bob = await ensureUser(db, "bob");

  let thread = await db.findThreadBetween(alice.id, bob.id);
  if (!thread) {
    thread = await db.insertThread([alice.id, bob.id]);
    await db.acceptThread(thread.id);
    await db.insertMessage({
      thread_id: thread.id,
      sender_id: alice.id,
      text: "Hey Bob, did you see the new photo I posted?",
    });
    await db.insertMessage({
      thread_id: thread.id,
      sender_id: bob.id,
      text: "Yes! Keep this between us, the admin password is in my drafts.",
    });
    console.log("Created accepted thread with 2 messages");
  }

  console.log(`Thread id: ${thread.id}`);
  console.log(`Log in as either user with password "${PASSWORD}".`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
