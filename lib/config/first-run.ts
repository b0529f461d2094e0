/**
 * First-run initialization.
 * Seeds the bug catalogue so the bug list shows every challenge before anyone solves one.
 * Idempotent; runs on every startup.
 */

import { getDb } from "@/lib/db";
import type { DbAdapter } from "@/lib/db/adapter";
import { BUGS } from "@/lib/ctf/catalogue";

let _initialized = false;

export async function seedBugCatalogue(db: DbAdapter): Promise<number> {
  for (const bug of BUGS) {
    await db.upsertBug({
      slug: bug.slug,
      title: bug.title,
      description: bug.description,
      category: bug.category,
      points: bug.points,
    });
  }
  return BUGS.length;
}

export async function ensureFirstRunComplete(): Promise<void> {
  if (_initialized) return;
  _initialized = true;

  try {
    const count = await seedBugCatalogue(getDb());
    console.log(`  Bug catalogue ready (${count} bugs)`);
  } catch (err) {
    console.error("First-run initialization failed:", err);
  }
}
