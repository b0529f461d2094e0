/**
 * Record a bug discovery and award its points once per user.
 * The unique (user, bug) constraint decides who got there first; repeat
 * discoveries return the current total without changing it.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import { flagFor, getBugDefinition, type BugSlug } from "./catalogue";

export interface BugAward {
  success: boolean;
  message: string;
  points_awarded: number;
  total_points: number;
  flag: string | null;
}

export interface AwardOptions {
  /** Extra flag segments after the user id (the race flag carries the post id). */
  flagSuffix?: Array<string | number>;
}

export async function awardBug(
  db: DbAdapter,
  userId: number,
  slug: BugSlug,
  options: AwardOptions = {}
): Promise<BugAward> {
  const def = getBugDefinition(slug);

  return db.transaction(async (tx) => {
    const bug = await tx.upsertBug({
      slug: def.slug,
      title: def.title,
      description: def.description,
      category: def.category,
      points: def.points,
    });
    const inserted = await tx.insertBugSolve(userId, bug.id);

    if (inserted) {
      const user = await tx.addUserScore(userId, bug.points);
      if (!user) throw new Error(`User ${userId} not found`);
      console.warn(`[ctf] user ${userId} solved ${slug} (+${bug.points})`);
      return {
        success: true,
        message: `${bug.title} bug found! +${bug.points} points`,
        points_awarded: bug.points,
        total_points: user.points,
        flag: flagFor(slug, userId, ...(options.flagSuffix ?? [])),
      };
    }

    const user = await tx.getUserById(userId);
    if (!user) throw new Error(`User ${userId} not found`);
    return {
      success: false,
      message: "You have already found this bug. No extra points.",
      points_awarded: 0,
      total_points: user.points,
      flag: null,
    };
  });
}

/** Common CTF fields merged into a detector's response body. */
export function awardFields(award: BugAward) {
  return {
    vulnerability_detected: true,
    notification_type: award.success ? "success" : "info",
    ctf_message: award.message,
    ctf_points_awarded: award.points_awarded,
    ctf_total_points: award.total_points,
    flag: award.flag,
  } as const;
}
