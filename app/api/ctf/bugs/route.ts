import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, unauthorizedError, internalError } from "@/lib/api/response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";
import { BUGS } from "@/lib/ctf/catalogue";

/** The bug catalogue with the caller's progress. Flags are never listed. */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const solves = await db.listBugSolvesByUser(user.id);
    const solvedAt = new Map(solves.map((s) => [s.slug, s.solved_at]));

    return json({
      bugs: BUGS.map((bug) => ({
        slug: bug.slug,
        title: bug.title,
        description: bug.description,
        category: bug.category,
        points: bug.points,
        solved: solvedAt.has(bug.slug),
        solved_at: solvedAt.get(bug.slug) ?? null,
      })),
      points: user.points,
      bugs_solved: user.bugs_solved,
    });
  } catch (err) {
    console.error("GET /api/ctf/bugs error:", err);
    return internalError();
  }
}
