import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, unauthorizedError, internalError } from "@/lib/api/response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";
import { postView } from "@/lib/serializers";

/** Public posts from followed users, newest first. */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const { following_count } = await db.getUserStats(user.id);
    if (following_count === 0) {
      return json({
        results: [],
        count: 0,
        message: "Follow some users to see their posts in your feed.",
      });
    }

    const rows = await db.listFeedPosts(user.id);
    return json({
      results: rows.map((r) => postView(request.nextUrl.origin, r)),
      count: rows.length,
    });
  } catch (err) {
    console.error("GET /api/feed error:", err);
    return internalError();
  }
}
