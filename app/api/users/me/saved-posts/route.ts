import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, unauthorizedError, internalError } from "@/lib/api/response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";
import { postView } from "@/lib/serializers";

/** Most recently saved first. */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const rows = await db.listSavedPosts(user.id);
    return json({
      results: rows.map((r) => postView(request.nextUrl.origin, r)),
      count: rows.length,
    });
  } catch (err) {
    console.error("GET /api/users/me/saved-posts error:", err);
    return internalError();
  }
}
