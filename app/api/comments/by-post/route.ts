import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, notFoundError, validationError, internalError } from "@/lib/api/response-helpers";
import { idParamSchema } from "@/lib/validation/request-schema";
import { getRequestUser } from "@/lib/auth/request-user";
import { getVisiblePost } from "@/lib/posts/visible-post";
import { commentView } from "@/lib/serializers";

export async function GET(request: NextRequest) {
  try {
    const rawPostId = request.nextUrl.searchParams.get("post_id");
    if (!rawPostId) return validationError("post_id parameter is required.");

    const id = idParamSchema.safeParse(rawPostId);
    if (!id.success) return notFoundError("Post not found.");

    const db = getDb();
    const viewer = await getRequestUser(request, db);
    const post = await getVisiblePost(db, id.data, viewer?.id ?? null);
    if (!post) return notFoundError("Post not found.");

    const rows = await db.listComments(post.id);
    return json({
      post_id: post.id,
      count: rows.length,
      results: rows.map((r) => commentView(request.nextUrl.origin, r)),
    });
  } catch (err) {
    console.error("GET /api/comments/by-post error:", err);
    return internalError();
  }
}
