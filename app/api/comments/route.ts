import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { isCtfEnabled } from "@/lib/feature-flags";
import {
  json,
  notFoundError,
  unauthorizedError,
  validationError,
  internalError,
} from "@/lib/api/response-helpers";
import { readBody } from "@/lib/api/read-body";
import { createCommentSchema, fieldErrors, idParamSchema, pageQuerySchema } from "@/lib/validation/request-schema";
import { getRequestUser } from "@/lib/auth/request-user";
import { getVisiblePost } from "@/lib/posts/visible-post";
import { getPageSize, MAX_COMMENT_LENGTH } from "@/lib/config/settings";
import { commentView, pageEnvelope } from "@/lib/serializers";
import { createNotification } from "@/lib/notifications/create-notification";
import { detectXssAttempt, escapeHtml, payloadPreview } from "@/lib/ctf/xss";
import { awardBug, awardFields } from "@/lib/ctf/award-bug";

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const search = request.nextUrl.searchParams;
    const { page } = pageQuerySchema.parse({ page: search.get("page") ?? undefined });
    const rawPostId = search.get("post_id");
    const postFilter = rawPostId ? idParamSchema.safeParse(rawPostId) : null;
    if (postFilter && !postFilter.success) {
      return validationError("post_id must be a post id.");
    }
    const viewerId = (await getRequestUser(request, db))?.id ?? null;
    const postId = postFilter ? postFilter.data : null;
    if (postId !== null && !(await getVisiblePost(db, postId, viewerId))) {
      return notFoundError("Post not found.");
    }
    const pageSize = getPageSize();

    const [count, rows] = await Promise.all([
      db.countComments(postId, viewerId),
      db.listComments(postId, { limit: pageSize, offset: (page - 1) * pageSize }, viewerId),
    ]);
    const origin = request.nextUrl.origin;

    return json(
      pageEnvelope(request.nextUrl, page, pageSize, count, rows.map((r) => commentView(origin, r)))
    );
  } catch (err) {
    console.error("GET /api/comments error:", err);
    return internalError();
  }
}

/**
 * Script payloads are answered with a CTF body and never stored. Everything
 * else is trimmed and stored HTML-escaped.
 */
export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const parsed = createCommentSchema.safeParse(await readBody(request));
    if (!parsed.success) {
      return validationError("Invalid request body", fieldErrors(parsed.error));
    }
    const { post: postId, text } = parsed.data;

    if (isCtfEnabled() && detectXssAttempt(text)) {
      console.warn(`[ctf] user ${user.id} sent a script payload in a comment`);
      const award = await awardBug(db, user.id, "xss-comments");
      return json({
        ...awardFields(award),
        description: award.success
          ? "You discovered an XSS vulnerability in the comment system! The malicious script was detected and neutralized."
          : "XSS attempt detected, but you already found this vulnerability.",
        bug_type: "Cross-Site Scripting (XSS)",
        attempted_payload: payloadPreview(text),
      });
    }

    const trimmed = text.trim();
    if (!trimmed) {
      return validationError("Invalid request body", { text: ["Comment text cannot be empty."] });
    }
    if (trimmed.length > MAX_COMMENT_LENGTH) {
      return validationError("Invalid request body", {
        text: [`Comment is too long. Maximum ${MAX_COMMENT_LENGTH} characters allowed.`],
      });
    }

    const post = await getVisiblePost(db, postId, user.id);
    if (!post) return notFoundError("Post not found.");

    const comment = await db.insertComment({
      user_id: user.id,
      post_id: post.id,
      text: escapeHtml(trimmed),
    });
    await createNotification(db, {
      senderId: user.id,
      receiverId: post.user_id,
      type: "comment",
      postId: post.id,
      commentId: comment.id,
    });

    const detail = await db.getCommentDetail(comment.id);
    if (!detail) return internalError();
    return json(commentView(request.nextUrl.origin, detail), 201);
  } catch (err) {
    console.error("POST /api/comments error:", err);
    return internalError();
  }
}
