import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import {
  json,
  unauthorizedError,
  validationError,
  internalError,
} from "@/lib/api/response-helpers";
import { readBody, fileField } from "@/lib/api/read-body";
import { createPostSchema, fieldErrors, pageQuerySchema } from "@/lib/validation/request-schema";
import { getRequestUser } from "@/lib/auth/request-user";
import { getPageSize } from "@/lib/config/settings";
import { pageEnvelope, postView } from "@/lib/serializers";
import { storeImage, UploadError } from "@/lib/media/store-upload";

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const viewer = await getRequestUser(request, db);
    const { page } = pageQuerySchema.parse({
      page: request.nextUrl.searchParams.get("page") ?? undefined,
    });
    const pageSize = getPageSize();

    const [count, rows] = await Promise.all([
      db.countPosts(viewer?.id ?? null),
      db.listPosts(viewer?.id ?? null, { limit: pageSize, offset: (page - 1) * pageSize }),
    ]);
    const origin = request.nextUrl.origin;

    return json(
      pageEnvelope(
        request.nextUrl,
        page,
        pageSize,
        count,
        rows.map((r) => postView(origin, r))
      )
    );
  } catch (err) {
    console.error("GET /api/posts error:", err);
    return internalError();
  }
}

export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const body = await readBody(request);
    const parsed = createPostSchema.safeParse({
      caption: typeof body.caption === "string" ? body.caption : undefined,
      is_private: body.is_private ?? undefined,
    });
    if (!parsed.success) {
      return validationError("Invalid request body", fieldErrors(parsed.error));
    }

    const image = fileField(body, "image");
    if (!image) {
      return validationError("Invalid request body", { image: ["An image file is required."] });
    }

    let stored: string;
    try {
      stored = await storeImage(image, "posts");
    } catch (err) {
      if (err instanceof UploadError) {
        return validationError("Invalid request body", { image: [err.message] });
      }
      throw err;
    }

    const post = await db.insertPost({
      user_id: user.id,
      image: stored,
      caption: parsed.data.caption,
      is_private: parsed.data.is_private,
    });
    const detail = await db.getPostDetail(post.id, user.id);
    if (!detail) return internalError();

    return json(postView(request.nextUrl.origin, detail), 201);
  } catch (err) {
    console.error("POST /api/posts error:", err);
    return internalError();
  }
}
