import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, unauthorizedError, validationError, internalError } from "@/lib/api/response-helpers";
import { readBody, fileField } from "@/lib/api/read-body";
import { fieldErrors, updateProfileSchema } from "@/lib/validation/request-schema";
import { getRequestUser } from "@/lib/auth/request-user";
import { mediaUrl } from "@/lib/serializers";
import { storeImage, UploadError } from "@/lib/media/store-upload";

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const stats = await db.getUserStats(user.id);
    return json({
      id: user.id,
      username: user.username,
      email: user.email,
      bio: user.bio,
      profile_picture: mediaUrl(request.nextUrl.origin, user.profile_picture),
      points: user.points,
      bugs_solved: user.bugs_solved,
      ...stats,
      created_at: user.created_at,
    });
  } catch (err) {
    console.error("GET /api/users/me error:", err);
    return internalError();
  }
}

export async function PATCH(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const body = await readBody(request);
    const parsed = updateProfileSchema.safeParse({
      bio: typeof body.bio === "string" ? body.bio : undefined,
    });
    if (!parsed.success) {
      return validationError("Invalid request body", fieldErrors(parsed.error));
    }

    const updates: { bio?: string; profile_picture?: string } = {};
    if (parsed.data.bio !== undefined) updates.bio = parsed.data.bio;

    const picture = fileField(body, "profile_picture");
    if (picture) {
      try {
        updates.profile_picture = await storeImage(picture, "profile_pictures");
      } catch (err) {
        if (err instanceof UploadError) {
          return validationError(err.message, { profile_picture: [err.message] });
        }
        throw err;
      }
    }

    await db.updateUser(user.id, updates);
    const updated = (await db.getUserById(user.id)) ?? user;

    return json({
      message: "Profile updated successfully.",
      bio: updated.bio,
      profile_picture: mediaUrl(request.nextUrl.origin, updated.profile_picture),
    });
  } catch (err) {
    console.error("PATCH /api/users/me error:", err);
    return internalError();
  }
}
