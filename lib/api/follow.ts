/**
 * Follow and unfollow share lookup, self-check and the response shape.
 */

import type { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, notFoundError, unauthorizedError, validationError } from "./response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";
import { idParamSchema } from "@/lib/validation/request-schema";
import { createNotification } from "@/lib/notifications/create-notification";

export async function toggleFollow(
  request: NextRequest,
  rawUserId: string,
  follow: boolean
): Promise<Response> {
  const db = getDb();
  const caller = await getRequestUser(request, db);
  if (!caller) return unauthorizedError();

  const id = idParamSchema.safeParse(rawUserId);
  const target = id.success ? await db.getUserById(id.data) : null;
  if (!target) return notFoundError("User not found.");

  if (target.id === caller.id) {
    return validationError(follow ? "You cannot follow yourself." : "You cannot unfollow yourself.");
  }

  let message: string;
  if (follow) {
    const created = await db.insertFollow(caller.id, target.id);
    if (created) {
      await createNotification(db, { senderId: caller.id, receiverId: target.id, type: "follow" });
      message = `You are now following ${target.username}.`;
    } else {
      message = `You are already following ${target.username}.`;
    }
  } else {
    const removed = await db.deleteFollow(caller.id, target.id);
    message = removed
      ? `You have unfollowed ${target.username}.`
      : `You are not following ${target.username}.`;
  }

  const targetStats = await db.getUserStats(target.id);
  const callerStats = await db.getUserStats(caller.id);
  return json({
    message,
    is_following: follow,
    followers_count: targetStats.followers_count,
    following_count: callerStats.following_count,
  });
}
