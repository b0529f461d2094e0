/**
 * Notify a post owner or followed user about an interaction.
 * Never notifies users about their own actions. A failure here is logged
 * and swallowed so the interaction itself still succeeds.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import type { NotificationRow, NotificationType } from "@/lib/db/types";

export interface NotifyInput {
  senderId: number;
  receiverId: number;
  type: NotificationType;
  postId?: number | null;
  commentId?: number | null;
}

export async function createNotification(
  db: DbAdapter,
  input: NotifyInput
): Promise<NotificationRow | null> {
  if (input.senderId === input.receiverId) return null;

  const match = {
    sender_id: input.senderId,
    receiver_id: input.receiverId,
    notification_type: input.type,
    post_id: input.postId ?? null,
    comment_id: input.commentId ?? null,
  };

  try {
    const existing = await db.findNotification(match);
    if (existing) {
      // Saves are announced once; the rest reuse the existing row.
      return input.type === "save" ? null : existing;
    }
    return await db.insertNotification(match);
  } catch (err) {
    console.error("createNotification error:", err);
    return null;
  }
}
