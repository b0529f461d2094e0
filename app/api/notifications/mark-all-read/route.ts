import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, unauthorizedError, internalError } from "@/lib/api/response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";

export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const updated = await db.markAllNotificationsRead(user.id);
    return json({
      message: `Marked ${updated} notifications as read.`,
      updated_count: updated,
    });
  } catch (err) {
    console.error("POST /api/notifications/mark-all-read error:", err);
    return internalError();
  }
}
