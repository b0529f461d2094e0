import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, unauthorizedError, internalError } from "@/lib/api/response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";
import { notificationView } from "@/lib/serializers";

const NOTIFICATION_LIMIT = 50;

export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const [rows, unread] = await Promise.all([
      db.listNotifications(user.id, NOTIFICATION_LIMIT),
      db.countNotifications(user.id, true),
    ]);
    const now = new Date();

    return json({
      results: rows.map((r) => notificationView(request.nextUrl.origin, r, now)),
      unread_count: unread,
      count: rows.length,
    });
  } catch (err) {
    console.error("GET /api/notifications error:", err);
    return internalError();
  }
}
