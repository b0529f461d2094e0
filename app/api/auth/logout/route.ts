import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, unauthorizedError, internalError } from "@/lib/api/response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";

export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    await db.deleteTokensByUser(user.id);
    return json({ message: "Successfully logged out." });
  } catch (err) {
    console.error("POST /api/auth/logout error:", err);
    return internalError();
  }
}
