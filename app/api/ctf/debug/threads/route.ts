import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { isCtfDebugEnabled } from "@/lib/feature-flags";
import { json, notFoundError, unauthorizedError, internalError } from "@/lib/api/response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";

/**
 * Every thread in the system with its participants. Left reachable on purpose
 * so players can find thread ids for the chat IDOR challenge.
 */
export async function GET(request: NextRequest) {
  if (!isCtfDebugEnabled()) return notFoundError();
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const threads = await db.listAllThreads();
    const listed = await Promise.all(
      threads.map(async (thread) => {
        const [participants, messageCount] = await Promise.all([
          db.getThreadParticipants(thread.id),
          db.countMessages(thread.id),
        ]);
        return {
          id: thread.id,
          participants: participants.map((p) => ({ id: p.id, username: p.username })),
          is_accepted: thread.is_accepted === 1,
          message_count: messageCount,
          created_at: thread.created_at,
        };
      })
    );

    return json({
      total_threads: listed.length,
      threads: listed,
      current_user_id: user.id,
      current_username: user.username,
    });
  } catch (err) {
    console.error("GET /api/ctf/debug/threads error:", err);
    return internalError();
  }
}
