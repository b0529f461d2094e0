import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, unauthorizedError, internalError } from "@/lib/api/response-helpers";
import { getRequestUser } from "@/lib/auth/request-user";
import { loadThreadView } from "@/lib/messages/load-thread";

/**
 * inbox: accepted threads.
 * requests: unaccepted threads the caller has not written in, i.e. chat
 * requests someone else started.
 */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const origin = request.nextUrl.origin;
    const threads = await db.listThreadsByUser(user.id);
    const inbox = [];
    const requests = [];

    for (const thread of threads) {
      if (thread.is_accepted === 1) {
        inbox.push(await loadThreadView(db, origin, thread));
      } else if (!(await db.hasSentMessage(thread.id, user.id))) {
        requests.push(await loadThreadView(db, origin, thread));
      }
    }

    return json({ inbox, requests });
  } catch (err) {
    console.error("GET /api/messages/threads error:", err);
    return internalError();
  }
}
