import type { DbAdapter } from "@/lib/db/adapter";
import type { ThreadRow } from "@/lib/db/types";
import { threadView, type ThreadView } from "@/lib/serializers";

export async function loadThreadView(
  db: DbAdapter,
  origin: string,
  thread: ThreadRow
): Promise<ThreadView> {
  const [participants, last] = await Promise.all([
    db.getThreadParticipants(thread.id),
    db.getLastMessage(thread.id),
  ]);
  return threadView(origin, thread, participants, last);
}

/**
 * A thread the user takes part in, or null when it does not exist or the
 * user is not a participant.
 */
export async function getParticipantThread(
  db: DbAdapter,
  threadId: number,
  userId: number
): Promise<ThreadRow | null> {
  const thread = await db.getThread(threadId);
  if (!thread) return null;
  return (await db.isThreadParticipant(thread.id, userId)) ? thread : null;
}
